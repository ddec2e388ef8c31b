import type { Address, Hex } from 'viem';

/** Caller-visible frame of a call into deployed code */
export interface CallContext {
  /** Immediate caller (`msg.sender`) */
  sender: Address;
  /** Native value attached to the call */
  value: bigint;
  /** Full calldata, selector included */
  data: Hex;
}

/** Frame of a delegated call: the code runs on behalf of `self` */
export interface DelegateContext {
  /** Account whose context the code executes in */
  self: Address;
  data: Hex;
  host: ExecutionHost;
}

/** Code reachable through a regular call */
export interface Contract {
  invoke(ctx: CallContext): Promise<Hex>;
}

/** Code reachable through a delegated call */
export interface DelegateTarget {
  invokeDelegated(ctx: DelegateContext): Promise<Hex>;
}

/**
 * Outcome of one call primitive.
 *
 * `cause` holds the value thrown by the callee when `success` is false, so that
 * callers propagating the failure can rethrow it unwrapped.
 */
export interface CallResult {
  success: boolean;
  returnData: Hex;
  cause?: unknown;
}

/**
 * The world an account executes in: balances, deployed code, and the
 * call/delegated-call primitives. Checkpoints nest and must be released in
 * LIFO order via {@link ExecutionHost.commit} or {@link ExecutionHost.revertTo}.
 */
export interface ExecutionHost {
  getBalance(address: Address): bigint;
  /** Deployed code at an address (contract, module or delegate target) */
  getCode(address: Address): object | undefined;
  /** EIP-7702 delegation designator of an address, if any */
  getDelegation(address: Address): Address | undefined;

  call(from: Address, target: Address, value: bigint, data: Hex): Promise<CallResult>;
  delegateCall(from: Address, target: Address, data: Hex): Promise<CallResult>;
  /** Call whose state changes are always discarded */
  staticCall(from: Address, target: Address, data: Hex): Promise<CallResult>;

  checkpoint(): number;
  revertTo(checkpoint: number): void;
  commit(checkpoint: number): void;
}

export function isContract(code: unknown): code is Contract {
  return typeof code === 'object' && code !== null && 'invoke' in code && typeof code.invoke === 'function';
}

export function isDelegateTarget(code: unknown): code is DelegateTarget {
  return (
    typeof code === 'object' &&
    code !== null &&
    'invokeDelegated' in code &&
    typeof code.invokeDelegated === 'function'
  );
}
