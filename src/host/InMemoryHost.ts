import type { Address, Hex } from 'viem';
import { ErrorCode } from '../errors/codes.js';
import { LatchkeyError } from '../errors/LatchkeyError.js';
import { encodeRevertData } from './revert.js';
import {
  isContract,
  isDelegateTarget,
  type CallResult,
  type ExecutionHost,
} from './types.js';

/** Journaled world state captured by a checkpoint */
interface WorldState {
  balances: Map<string, bigint>;
  storage: Map<string, Map<Hex, Hex>>;
  delegations: Map<string, Address>;
}

function key(address: Address): string {
  return address.toLowerCase();
}

function cloneWorld(world: WorldState): WorldState {
  const storage = new Map<string, Map<Hex, Hex>>();
  for (const [owner, slots] of world.storage) {
    storage.set(owner, new Map(slots));
  }
  return {
    balances: new Map(world.balances),
    storage,
    delegations: new Map(world.delegations),
  };
}

/**
 * In-process execution host for development and tests.
 *
 * Keeps balances, per-address storage slots and EIP-7702 delegation
 * pointers in memory. Every call runs inside its own checkpoint so a thrown
 * callee leaves no trace. Deployed code is not journaled: objects registered
 * with {@link InMemoryHost.deploy} keep any state they hold outside of
 * {@link InMemoryHost.setStorage}.
 *
 * @example
 * ```typescript
 * const host = new InMemoryHost();
 * host.setBalance(account.address, parseEther('1'));
 * host.deploy(account.address, account);
 * host.deploy(counter, new CounterContract(host, counter));
 * ```
 */
export class InMemoryHost implements ExecutionHost {
  private world: WorldState = {
    balances: new Map(),
    storage: new Map(),
    delegations: new Map(),
  };
  private readonly code: Map<string, object> = new Map();
  private readonly checkpoints: WorldState[] = [];

  // ===========================================================================
  // World setup
  // ===========================================================================

  deploy(address: Address, code: object): void {
    this.code.set(key(address), code);
  }

  getCode(address: Address): object | undefined {
    return this.code.get(key(address));
  }

  setBalance(address: Address, amount: bigint): void {
    this.world.balances.set(key(address), amount);
  }

  getBalance(address: Address): bigint {
    return this.world.balances.get(key(address)) ?? 0n;
  }

  setDelegation(address: Address, implementation: Address): void {
    this.world.delegations.set(key(address), implementation);
  }

  getDelegation(address: Address): Address | undefined {
    return this.world.delegations.get(key(address));
  }

  getStorage(address: Address, slot: Hex): Hex {
    return this.world.storage.get(key(address))?.get(slot) ?? '0x';
  }

  setStorage(address: Address, slot: Hex, value: Hex): void {
    const owner = key(address);
    let slots = this.world.storage.get(owner);
    if (!slots) {
      slots = new Map();
      this.world.storage.set(owner, slots);
    }
    slots.set(slot, value);
  }

  // ===========================================================================
  // Checkpoints
  // ===========================================================================

  checkpoint(): number {
    this.checkpoints.push(cloneWorld(this.world));
    return this.checkpoints.length;
  }

  revertTo(checkpoint: number): void {
    const saved = this.checkpoints[checkpoint - 1];
    if (!saved) {
      throw new Error(`Unknown checkpoint ${checkpoint}`);
    }
    this.world = saved;
    this.checkpoints.length = checkpoint - 1;
  }

  commit(checkpoint: number): void {
    if (checkpoint < 1 || checkpoint > this.checkpoints.length) {
      throw new Error(`Unknown checkpoint ${checkpoint}`);
    }
    this.checkpoints.length = checkpoint - 1;
  }

  // ===========================================================================
  // Call primitives
  // ===========================================================================

  async call(from: Address, target: Address, value: bigint, data: Hex): Promise<CallResult> {
    const checkpoint = this.checkpoint();
    try {
      this.transfer(from, target, value);
      const code = this.getCode(target);
      const returnData = isContract(code)
        ? await code.invoke({ sender: from, value, data })
        : '0x';
      this.commit(checkpoint);
      return { success: true, returnData };
    } catch (err) {
      this.revertTo(checkpoint);
      return { success: false, returnData: encodeRevertData(err), cause: err };
    }
  }

  async delegateCall(from: Address, target: Address, data: Hex): Promise<CallResult> {
    const checkpoint = this.checkpoint();
    try {
      const code = this.getCode(target);
      const returnData = isDelegateTarget(code)
        ? await code.invokeDelegated({ self: from, data, host: this })
        : '0x';
      this.commit(checkpoint);
      return { success: true, returnData };
    } catch (err) {
      this.revertTo(checkpoint);
      return { success: false, returnData: encodeRevertData(err), cause: err };
    }
  }

  async staticCall(from: Address, target: Address, data: Hex): Promise<CallResult> {
    const checkpoint = this.checkpoint();
    try {
      const code = this.getCode(target);
      const returnData = isContract(code)
        ? await code.invoke({ sender: from, value: 0n, data })
        : '0x';
      return { success: true, returnData };
    } catch (err) {
      return { success: false, returnData: encodeRevertData(err), cause: err };
    } finally {
      this.revertTo(checkpoint);
    }
  }

  private transfer(from: Address, to: Address, value: bigint): void {
    if (value === 0n) return;
    const balance = this.getBalance(from);
    if (balance < value) {
      throw new LatchkeyError(
        ErrorCode.INSUFFICIENT_BALANCE,
        `Insufficient balance: ${from} holds ${balance}, needs ${value}`,
      );
    }
    this.world.balances.set(key(from), balance - value);
    this.world.balances.set(key(to), this.getBalance(to) + value);
  }
}
