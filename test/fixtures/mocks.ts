import {
  concat,
  getAddress,
  hexToBigInt,
  numberToHex,
  recoverAddress,
  recoverMessageAddress,
  size,
  type Address,
  type Hex,
} from 'viem';
import { privateKeyToAccount } from 'viem/accounts';
import { SmartAccount, type SmartAccountOptions } from '../../src/core/SmartAccount.js';
import { InMemoryHost } from '../../src/host/InMemoryHost.js';
import type { CallContext, Contract, DelegateContext, DelegateTarget } from '../../src/host/types.js';
import {
  ERC1271_INVALID,
  ERC1271_MAGIC_VALUE,
  MODULE_TYPE_EXECUTOR,
  MODULE_TYPE_FALLBACK,
  MODULE_TYPE_HOOK,
  MODULE_TYPE_PREVALIDATION_HOOK_ERC1271,
  MODULE_TYPE_PREVALIDATION_HOOK_ERC4337,
  MODULE_TYPE_VALIDATOR,
  type ModuleTypeId,
  type UserOperation,
  type ValidationData,
} from '../../src/types/account.js';
import type {
  FallbackModule,
  HookModule,
  HookOutcome,
  HookedAuthorization,
  Module,
  PreValidationHookERC1271Module,
  PreValidationHookERC4337Module,
  ValidatorModule,
} from '../../src/types/modules.js';

/** Placeholder keys; never funded anywhere */
export const OWNER = privateKeyToAccount(`0x${'11'.repeat(32)}`);
export const STRANGER = privateKeyToAccount(`0x${'22'.repeat(32)}`);

/** Fixed addresses used across tests (digits only, so checksumming leaves them unchanged) */
export const ADDR = {
  validatorA: '0x0000000000000000000000000000000000001001',
  validatorB: '0x0000000000000000000000000000000000001002',
  executor: '0x0000000000000000000000000000000000002001',
  fallback: '0x0000000000000000000000000000000000003001',
  hook: '0x0000000000000000000000000000000000004001',
  hookB: '0x0000000000000000000000000000000000004002',
  preHookA: '0x0000000000000000000000000000000000009001',
  preHookB: '0x0000000000000000000000000000000000009002',
  counter: '0x0000000000000000000000000000000000005001',
  reverter: '0x0000000000000000000000000000000000005002',
  writer: '0x0000000000000000000000000000000000005003',
  recipient: '0x0000000000000000000000000000000000006001',
  attester: '0x0000000000000000000000000000000000007001',
  empty: '0x0000000000000000000000000000000000008001',
  implementationA: '0x0000000000000000000000000000000000000101',
  implementationB: '0x0000000000000000000000000000000000000202',
} as const satisfies Record<string, Address>;

// ============================================================================
// Modules
// ============================================================================

/** Module that records its lifecycle calls */
export class MockModule implements Module {
  readonly installs: Array<{ account: Address; data: Hex }> = [];
  readonly uninstalls: Array<{ account: Address; data: Hex }> = [];
  /** When set, `onUninstall` throws after recording the call */
  failOnUninstall = false;

  constructor(private readonly types: readonly ModuleTypeId[]) {}

  isModuleType(typeId: ModuleTypeId): boolean {
    return this.types.includes(typeId);
  }

  async onInstall(account: Address, data: Hex): Promise<void> {
    this.installs.push({ account, data });
  }

  async onUninstall(account: Address, data: Hex): Promise<void> {
    this.uninstalls.push({ account, data });
    if (this.failOnUninstall) throw new Error('uninstall refused');
  }
}

/**
 * Validator that accepts signatures from the owner set at install time
 * (`initData` = owner address).
 */
export class OwnableValidator extends MockModule implements ValidatorModule {
  private readonly owners = new Map<string, Address>();
  /** (hash, signature) pairs this validator was asked about */
  readonly received: Array<{ hash: Hex; signature: Hex }> = [];
  /** Returned by `validateUserOp` instead of checking the signature */
  fixedVerdict: ValidationData | undefined;

  constructor() {
    super([MODULE_TYPE_VALIDATOR]);
  }

  override async onInstall(account: Address, data: Hex): Promise<void> {
    await super.onInstall(account, data);
    if (size(data) === 20) this.owners.set(account.toLowerCase(), getAddress(data));
  }

  async validateUserOp(account: Address, userOp: UserOperation, userOpHash: Hex): Promise<ValidationData> {
    this.received.push({ hash: userOpHash, signature: userOp.signature });
    if (this.fixedVerdict !== undefined) return this.fixedVerdict;
    try {
      const signer = await recoverMessageAddress({ message: { raw: userOpHash }, signature: userOp.signature });
      return this.isOwner(account, signer) ? 0n : 1n;
    } catch {
      return 1n;
    }
  }

  async isValidSignatureWithSender(account: Address, _sender: Address, hash: Hex, signature: Hex): Promise<Hex> {
    this.received.push({ hash, signature });
    try {
      const signer = await recoverAddress({ hash, signature });
      return this.isOwner(account, signer) ? ERC1271_MAGIC_VALUE : ERC1271_INVALID;
    } catch {
      return ERC1271_INVALID;
    }
  }

  private isOwner(account: Address, signer: Address): boolean {
    return this.owners.get(account.toLowerCase()) === getAddress(signer);
  }
}

export class MockExecutor extends MockModule {
  constructor() {
    super([MODULE_TYPE_EXECUTOR]);
  }
}

/** Hook that records every pre/post check, in order, into `log` */
export class RecordingHook extends MockModule implements HookModule {
  readonly log: string[] = [];
  readonly preChecks: CallContext[] = [];
  readonly postChecks: Array<{ hookData: Hex; outcome: HookOutcome }> = [];
  rejectPreCheck = false;
  rejectPostCheck = false;

  constructor(private readonly token: Hex = '0x7a6b') {
    super([MODULE_TYPE_HOOK]);
  }

  async preCheck(_account: Address, context: CallContext): Promise<Hex> {
    this.log.push('pre');
    this.preChecks.push(context);
    if (this.rejectPreCheck) throw new Error('preCheck rejected');
    return this.token;
  }

  async postCheck(_account: Address, hookData: Hex, outcome: HookOutcome): Promise<void> {
    this.log.push('post');
    this.postChecks.push({ hookData, outcome: { failedUnits: [...outcome.failedUnits] } });
    if (this.rejectPostCheck) throw new Error('postCheck rejected');
  }
}

/**
 * Pre-validation hook for both surfaces that appends `tag` to the
 * authorization material and leaves the hash alone.
 */
export class TaggingPreValidationHook
  extends MockModule
  implements PreValidationHookERC4337Module, PreValidationHookERC1271Module
{
  readonly seen: Array<{ hash: Hex; signature: Hex }> = [];

  constructor(private readonly tag: Hex) {
    super([MODULE_TYPE_PREVALIDATION_HOOK_ERC1271, MODULE_TYPE_PREVALIDATION_HOOK_ERC4337]);
  }

  async preValidationHookERC4337(
    _account: Address,
    userOp: UserOperation,
    _missingAccountFunds: bigint,
    userOpHash: Hex,
  ): Promise<HookedAuthorization> {
    this.seen.push({ hash: userOpHash, signature: userOp.signature });
    return { hash: userOpHash, signature: concat([userOp.signature, this.tag]) };
  }

  async preValidationHookERC1271(
    _account: Address,
    _sender: Address,
    hash: Hex,
    signature: Hex,
  ): Promise<HookedAuthorization> {
    this.seen.push({ hash, signature });
    return { hash, signature: concat([signature, this.tag]) };
  }
}

/** Fallback handler that returns the calldata it was forwarded */
export class EchoFallback extends MockModule implements FallbackModule {
  readonly calls: CallContext[] = [];

  constructor() {
    super([MODULE_TYPE_FALLBACK]);
  }

  async invoke(ctx: CallContext): Promise<Hex> {
    this.calls.push(ctx);
    return ctx.data;
  }
}

// ============================================================================
// Call targets
// ============================================================================

export const COUNTER_SLOT: Hex = '0x00';

/** Increments a counter in host storage; returns the new count as uint256 */
export class CounterContract implements Contract {
  readonly senders: Address[] = [];

  constructor(
    private readonly host: InMemoryHost,
    private readonly address: Address,
  ) {}

  async invoke(ctx: CallContext): Promise<Hex> {
    this.senders.push(ctx.sender);
    const next = this.count() + 1n;
    this.host.setStorage(this.address, COUNTER_SLOT, numberToHex(next, { size: 32 }));
    return numberToHex(next, { size: 32 });
  }

  count(): bigint {
    const raw = this.host.getStorage(this.address, COUNTER_SLOT);
    return raw === '0x' ? 0n : hexToBigInt(raw);
  }
}

/** Always throws the error it was built with */
export class RevertingContract implements Contract {
  constructor(readonly error: Error = new Error('always reverts')) {}

  async invoke(_ctx: CallContext): Promise<Hex> {
    throw this.error;
  }
}

export const WRITER_SLOT: Hex = '0x01';

/** Delegate target that stores its calldata in the caller's storage */
export class StorageWriter implements DelegateTarget {
  constructor(private readonly host: InMemoryHost) {}

  async invokeDelegated(ctx: DelegateContext): Promise<Hex> {
    if (ctx.data === '0xdead') throw new Error('writer refused');
    this.host.setStorage(ctx.self, WRITER_SLOT, ctx.data);
    return ctx.data;
  }
}

// ============================================================================
// Account setup
// ============================================================================

export interface AccountFixture {
  host: InMemoryHost;
  account: SmartAccount;
  entryPoint: Address;
  validatorA: OwnableValidator;
  validatorB: OwnableValidator;
  executor: MockExecutor;
  hook: RecordingHook;
  fallback: EchoFallback;
  counter: CounterContract;
}

/**
 * A fresh account living at {@link OWNER}'s address, with the mock modules
 * and call targets deployed but nothing installed.
 */
export function createAccountFixture(
  options: Partial<Omit<SmartAccountOptions, 'host'>> = {},
): AccountFixture {
  const host = new InMemoryHost();
  const account = new SmartAccount({ address: OWNER.address, telemetry: false, ...options, host });
  host.deploy(account.address, account);

  const validatorA = new OwnableValidator();
  const validatorB = new OwnableValidator();
  const executor = new MockExecutor();
  const hook = new RecordingHook();
  const fallback = new EchoFallback();
  const counter = new CounterContract(host, ADDR.counter);

  host.deploy(ADDR.validatorA, validatorA);
  host.deploy(ADDR.validatorB, validatorB);
  host.deploy(ADDR.executor, executor);
  host.deploy(ADDR.hook, hook);
  host.deploy(ADDR.fallback, fallback);
  host.deploy(ADDR.counter, counter);
  host.deploy(ADDR.reverter, new RevertingContract());
  host.deploy(ADDR.writer, new StorageWriter(host));

  return {
    host,
    account,
    entryPoint: account.entryPoint,
    validatorA,
    validatorB,
    executor,
    hook,
    fallback,
    counter,
  };
}

/** A user operation with every field zeroed */
export function createUserOp(overrides: Partial<UserOperation> = {}): UserOperation {
  return {
    sender: OWNER.address,
    nonce: 0n,
    initCode: '0x',
    callData: '0x',
    accountGasLimits: `0x${'00'.repeat(32)}`,
    preVerificationGas: 0n,
    gasFees: `0x${'00'.repeat(32)}`,
    paymasterAndData: '0x',
    signature: '0x',
    ...overrides,
  };
}

/** Nonce that routes a user operation to `validator` (key in the high 160 bits) */
export function nonceFor(validator: Address, sequence = 0n): bigint {
  return (hexToBigInt(validator) << 96n) | sequence;
}

/** Run `fn` and return what it threw, or `undefined` */
export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}
