import { AsyncLocalStorage } from 'node:async_hooks';
import {
  decodeFunctionData,
  encodeFunctionData,
  encodeFunctionResult,
  isAddressEqual,
  size,
  slice,
  type Address,
  type Hex,
} from 'viem';
import { ErrorCode } from '../errors/codes.js';
import { LatchkeyError } from '../errors/LatchkeyError.js';
import type { CallContext, Contract, ExecutionHost } from '../host/types.js';
import { OpenAttestationGate } from '../modules/attestation/AttestationGate.js';
import type { AttestationGate } from '../modules/attestation/types.js';
import { AuthorizationEngine } from '../modules/authorization/AuthorizationEngine.js';
import { ExecutionEngine } from '../modules/execution/ExecutionEngine.js';
import { decodeMode, isSupportedMode } from '../modules/execution/mode.js';
import type { ExecutionReport } from '../modules/execution/types.js';
import { FallbackRouter } from '../modules/fallback/FallbackRouter.js';
import { HookWrapper } from '../modules/hooks/HookWrapper.js';
import { ModuleLifecycleRouter } from '../modules/lifecycle/ModuleLifecycleRouter.js';
import type { ForcedRemoval } from '../modules/lifecycle/types.js';
import { RedelegationGuard } from '../modules/redelegation/RedelegationGuard.js';
import { InMemoryModuleRegistry } from '../modules/registry/InMemoryModuleRegistry.js';
import type { ModuleRegistry } from '../modules/registry/types.js';
import {
  MODULE_TYPE_EXECUTOR,
  MODULE_TYPE_FALLBACK,
  MODULE_TYPE_HOOK,
  MODULE_TYPE_VALIDATOR,
  SUPPORTED_MODULE_TYPES,
  type ExecutionMode,
  type ModuleTypeId,
  type UserOperation,
  type ValidationData,
} from '../types/account.js';
import { lowerHex, tail } from '../utils/hex.js';
import { ACCOUNT_SELECTORS, smartAccountAbi } from './abi.js';
import { AccountState } from './AccountState.js';
import { decodeBootstrapConfig, type BootstrapConfig } from './bootstrap.js';
import { parseSmartAccountConfig, type SmartAccountConfig, type SmartAccountConfigInput } from './config.js';
import type { AccountContext } from './context.js';
import { loadEnvConfig } from './env.js';
import { LatchkeyEventEmitter } from './EventEmitter.js';
import { EventQueue } from './EventQueue.js';
import { Telemetry, type TelemetrySink } from './Telemetry.js';
import { ACCOUNT_ID } from './version.js';

/**
 * Options for {@link SmartAccount}. Serializable fields fall back to
 * `LATCHKEY_*` environment variables, then to defaults.
 */
export interface SmartAccountOptions extends Partial<SmartAccountConfigInput> {
  /** World the account executes in */
  host: ExecutionHost;
  /** Module storage; defaults to an empty in-memory registry */
  registry?: ModuleRegistry;
  /**
   * Existing account state to continue from, e.g. storage that survived a
   * re-delegation. Takes precedence over `registry`.
   */
  state?: AccountState;
  /** Veto over installs and executor calls; defaults to allowing everything */
  gate?: AttestationGate;
  /** Emitter account events are delivered to */
  emitter?: LatchkeyEventEmitter;
  /** Receiver of flushed telemetry batches */
  telemetrySink?: TelemetrySink;
}

/**
 * A modular smart account.
 *
 * Authorization decisions go to installed validator modules, execution
 * requests are dispatched by mode, and every privileged entry point is
 * bracketed by the installed hook. Each privileged call is one atomic
 * invocation: when it throws, registry changes, host balance and storage
 * changes and queued events are all rolled back.
 *
 * The first argument of every privileged method is the caller, i.e. the
 * party that would be `msg.sender`.
 *
 * @example
 * ```typescript
 * const host = new InMemoryHost();
 * const account = new SmartAccount({ address: owner.address, host });
 * host.deploy(account.address, account);
 *
 * await account.initializeAccount(account.address, {
 *   validators: [{ module: ownableValidator, initData: encodeOwner(owner.address) }],
 *   executors: [],
 *   fallbacks: [],
 *   preValidationHooks: [],
 * });
 *
 * await account.execute(
 *   account.entryPoint,
 *   encodeMode({ callType: CALLTYPE_BATCH, execType: EXECTYPE_TRY }),
 *   encodeBatchExecution([{ target, value: 0n, callData: '0x' }]),
 * );
 * ```
 */
export class SmartAccount implements Contract {
  private readonly config: SmartAccountConfig;
  private readonly host: ExecutionHost;
  private readonly emitter: LatchkeyEventEmitter;
  private readonly queue: EventQueue;
  private readonly telemetry: Telemetry;
  private readonly gate: AttestationGate;

  /** Account state; shared by reference with every engine */
  readonly state: AccountState;

  private readonly execution: ExecutionEngine;
  private readonly lifecycle: ModuleLifecycleRouter;
  private readonly authorization: AuthorizationEngine;
  private readonly hooks: HookWrapper;
  private readonly redelegation: RedelegationGuard;
  private readonly fallback: FallbackRouter;

  private depth = 0;
  /** Set for the async flow of a running frame; nested self-calls see it */
  private readonly activeFrame = new AsyncLocalStorage<true>();
  /** Settles when the last queued top-level invocation has finished */
  private idle: Promise<void> = Promise.resolve();

  constructor(options: SmartAccountOptions) {
    const { host, registry, state, gate, emitter, telemetrySink } = options;
    this.config = parseSmartAccountConfig({ ...loadEnvConfig(), ...explicitConfig(options) });

    this.host = host;
    this.state = state ?? new AccountState(registry ?? new InMemoryModuleRegistry());
    this.emitter = emitter ?? new LatchkeyEventEmitter();
    this.queue = new EventQueue(this.emitter);
    this.telemetry = new Telemetry(this.config.telemetry, telemetrySink);

    const ctx: AccountContext = {
      address: this.config.address,
      entryPoint: this.config.entryPoint,
      host,
      state: this.state,
      gate: gate ?? new OpenAttestationGate(),
      events: this.queue,
      telemetry: this.telemetry,
    };

    this.execution = new ExecutionEngine(ctx);
    this.lifecycle = new ModuleLifecycleRouter(ctx);
    this.authorization = new AuthorizationEngine(ctx);
    this.hooks = new HookWrapper(ctx);
    this.redelegation = new RedelegationGuard(ctx, this.lifecycle);
    this.fallback = new FallbackRouter(ctx);
    this.gate = ctx.gate;
  }

  // ===========================================================================
  // Identity and capability queries
  // ===========================================================================

  get address(): Address {
    return this.config.address;
  }

  get entryPoint(): Address {
    return this.config.entryPoint;
  }

  /** Emitter that receives committed account events */
  get events(): LatchkeyEventEmitter {
    return this.emitter;
  }

  /** `vendor.variant.version` identifier */
  accountId(): string {
    return ACCOUNT_ID;
  }

  supportsExecutionMode(mode: ExecutionMode): boolean {
    return isSupportedMode(mode);
  }

  supportsModule(moduleTypeId: ModuleTypeId): boolean {
    return SUPPORTED_MODULE_TYPES.includes(moduleTypeId);
  }

  /**
   * @param additionalContext - For fallback handlers, the 4-byte selector being queried
   */
  isModuleInstalled(moduleTypeId: ModuleTypeId, module: Address, additionalContext: Hex = '0x'): boolean {
    return this.lifecycle.isInstalled(moduleTypeId, module, additionalContext);
  }

  isInitialized(): boolean {
    return this.state.initialized;
  }

  /** Hand buffered telemetry to the configured sink */
  flushTelemetry(): void {
    this.telemetry.flush();
  }

  // ===========================================================================
  // Execution
  // ===========================================================================

  /**
   * Execute on behalf of the coordinator or the account itself.
   */
  async execute(sender: Address, mode: ExecutionMode, executionCalldata: Hex): Promise<void> {
    await this.runExecute(
      this.frame(sender, encodeFunctionData({ abi: smartAccountAbi, functionName: 'execute', args: [mode, executionCalldata] })),
      mode,
      executionCalldata,
    );
  }

  /**
   * Execute on behalf of an installed executor module.
   *
   * @returns Return data for every executed unit
   */
  async executeFromExecutor(sender: Address, mode: ExecutionMode, executionCalldata: Hex): Promise<Hex[]> {
    return this.runExecuteFromExecutor(
      this.frame(
        sender,
        encodeFunctionData({ abi: smartAccountAbi, functionName: 'executeFromExecutor', args: [mode, executionCalldata] }),
      ),
      mode,
      executionCalldata,
    );
  }

  /**
   * Run a user operation's calldata against the account's own entry points,
   * keeping the coordinator as the caller. The 4-byte selector of
   * `userOp.callData` is skipped. No hook runs around the call itself.
   *
   * @throws LatchkeyError EXECUTION_FAILED wrapping whatever the payload threw
   */
  async executeUserOp(sender: Address, userOp: UserOperation, _userOpHash: Hex): Promise<void> {
    this.requireEntryPoint(sender);
    this.telemetry.track('account.executeUserOp');

    await this.invocation(async () => {
      try {
        await this.invoke({ sender, value: 0n, data: tail(userOp.callData, 4) });
      } catch (err) {
        throw new LatchkeyError(ErrorCode.EXECUTION_FAILED, 'User operation execution failed', { cause: err });
      }
    });
  }

  // ===========================================================================
  // Module lifecycle
  // ===========================================================================

  async installModule(sender: Address, moduleTypeId: ModuleTypeId, module: Address, initData: Hex): Promise<void> {
    await this.runInstall(
      this.frame(
        sender,
        encodeFunctionData({ abi: smartAccountAbi, functionName: 'installModule', args: [moduleTypeId, module, initData] }),
      ),
      moduleTypeId,
      module,
      initData,
    );
  }

  async uninstallModule(sender: Address, moduleTypeId: ModuleTypeId, module: Address, deInitData: Hex): Promise<void> {
    await this.runUninstall(
      this.frame(
        sender,
        encodeFunctionData({ abi: smartAccountAbi, functionName: 'uninstallModule', args: [moduleTypeId, module, deInitData] }),
      ),
      moduleTypeId,
      module,
      deInitData,
    );
  }

  /**
   * One-time setup: runs the re-delegation check, installs the bootstrap
   * modules and closes the self-signature bootstrap path for good.
   *
   * A second call fails unless the account was re-delegated in between, in
   * which case the previous trust is purged and the new modules installed.
   */
  async initializeAccount(sender: Address, initData: Hex | BootstrapConfig): Promise<void> {
    this.requireEntryPointOrSelf(sender);
    this.telemetry.track('account.initialize');

    await this.invocation(async () => {
      const redelegated = await this.redelegation.checkOnInitialize();
      if (this.state.initialized && !redelegated) {
        throw new LatchkeyError(ErrorCode.ACCOUNT_ALREADY_INITIALIZED, `Account ${this.address} is already initialized`);
      }

      const config = typeof initData === 'string' ? decodeBootstrapConfig(initData) : initData;
      for (const { module, initData: data } of config.validators) {
        await this.lifecycle.install(MODULE_TYPE_VALIDATOR, module, data);
      }
      for (const { module, initData: data } of config.executors) {
        await this.lifecycle.install(MODULE_TYPE_EXECUTOR, module, data);
      }
      if (config.hook) {
        await this.lifecycle.install(MODULE_TYPE_HOOK, config.hook.module, config.hook.initData);
      }
      for (const { module, initData: data } of config.fallbacks) {
        await this.lifecycle.install(MODULE_TYPE_FALLBACK, module, data);
      }
      for (const { moduleTypeId, module, initData: data } of config.preValidationHooks) {
        await this.lifecycle.install(moduleTypeId, module, data);
      }

      this.state.initialized = true;
      this.queue.queue('account.initialized', {
        account: this.address,
        implementation: this.state.implementation,
      });
    });
  }

  /**
   * Callback for an account whose delegation was repointed: removes every
   * validator, executor and the hook, tolerating modules that fail to
   * uninstall.
   */
  async onRedelegation(sender: Address): Promise<ForcedRemoval[]> {
    this.requireEntryPointOrSelf(sender);
    return this.invocation(() => this.redelegation.purge());
  }

  // ===========================================================================
  // Authorization
  // ===========================================================================

  /**
   * ERC-4337 validation, coordinator only.
   *
   * @returns `0n` on success, `1n` on failure, or module-specific packed validation data
   */
  async validateUserOp(
    sender: Address,
    userOp: UserOperation,
    userOpHash: Hex,
    missingAccountFunds: bigint,
  ): Promise<ValidationData> {
    this.requireEntryPoint(sender);
    this.telemetry.track('account.validateUserOp');
    return this.invocation(() =>
      this.authorization.validateUserOp(userOp, userOpHash, missingAccountFunds),
    );
  }

  /**
   * ERC-1271 signature check. `signature` is `validator(20) ‖ material`.
   */
  async isValidSignature(sender: Address, hash: Hex, signature: Hex): Promise<Hex> {
    this.telemetry.track('account.isValidSignature');
    return this.staticInvocation(() => this.authorization.isValidSignature(sender, hash, signature));
  }

  // ===========================================================================
  // ABI entry
  // ===========================================================================

  /**
   * Entry for calls routed through the execution host, including the
   * account calling itself. Calldata shorter than a selector is a plain
   * value transfer; unknown selectors go to fallback handlers.
   */
  async invoke(call: CallContext): Promise<Hex> {
    if (size(call.data) < 4) return '0x';

    const selector = lowerHex(slice(call.data, 0, 4));
    if (!ACCOUNT_SELECTORS.has(selector)) {
      return this.invocation(() => this.hooks.wrap(call, () => this.fallback.route(call)));
    }

    const decoded = decodeFunctionData({ abi: smartAccountAbi, data: call.data });
    switch (decoded.functionName) {
      case 'execute':
        await this.runExecute(call, ...decoded.args);
        return '0x';
      case 'executeFromExecutor':
        return encodeFunctionResult({
          abi: smartAccountAbi,
          functionName: 'executeFromExecutor',
          result: await this.runExecuteFromExecutor(call, ...decoded.args),
        });
      case 'installModule':
        await this.runInstall(call, ...decoded.args);
        return '0x';
      case 'uninstallModule':
        await this.runUninstall(call, ...decoded.args);
        return '0x';
      case 'initializeAccount':
        await this.initializeAccount(call.sender, decoded.args[0]);
        return '0x';
      case 'onRedelegation':
        await this.onRedelegation(call.sender);
        return '0x';
      case 'isModuleInstalled':
        return encodeFunctionResult({
          abi: smartAccountAbi,
          functionName: 'isModuleInstalled',
          result: this.isModuleInstalled(...decoded.args),
        });
      case 'supportsModule':
        return encodeFunctionResult({
          abi: smartAccountAbi,
          functionName: 'supportsModule',
          result: this.supportsModule(decoded.args[0]),
        });
      case 'supportsExecutionMode':
        return encodeFunctionResult({
          abi: smartAccountAbi,
          functionName: 'supportsExecutionMode',
          result: this.supportsExecutionMode(decoded.args[0]),
        });
      case 'accountId':
        return encodeFunctionResult({ abi: smartAccountAbi, functionName: 'accountId', result: this.accountId() });
      case 'isValidSignature':
        return encodeFunctionResult({
          abi: smartAccountAbi,
          functionName: 'isValidSignature',
          result: await this.isValidSignature(call.sender, ...decoded.args),
        });
    }
  }

  // ===========================================================================
  // Guarded bodies
  // ===========================================================================

  private async runExecute(call: CallContext, mode: ExecutionMode, executionCalldata: Hex): Promise<void> {
    this.requireEntryPointOrSelf(call.sender);
    this.telemetry.track('account.execute', { callType: decodeMode(mode).callType.slice(2) });

    await this.invocation(() =>
      this.hooks.wrap(call, () => this.execution.dispatch(mode, executionCalldata), failuresOf),
    );
  }

  private async runExecuteFromExecutor(call: CallContext, mode: ExecutionMode, executionCalldata: Hex): Promise<Hex[]> {
    this.telemetry.track('account.executeFromExecutor', { callType: decodeMode(mode).callType.slice(2) });

    const report = await this.invocation(async () => {
      await this.requireExecutor(call.sender);
      return this.hooks.wrap(call, () => this.execution.dispatch(mode, executionCalldata), failuresOf);
    });
    return report.returnData;
  }

  private async runInstall(call: CallContext, moduleTypeId: ModuleTypeId, module: Address, initData: Hex): Promise<void> {
    this.requireEntryPointOrSelf(call.sender);
    await this.invocation(() =>
      this.hooks.wrap(call, () => this.lifecycle.install(moduleTypeId, module, initData)),
    );
  }

  private async runUninstall(call: CallContext, moduleTypeId: ModuleTypeId, module: Address, deInitData: Hex): Promise<void> {
    this.requireEntryPointOrSelf(call.sender);
    await this.invocation(() =>
      this.hooks.wrap(call, () => this.lifecycle.uninstall(moduleTypeId, module, deInitData)),
    );
  }

  // ===========================================================================
  // Access control
  // ===========================================================================

  private requireEntryPoint(sender: Address): void {
    if (!isAddressEqual(sender, this.entryPoint)) {
      throw new LatchkeyError(ErrorCode.ACCESS_UNAUTHORIZED, `Caller ${sender} is not the entry point`);
    }
  }

  private requireEntryPointOrSelf(sender: Address): void {
    if (!isAddressEqual(sender, this.entryPoint) && !isAddressEqual(sender, this.address)) {
      throw new LatchkeyError(
        ErrorCode.ACCESS_UNAUTHORIZED,
        `Caller ${sender} is neither the entry point nor the account`,
      );
    }
  }

  private async requireExecutor(sender: Address): Promise<void> {
    if (!this.state.registry.exists('executor', sender)) {
      throw new LatchkeyError(ErrorCode.INVALID_MODULE, `Caller ${sender} is not an installed executor`, {
        module: sender,
      });
    }
    await this.gate.check(sender, MODULE_TYPE_EXECUTOR);
  }

  // ===========================================================================
  // Invocation frames
  // ===========================================================================

  private frame(sender: Address, data: Hex): CallContext {
    return { sender, value: 0n, data };
  }

  /**
   * Run `body` atomically. Nested frames roll back on their own; events
   * reach listeners when the outermost frame completes.
   */
  private invocation<T>(body: () => Promise<T>): Promise<T> {
    return this.serialized(() => this.runFrame(body, true));
  }

  /** Run `body` in a frame whose effects are always rolled back */
  private staticInvocation<T>(body: () => Promise<T>): Promise<T> {
    return this.serialized(() => this.runFrame(body, false));
  }

  /**
   * Top-level invocations share the host's checkpoint stack, so they run one
   * at a time in arrival order. Calls made from inside a running frame
   * (self-calls through the host) join that frame instead of queueing.
   */
  private serialized<T>(task: () => Promise<T>): Promise<T> {
    if (this.activeFrame.getStore()) return task();

    const run = this.idle.then(() => this.activeFrame.run(true, task));
    // The caller observes the outcome through `run`; the queue only waits for it.
    this.idle = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async runFrame<T>(body: () => Promise<T>, keep: boolean): Promise<T> {
    const checkpoint = this.host.checkpoint();
    const snapshot = this.state.snapshot();
    const mark = this.queue.mark();
    this.depth += 1;
    let committed = false;
    try {
      const result = await body();
      if (keep) {
        this.host.commit(checkpoint);
        committed = true;
      }
      return result;
    } finally {
      if (!committed) {
        this.host.revertTo(checkpoint);
        this.state.restore(snapshot);
        this.queue.discard(mark);
      }
      this.depth -= 1;
      if (this.depth === 0) this.queue.flush();
    }
  }
}

/** Serializable options the caller actually set, so env values fill the rest */
function explicitConfig(options: SmartAccountOptions): Partial<SmartAccountConfigInput> {
  const config: Partial<SmartAccountConfigInput> = {};
  if (options.address !== undefined) config.address = options.address;
  if (options.entryPoint !== undefined) config.entryPoint = options.entryPoint;
  if (options.telemetry !== undefined) config.telemetry = options.telemetry;
  return config;
}

function failuresOf(report: ExecutionReport): { failedUnits: readonly number[] } {
  return { failedUnits: report.failedUnits };
}
