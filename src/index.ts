/**
 * latchkey
 *
 * Control core of a modular smart account: validator, executor, hook and
 * fallback modules decide who may act and what runs.
 *
 * @example
 * ```typescript
 * import { InMemoryHost, SmartAccount, MODULE_TYPE_VALIDATOR } from 'latchkey';
 *
 * const host = new InMemoryHost();
 * const account = new SmartAccount({ address: owner.address, host });
 * host.deploy(account.address, account);
 *
 * await account.installModule(account.entryPoint, MODULE_TYPE_VALIDATOR, validator, initData);
 * const verdict = await account.validateUserOp(account.entryPoint, userOp, userOpHash, 0n);
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Account
// ============================================================================

export { SmartAccount } from './core/SmartAccount.js';
export type { SmartAccountOptions } from './core/SmartAccount.js';
export { AccountState } from './core/AccountState.js';
export type { AccountStateSnapshot } from './core/AccountState.js';
export { smartAccountAbi, ACCOUNT_SELECTORS } from './core/abi.js';
export {
  encodeBootstrapConfig,
  decodeBootstrapConfig,
  emptyBootstrapConfig,
} from './core/bootstrap.js';
export type { BootstrapConfig, ModuleInit, PreValidationHookInit } from './core/bootstrap.js';
export { ACCOUNT_ID, ACCOUNT_VERSION } from './core/version.js';

// ============================================================================
// Configuration, events, telemetry
// ============================================================================

export { smartAccountConfigSchema, parseSmartAccountConfig } from './core/config.js';
export type { SmartAccountConfig, SmartAccountConfigInput } from './core/config.js';
export { loadEnvConfig } from './core/env.js';
export { LatchkeyEventEmitter } from './core/EventEmitter.js';
export type { LatchkeyEvents } from './core/EventEmitter.js';
export { Telemetry } from './core/Telemetry.js';
export type { TelemetryEvent, TelemetrySink } from './core/Telemetry.js';

// ============================================================================
// Errors
// ============================================================================

export { ErrorCode } from './errors/codes.js';
export { LatchkeyError, isLatchkeyError } from './errors/LatchkeyError.js';

// ============================================================================
// Execution host
// ============================================================================

export { InMemoryHost } from './host/InMemoryHost.js';
export { ContractRevert, encodeRevertData } from './host/revert.js';
export { isContract, isDelegateTarget } from './host/types.js';
export type {
  CallContext,
  CallResult,
  Contract,
  DelegateContext,
  DelegateTarget,
  ExecutionHost,
} from './host/types.js';

// ============================================================================
// Execution
// ============================================================================

export { decodeMode, encodeMode, isSupportedMode } from './modules/execution/mode.js';
export {
  encodeSingleExecution,
  decodeSingleExecution,
  encodeBatchExecution,
  decodeBatchExecution,
  encodeDelegateExecution,
  decodeDelegateExecution,
} from './modules/execution/codec.js';
export type {
  DecodedMode,
  ModeParts,
  ExecutionReport,
  DelegateExecution,
} from './modules/execution/types.js';

// ============================================================================
// Modules, registry, attestation
// ============================================================================

export { InMemoryModuleRegistry } from './modules/registry/InMemoryModuleRegistry.js';
export type {
  ModuleRegistry,
  ListCategory,
  FallbackBinding,
  RegistrySnapshot,
} from './modules/registry/types.js';
export type { ForcedRemoval } from './modules/lifecycle/types.js';
export { AttestationRegistry } from './modules/attestation/AttestationRegistry.js';
export { OpenAttestationGate, ThresholdAttestationGate } from './modules/attestation/AttestationGate.js';
export type { AttestationGate, ThresholdAttestationOptions } from './modules/attestation/types.js';

// ============================================================================
// Authorization helpers
// ============================================================================

export { validatorFromNonce } from './modules/authorization/AuthorizationEngine.js';
export {
  SIG_VALIDATION_FAILED_AUTHORIZER,
  parseValidationData,
  packValidationData,
  isSignatureFailure,
  isValidAt,
} from './modules/authorization/validation-data.js';
export type { ValidationDataFields } from './modules/authorization/validation-data.js';

// ============================================================================
// Types
// ============================================================================

export * from './types/account.js';
export * from './types/modules.js';
