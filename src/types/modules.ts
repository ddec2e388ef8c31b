/**
 * Interfaces implemented by installable modules.
 *
 * Each method receives the calling account's address first, mirroring
 * `msg.sender` on the module side. A module rejects by throwing; the error
 * propagates to the account unwrapped.
 */
import type { Address, Hex } from 'viem';
import type { CallContext, Contract } from '../host/types.js';
import type { ModuleTypeId, UserOperation, ValidationData } from './account.js';

/** Lifecycle surface shared by every module */
export interface Module {
  /** Self-reported capability check */
  isModuleType(typeId: ModuleTypeId): boolean;
  onInstall(account: Address, data: Hex): Promise<void>;
  onUninstall(account: Address, data: Hex): Promise<void>;
}

export interface ValidatorModule extends Module {
  validateUserOp(account: Address, userOp: UserOperation, userOpHash: Hex): Promise<ValidationData>;
  /** Returns the ERC-1271 magic value on success, anything else on failure */
  isValidSignatureWithSender(account: Address, sender: Address, hash: Hex, signature: Hex): Promise<Hex>;
}

/** What a hook learns about the wrapped operation once it completed */
export interface HookOutcome {
  /** Indices of units that failed under TRY semantics */
  failedUnits: readonly number[];
}

export interface HookModule extends Module {
  /** Returns an opaque token handed back to {@link HookModule.postCheck} */
  preCheck(account: Address, context: CallContext): Promise<Hex>;
  postCheck(account: Address, hookData: Hex, outcome: HookOutcome): Promise<void>;
}

/** Fallback handlers are plain contracts called with the original sender appended */
export interface FallbackModule extends Module, Contract {}

/** A rewritten (challenge, authorization material) pair */
export interface HookedAuthorization {
  hash: Hex;
  signature: Hex;
}

export interface PreValidationHookERC4337Module extends Module {
  preValidationHookERC4337(
    account: Address,
    userOp: UserOperation,
    missingAccountFunds: bigint,
    userOpHash: Hex,
  ): Promise<HookedAuthorization>;
}

export interface PreValidationHookERC1271Module extends Module {
  preValidationHookERC1271(
    account: Address,
    sender: Address,
    hash: Hex,
    signature: Hex,
  ): Promise<HookedAuthorization>;
}

// ============================================================================
// Type guards
// ============================================================================

function hasMethods(code: unknown, ...names: string[]): boolean {
  if (typeof code !== 'object' || code === null) return false;
  // Reflect.get walks the prototype chain, where class methods live
  return names.every((name) => typeof Reflect.get(code, name) === 'function');
}

export function isModule(code: unknown): code is Module {
  return hasMethods(code, 'isModuleType', 'onInstall', 'onUninstall');
}

export function isValidatorModule(code: unknown): code is ValidatorModule {
  return isModule(code) && hasMethods(code, 'validateUserOp', 'isValidSignatureWithSender');
}

export function isHookModule(code: unknown): code is HookModule {
  return isModule(code) && hasMethods(code, 'preCheck', 'postCheck');
}

export function isFallbackModule(code: unknown): code is FallbackModule {
  return isModule(code) && hasMethods(code, 'invoke');
}

export function isPreValidationHookERC4337(code: unknown): code is PreValidationHookERC4337Module {
  return isModule(code) && hasMethods(code, 'preValidationHookERC4337');
}

export function isPreValidationHookERC1271(code: unknown): code is PreValidationHookERC1271Module {
  return isModule(code) && hasMethods(code, 'preValidationHookERC1271');
}
