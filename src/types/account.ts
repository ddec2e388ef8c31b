/**
 * Shared account-level types and wire constants.
 */
import type { Address, Hex } from 'viem';

export type { Address, Hex };

// ============================================================================
// Module categories
// ============================================================================

export const MODULE_TYPE_VALIDATOR = 1n;
export const MODULE_TYPE_EXECUTOR = 2n;
export const MODULE_TYPE_FALLBACK = 3n;
export const MODULE_TYPE_HOOK = 4n;
/** Pre-validation hook applied on the direct signature (ERC-1271) surface */
export const MODULE_TYPE_PREVALIDATION_HOOK_ERC1271 = 8n;
/** Pre-validation hook applied on the transaction (ERC-4337) surface */
export const MODULE_TYPE_PREVALIDATION_HOOK_ERC4337 = 9n;

/** Every module category the account knows how to install */
export const SUPPORTED_MODULE_TYPES: readonly ModuleTypeId[] = [
  MODULE_TYPE_VALIDATOR,
  MODULE_TYPE_EXECUTOR,
  MODULE_TYPE_FALLBACK,
  MODULE_TYPE_HOOK,
  MODULE_TYPE_PREVALIDATION_HOOK_ERC1271,
  MODULE_TYPE_PREVALIDATION_HOOK_ERC4337,
];

/** Numeric module category identifier; unknown values are representable but unsupported */
export type ModuleTypeId = bigint;

/** Closed set of module categories handled by the lifecycle router */
export type ModuleCategory =
  | 'validator'
  | 'executor'
  | 'fallback'
  | 'hook'
  | 'preValidationHookERC1271'
  | 'preValidationHookERC4337';

/**
 * Map a module type id to its category, or `undefined` for unsupported ids.
 */
export function toModuleCategory(typeId: ModuleTypeId): ModuleCategory | undefined {
  switch (typeId) {
    case MODULE_TYPE_VALIDATOR:
      return 'validator';
    case MODULE_TYPE_EXECUTOR:
      return 'executor';
    case MODULE_TYPE_FALLBACK:
      return 'fallback';
    case MODULE_TYPE_HOOK:
      return 'hook';
    case MODULE_TYPE_PREVALIDATION_HOOK_ERC1271:
      return 'preValidationHookERC1271';
    case MODULE_TYPE_PREVALIDATION_HOOK_ERC4337:
      return 'preValidationHookERC4337';
    default:
      return undefined;
  }
}

// ============================================================================
// Execution modes
// ============================================================================

/** A single-byte call type, as found in byte 0 of an execution mode */
export type CallType = Hex;
/** A single-byte exec type, as found in byte 1 of an execution mode */
export type ExecType = Hex;
/** 32-byte packed execution mode */
export type ExecutionMode = Hex;

export const CALLTYPE_SINGLE: CallType = '0x00';
export const CALLTYPE_BATCH: CallType = '0x01';
export const CALLTYPE_STATIC: CallType = '0xfe';
export const CALLTYPE_DELEGATECALL: CallType = '0xff';

export const EXECTYPE_DEFAULT: ExecType = '0x00';
export const EXECTYPE_TRY: ExecType = '0x01';

/** One (target, value, callData) unit of work */
export interface Execution {
  target: Address;
  value: bigint;
  callData: Hex;
}

// ============================================================================
// Authorization
// ============================================================================

/**
 * Packed ERC-4337 v0.7 user operation, as handed to the account by the entry point.
 */
export interface UserOperation {
  sender: Address;
  nonce: bigint;
  initCode: Hex;
  callData: Hex;
  accountGasLimits: Hex;
  preVerificationGas: bigint;
  gasFees: Hex;
  paymasterAndData: Hex;
  signature: Hex;
}

/** Validation data returned by `validateUserOp`; module-specific packed values pass through */
export type ValidationData = bigint;

export const VALIDATION_SUCCESS: ValidationData = 0n;
export const VALIDATION_FAILED: ValidationData = 1n;

/** ERC-1271 magic value returned on a valid signature */
export const ERC1271_MAGIC_VALUE: Hex = '0x1626ba7e';
/** ERC-1271 failure value */
export const ERC1271_INVALID: Hex = '0xffffffff';

/** Canonical ERC-4337 v0.7 entry point */
export const ENTRY_POINT_V07: Address = '0x0000000071727De22E5E9d8BAf0edAc6f37da032';

export const ZERO_ADDRESS: Address = '0x0000000000000000000000000000000000000000';
