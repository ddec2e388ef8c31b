import { getAddress, isAddressEqual, numberToHex, type Address } from 'viem';
import type { ValidationData } from '../../types/account.js';

const MAX_UINT48 = 0xffffffffffff;
const UINT48_MASK = (1n << 48n) - 1n;
const UINT160_MASK = (1n << 160n) - 1n;

/** Authorizer value that marks a signature failure */
export const SIG_VALIDATION_FAILED_AUTHORIZER: Address = '0x0000000000000000000000000000000000000001';

/** Unpacked ERC-4337 validation data */
export interface ValidationDataFields {
  /** Zero address on success, `0x…01` on signature failure, otherwise an aggregator */
  authorizer: Address;
  /** Last second the operation is valid; `0` in the packed form means "no expiry" */
  validUntil: number;
  /** First second the operation is valid */
  validAfter: number;
}

/**
 * Unpack `authorizer(160) | validUntil(48) << 160 | validAfter(48) << 208`.
 *
 * @example
 * ```typescript
 * const { validUntil } = parseValidationData(await account.validateUserOp(...));
 * ```
 */
export function parseValidationData(data: ValidationData): ValidationDataFields {
  const validUntil = Number((data >> 160n) & UINT48_MASK);
  return {
    authorizer: getAddress(numberToHex(data & UINT160_MASK, { size: 20 })),
    validUntil: validUntil === 0 ? MAX_UINT48 : validUntil,
    validAfter: Number((data >> 208n) & UINT48_MASK),
  };
}

export function packValidationData(fields: ValidationDataFields): ValidationData {
  const validUntil = fields.validUntil === MAX_UINT48 ? 0n : BigInt(fields.validUntil);
  return (
    BigInt(fields.authorizer) |
    ((validUntil & UINT48_MASK) << 160n) |
    ((BigInt(fields.validAfter) & UINT48_MASK) << 208n)
  );
}

/** Whether validation data reports a signature failure */
export function isSignatureFailure(data: ValidationData): boolean {
  return isAddressEqual(parseValidationData(data).authorizer, SIG_VALIDATION_FAILED_AUTHORIZER);
}

/**
 * Whether validation data is valid at `timestamp` (seconds) and carries no
 * signature failure.
 */
export function isValidAt(data: ValidationData, timestamp: number): boolean {
  const fields = parseValidationData(data);
  if (isAddressEqual(fields.authorizer, SIG_VALIDATION_FAILED_AUTHORIZER)) return false;
  return timestamp >= fields.validAfter && timestamp <= fields.validUntil;
}
