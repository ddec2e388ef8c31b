import { getAddress, isAddress, type Address } from 'viem';
import { z } from 'zod';
import { ErrorCode } from '../errors/codes.js';
import { LatchkeyError } from '../errors/LatchkeyError.js';
import { ENTRY_POINT_V07 } from '../types/account.js';

const addressSchema = z
  .string()
  .refine((value) => isAddress(value, { strict: false }), { message: 'Invalid address' })
  .transform((value): Address => getAddress(value));

/**
 * Schema for the serializable part of an account's configuration.
 */
export const smartAccountConfigSchema = z.object({
  /** Address the account lives at (the delegating EOA under EIP-7702) */
  address: addressSchema,
  /** Coordinator allowed to validate and submit user operations */
  entryPoint: addressSchema.default(ENTRY_POINT_V07),
  /** Collect anonymized operation counters */
  telemetry: z.boolean().default(true),
});

/** Input accepted for account configuration, before defaults apply */
export type SmartAccountConfigInput = z.input<typeof smartAccountConfigSchema>;

/** Validated account configuration */
export type SmartAccountConfig = z.output<typeof smartAccountConfigSchema>;

/**
 * Validate raw configuration and apply defaults.
 *
 * @throws LatchkeyError INVALID_CONFIG listing every failing field
 */
export function parseSmartAccountConfig(input: Partial<SmartAccountConfigInput>): SmartAccountConfig {
  const result = smartAccountConfigSchema.safeParse(input);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new LatchkeyError(ErrorCode.INVALID_CONFIG, `Invalid account config: ${detail}`);
  }
  return result.data;
}
