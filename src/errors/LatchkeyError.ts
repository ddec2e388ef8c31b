import type { Address } from 'viem';
import { ErrorCode } from './codes.js';

/**
 * Base error class for all Latchkey errors.
 *
 * Every error carries a structured {@link ErrorCode} for programmatic handling.
 * Errors raised by call targets and modules are never wrapped in a
 * `LatchkeyError`; they propagate as thrown.
 *
 * @example
 * ```typescript
 * try {
 *   await account.installModule(entryPoint, MODULE_TYPE_VALIDATOR, validator, '0x');
 * } catch (err) {
 *   if (err instanceof LatchkeyError && err.code === ErrorCode.MISMATCH_MODULE_TYPE_ID) {
 *     console.error(err.module, err.message);
 *   }
 * }
 * ```
 */
export class LatchkeyError extends Error {
  /** Structured error code for programmatic handling */
  public readonly code: ErrorCode;

  /** Module address the error refers to, if any */
  public readonly module?: Address | undefined;

  constructor(
    code: ErrorCode,
    message: string,
    opts?: { module?: Address; cause?: unknown },
  ) {
    super(message, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = 'LatchkeyError';
    this.code = code;
    this.module = opts?.module;

    // Maintains proper stack trace for where our error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LatchkeyError);
    }
  }
}

/**
 * Narrow an unknown thrown value to a {@link LatchkeyError} with the given code.
 */
export function isLatchkeyError(err: unknown, code?: ErrorCode): err is LatchkeyError {
  return err instanceof LatchkeyError && (code === undefined || err.code === code);
}
