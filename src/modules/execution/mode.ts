import { concat, pad, size, slice } from 'viem';
import { ErrorCode } from '../../errors/codes.js';
import { LatchkeyError } from '../../errors/LatchkeyError.js';
import {
  CALLTYPE_BATCH,
  CALLTYPE_DELEGATECALL,
  CALLTYPE_SINGLE,
  EXECTYPE_DEFAULT,
  EXECTYPE_TRY,
  type CallType,
  type ExecType,
  type ExecutionMode,
} from '../../types/account.js';
import { lowerHex } from '../../utils/hex.js';
import type { DecodedMode, ModeParts } from './types.js';

const MODE_SIZE = 32;
const MODE_PAYLOAD_SIZE = 22;

const SUPPORTED_CALL_TYPES: readonly CallType[] = [CALLTYPE_SINGLE, CALLTYPE_BATCH, CALLTYPE_DELEGATECALL];
const SUPPORTED_EXEC_TYPES: readonly ExecType[] = [EXECTYPE_DEFAULT, EXECTYPE_TRY];

/**
 * Split a packed execution mode into its fields.
 *
 * Layout: `callType(1) ‖ execType(1) ‖ unused(4) ‖ modeSelector(4) ‖ modePayload(22)`.
 * Shorter inputs are right-padded with zeros. Any byte value decodes;
 * unsupported call and exec types are rejected by the dispatcher.
 */
export function decodeMode(mode: ExecutionMode): DecodedMode {
  if (size(mode) > MODE_SIZE) {
    throw new LatchkeyError(
      ErrorCode.INVALID_EXECUTION_PAYLOAD,
      `Execution mode must be at most ${MODE_SIZE} bytes, got ${size(mode)}`,
    );
  }
  const normalized = lowerHex(pad(mode, { dir: 'right', size: MODE_SIZE }));
  return {
    callType: slice(normalized, 0, 1),
    execType: slice(normalized, 1, 2),
    modeSelector: slice(normalized, 6, 10),
    modePayload: slice(normalized, 10, 32),
  };
}

/**
 * Pack mode fields into a 32-byte execution mode.
 *
 * @example
 * ```typescript
 * const mode = encodeMode({ callType: CALLTYPE_BATCH, execType: EXECTYPE_TRY });
 * // 0x0101000000000000000000000000000000000000000000000000000000000000
 * ```
 */
export function encodeMode(parts: ModeParts): ExecutionMode {
  return concat([
    pad(parts.callType, { size: 1 }),
    pad(parts.execType, { size: 1 }),
    '0x00000000',
    pad(parts.modeSelector ?? '0x00000000', { size: 4 }),
    pad(parts.modePayload ?? '0x', { dir: 'right', size: MODE_PAYLOAD_SIZE }),
  ]);
}

/**
 * Whether the account can dispatch a mode.
 *
 * Only the call type and exec type bytes are considered.
 */
export function isSupportedMode(mode: ExecutionMode): boolean {
  if (size(mode) > MODE_SIZE) return false;
  const { callType, execType } = decodeMode(mode);
  return SUPPORTED_CALL_TYPES.includes(callType) && SUPPORTED_EXEC_TYPES.includes(execType);
}
