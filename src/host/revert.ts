import { encodeErrorResult, parseAbi, type Hex } from 'viem';

const ERROR_STRING_ABI = parseAbi(['error Error(string)']);

/**
 * Error thrown by deployed code that wants to revert with exact ABI-encoded data.
 */
export class ContractRevert extends Error {
  readonly data: Hex;

  constructor(data: Hex, message = 'execution reverted') {
    super(message);
    this.name = 'ContractRevert';
    this.data = data;
  }
}

/**
 * Revert data reported for a thrown value: the exact data of a
 * {@link ContractRevert}, otherwise `Error(string)` carrying the message.
 */
export function encodeRevertData(err: unknown): Hex {
  if (err instanceof ContractRevert) return err.data;
  const message = err instanceof Error ? err.message : String(err);
  return encodeErrorResult({ abi: ERROR_STRING_ABI, errorName: 'Error', args: [message] });
}
