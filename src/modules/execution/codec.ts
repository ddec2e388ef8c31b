import {
  concat,
  decodeAbiParameters,
  encodeAbiParameters,
  getAddress,
  hexToBigInt,
  numberToHex,
  parseAbiParameters,
  size,
  slice,
  type Address,
  type Hex,
} from 'viem';
import { ErrorCode } from '../../errors/codes.js';
import { LatchkeyError } from '../../errors/LatchkeyError.js';
import type { Execution } from '../../types/account.js';
import { tail } from '../../utils/hex.js';
import type { DelegateExecution } from './types.js';

const EXECUTIONS_PARAMS = parseAbiParameters('(address target, uint256 value, bytes callData)[]');

const ADDRESS_SIZE = 20;
const SINGLE_HEADER_SIZE = ADDRESS_SIZE + 32;

function tooShort(kind: string, data: Hex, minimum: number): LatchkeyError {
  return new LatchkeyError(
    ErrorCode.INVALID_EXECUTION_PAYLOAD,
    `${kind} execution payload needs at least ${minimum} bytes, got ${size(data)}`,
  );
}

/** `target(20) ‖ value(32) ‖ callData` */
export function encodeSingleExecution(execution: Execution): Hex {
  return concat([execution.target, numberToHex(execution.value, { size: 32 }), execution.callData]);
}

export function decodeSingleExecution(data: Hex): Execution {
  if (size(data) < SINGLE_HEADER_SIZE) throw tooShort('Single', data, SINGLE_HEADER_SIZE);
  return {
    target: getAddress(slice(data, 0, ADDRESS_SIZE)),
    value: hexToBigInt(slice(data, ADDRESS_SIZE, SINGLE_HEADER_SIZE)),
    callData: tail(data, SINGLE_HEADER_SIZE),
  };
}

/** ABI-encoded `(address,uint256,bytes)[]` */
export function encodeBatchExecution(executions: readonly Execution[]): Hex {
  return encodeAbiParameters(EXECUTIONS_PARAMS, [
    executions.map((e) => ({ target: e.target, value: e.value, callData: e.callData })),
  ]);
}

export function decodeBatchExecution(data: Hex): Execution[] {
  try {
    const [executions] = decodeAbiParameters(EXECUTIONS_PARAMS, data);
    return executions.map((e) => ({ target: e.target, value: e.value, callData: e.callData }));
  } catch (err) {
    throw new LatchkeyError(
      ErrorCode.INVALID_EXECUTION_PAYLOAD,
      'Batch execution payload is not a valid (address,uint256,bytes)[] encoding',
      { cause: err },
    );
  }
}

/** `delegate(20) ‖ callData` */
export function encodeDelegateExecution(delegate: Address, callData: Hex): Hex {
  return concat([delegate, callData]);
}

export function decodeDelegateExecution(data: Hex): DelegateExecution {
  if (size(data) < ADDRESS_SIZE) throw tooShort('Delegated', data, ADDRESS_SIZE);
  return {
    delegate: getAddress(slice(data, 0, ADDRESS_SIZE)),
    callData: tail(data, ADDRESS_SIZE),
  };
}
