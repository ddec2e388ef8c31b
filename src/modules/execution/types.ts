import type { Address, Hex } from 'viem';
import type { CallType, ExecType } from '../../types/account.js';

/** Fields of an execution mode */
export interface DecodedMode {
  callType: CallType;
  execType: ExecType;
  /** 4-byte selector for mode extensions */
  modeSelector: Hex;
  /** 22 bytes of selector-specific data */
  modePayload: Hex;
}

/** Input to `encodeMode` */
export interface ModeParts {
  callType: CallType;
  execType: ExecType;
  modeSelector?: Hex;
  modePayload?: Hex;
}

/** Failure policy applied to each unit */
export type FailurePolicy = 'default' | 'try';

/** Result of dispatching one execution request */
export interface ExecutionReport {
  /** Return data per executed unit, in order; revert data for failed TRY units */
  returnData: Hex[];
  /** Indices of units that failed under TRY semantics */
  failedUnits: number[];
}

/** A decoded delegated execution */
export interface DelegateExecution {
  delegate: Address;
  callData: Hex;
}
