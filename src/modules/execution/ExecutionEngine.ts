import type { Hex } from 'viem';
import type { AccountContext } from '../../core/context.js';
import { ErrorCode } from '../../errors/codes.js';
import { LatchkeyError } from '../../errors/LatchkeyError.js';
import type { CallResult } from '../../host/types.js';
import {
  CALLTYPE_BATCH,
  CALLTYPE_DELEGATECALL,
  CALLTYPE_SINGLE,
  EXECTYPE_DEFAULT,
  EXECTYPE_TRY,
  type ExecType,
  type Execution,
  type ExecutionMode,
} from '../../types/account.js';
import {
  decodeBatchExecution,
  decodeDelegateExecution,
  decodeSingleExecution,
} from './codec.js';
import { decodeMode } from './mode.js';
import type { DelegateExecution, ExecutionReport, FailurePolicy } from './types.js';

/**
 * Decodes execution modes and runs the resulting units against the host.
 *
 * Units run strictly in order. Under the default policy the first failing
 * unit rethrows the callee's own error; under TRY it is reported through an
 * `execution.tryFailed` event and the remaining units still run.
 *
 * The engine never touches the module registry; callers apply access control
 * and hook wrapping before calling {@link ExecutionEngine.dispatch}.
 */
export class ExecutionEngine {
  private readonly ctx: AccountContext;

  constructor(ctx: AccountContext) {
    this.ctx = ctx;
  }

  /**
   * Run an execution request.
   *
   * @param mode - Packed execution mode selecting call type and failure policy
   * @param executionCalldata - Payload in the layout the call type expects
   * @returns Return data for every unit, plus the TRY units that failed
   */
  async dispatch(mode: ExecutionMode, executionCalldata: Hex): Promise<ExecutionReport> {
    const { callType, execType } = decodeMode(mode);

    switch (callType) {
      case CALLTYPE_SINGLE: {
        const policy = this.failurePolicy(execType);
        return this.runCalls([decodeSingleExecution(executionCalldata)], policy);
      }
      case CALLTYPE_BATCH: {
        const policy = this.failurePolicy(execType);
        return this.runCalls(decodeBatchExecution(executionCalldata), policy);
      }
      case CALLTYPE_DELEGATECALL: {
        const policy = this.failurePolicy(execType);
        return this.runDelegate(decodeDelegateExecution(executionCalldata), policy);
      }
      default:
        throw new LatchkeyError(ErrorCode.UNSUPPORTED_CALL_TYPE, `Unsupported call type ${callType}`);
    }
  }

  private failurePolicy(execType: ExecType): FailurePolicy {
    switch (execType) {
      case EXECTYPE_DEFAULT:
        return 'default';
      case EXECTYPE_TRY:
        return 'try';
      default:
        throw new LatchkeyError(ErrorCode.UNSUPPORTED_EXEC_TYPE, `Unsupported exec type ${execType}`);
    }
  }

  private async runCalls(executions: readonly Execution[], policy: FailurePolicy): Promise<ExecutionReport> {
    const report: ExecutionReport = { returnData: [], failedUnits: [] };

    for (const [index, execution] of executions.entries()) {
      const result = await this.ctx.host.call(
        this.ctx.address,
        execution.target,
        execution.value,
        execution.callData,
      );

      if (!result.success) {
        if (policy === 'default') throw failureOf(result);
        report.failedUnits.push(index);
        this.ctx.events.queue('execution.tryFailed', { index, returnData: result.returnData });
      }
      report.returnData.push(result.returnData);
    }

    return report;
  }

  private async runDelegate(execution: DelegateExecution, policy: FailurePolicy): Promise<ExecutionReport> {
    const result = await this.ctx.host.delegateCall(this.ctx.address, execution.delegate, execution.callData);

    if (!result.success) {
      if (policy === 'default') throw failureOf(result);
      this.ctx.events.queue('execution.tryDelegateFailed', {
        delegate: execution.delegate,
        returnData: result.returnData,
      });
      return { returnData: [result.returnData], failedUnits: [0] };
    }
    return { returnData: [result.returnData], failedUnits: [] };
  }
}

/** The callee's own error, so it propagates unwrapped */
function failureOf(result: CallResult): unknown {
  return (
    result.cause ??
    new LatchkeyError(ErrorCode.EXECUTION_FAILED, `Call reverted with ${result.returnData}`)
  );
}
