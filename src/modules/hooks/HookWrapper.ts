import type { AccountContext } from '../../core/context.js';
import { ErrorCode } from '../../errors/codes.js';
import { LatchkeyError } from '../../errors/LatchkeyError.js';
import type { CallContext } from '../../host/types.js';
import { isHookModule, type HookModule, type HookOutcome } from '../../types/modules.js';

const NO_FAILURES: HookOutcome = { failedUnits: [] };

/**
 * Brackets privileged operations with the installed hook's pre/post checks.
 *
 * The hook is looked up once, before the body runs, so a body that installs
 * or removes the hook still gets its post-check from the hook that saw the
 * pre-check. A body that throws skips the post-check.
 *
 * @example
 * ```typescript
 * const report = await hooks.wrap(
 *   { sender, value: 0n, data: msgData },
 *   () => engine.dispatch(mode, calldata),
 *   (r) => ({ failedUnits: r.failedUnits }),
 * );
 * ```
 */
export class HookWrapper {
  private readonly ctx: AccountContext;

  constructor(ctx: AccountContext) {
    this.ctx = ctx;
  }

  async wrap<T>(
    context: CallContext,
    body: () => Promise<T>,
    outcomeOf: (result: T) => HookOutcome = () => NO_FAILURES,
  ): Promise<T> {
    const hook = this.installedHook();
    if (!hook) return body();

    const hookData = await hook.preCheck(this.ctx.address, context);
    const result = await body();
    await hook.postCheck(this.ctx.address, hookData, outcomeOf(result));
    return result;
  }

  private installedHook(): HookModule | undefined {
    const address = this.ctx.state.registry.getHook();
    if (address === undefined) return undefined;

    const code = this.ctx.host.getCode(address);
    if (!isHookModule(code)) {
      throw new LatchkeyError(ErrorCode.INVALID_MODULE, `Installed hook ${address} has no hook code`, {
        module: address,
      });
    }
    return code;
  }
}
