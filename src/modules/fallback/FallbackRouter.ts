import { concat, size, slice, type Hex } from 'viem';
import type { AccountContext } from '../../core/context.js';
import { ErrorCode } from '../../errors/codes.js';
import { LatchkeyError } from '../../errors/LatchkeyError.js';
import type { CallContext } from '../../host/types.js';
import { CALLTYPE_STATIC } from '../../types/account.js';

/**
 * Forwards calls the account does not implement to the handler bound to
 * their selector.
 *
 * The original caller is appended to the calldata (ERC-2771 style). Static
 * handlers run through the host's static call, so their state changes are
 * discarded.
 */
export class FallbackRouter {
  private readonly ctx: AccountContext;

  constructor(ctx: AccountContext) {
    this.ctx = ctx;
  }

  async route(call: CallContext): Promise<Hex> {
    const selector = size(call.data) >= 4 ? slice(call.data, 0, 4) : '0x00000000';
    const binding = this.ctx.state.registry.getFallback(selector);
    if (!binding) {
      throw new LatchkeyError(
        ErrorCode.MISSING_FALLBACK_HANDLER,
        `No fallback handler for selector ${selector}`,
      );
    }

    const forwarded = concat([call.data, call.sender]);
    const result =
      binding.callType === CALLTYPE_STATIC
        ? await this.ctx.host.staticCall(this.ctx.address, binding.handler, forwarded)
        : await this.ctx.host.call(this.ctx.address, binding.handler, 0n, forwarded);

    if (!result.success) {
      throw result.cause ?? new LatchkeyError(ErrorCode.EXECUTION_FAILED, `Fallback handler ${binding.handler} reverted`);
    }
    return result.returnData;
  }
}
