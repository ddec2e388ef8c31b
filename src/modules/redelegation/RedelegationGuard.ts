import { isAddressEqual } from 'viem';
import type { AccountContext } from '../../core/context.js';
import type { ModuleLifecycleRouter } from '../lifecycle/ModuleLifecycleRouter.js';
import type { ForcedRemoval } from '../lifecycle/types.js';

/**
 * Strips trust configured under a previous implementation once the
 * account's EIP-7702 delegation points somewhere else.
 *
 * The purge is best-effort: a module whose `onUninstall` throws is still
 * removed, and its failure is logged and reported through a
 * `module.purgeFailed` event instead of aborting the purge.
 */
export class RedelegationGuard {
  private readonly ctx: AccountContext;
  private readonly router: ModuleLifecycleRouter;

  constructor(ctx: AccountContext, router: ModuleLifecycleRouter) {
    this.ctx = ctx;
    this.router = router;
  }

  /** Whether the delegation moved away from the implementation last recorded */
  isRedelegated(): boolean {
    const known = this.ctx.state.implementation;
    if (known === undefined) return false;
    const current = this.ctx.host.getDelegation(this.ctx.address);
    return current === undefined || !isAddressEqual(current, known);
  }

  /**
   * Initialization-time check: purge when re-delegated, then record the
   * current implementation.
   *
   * @returns Whether a purge ran
   */
  async checkOnInitialize(): Promise<boolean> {
    const redelegated = this.isRedelegated();
    if (redelegated) {
      await this.purge();
    }
    this.ctx.state.implementation = this.ctx.host.getDelegation(this.ctx.address);
    return redelegated;
  }

  /**
   * Remove every validator, executor and the hook, then reset the
   * registry bookkeeping. The account stays initialized.
   */
  async purge(): Promise<ForcedRemoval[]> {
    const removals = await this.router.purgeTrust();

    let failed = 0;
    for (const removal of removals) {
      if (removal.error === undefined) continue;
      failed += 1;
      const reason = removal.error instanceof Error ? removal.error.message : String(removal.error);
      console.warn(`[Latchkey] onUninstall of ${removal.module} failed during redelegation purge:`, reason);
      this.ctx.events.queue('module.purgeFailed', {
        moduleTypeId: removal.moduleTypeId,
        module: removal.module,
        reason,
      });
    }

    const implementation = this.ctx.host.getDelegation(this.ctx.address);
    this.ctx.state.implementation = implementation;
    this.ctx.events.queue('account.redelegated', { account: this.ctx.address, implementation });
    this.ctx.telemetry.track('account.redelegate', { removed: removals.length, failed });
    return removals;
  }
}
