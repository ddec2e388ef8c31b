import type { Address, Hex } from 'viem';
import type { AccountContext } from '../../core/context.js';
import { ErrorCode } from '../../errors/codes.js';
import { LatchkeyError } from '../../errors/LatchkeyError.js';
import {
  MODULE_TYPE_EXECUTOR,
  MODULE_TYPE_HOOK,
  MODULE_TYPE_VALIDATOR,
  toModuleCategory,
  type ModuleCategory,
  type ModuleTypeId,
} from '../../types/account.js';
import { isModule, type Module } from '../../types/modules.js';
import { createCategoryHandlers } from './handlers.js';
import type { CategoryHandler, ForcedRemoval } from './types.js';

/**
 * Routes install, uninstall and query requests to the handler for the
 * requested module category. The only component that writes to the
 * module registry.
 *
 * Access control and hook wrapping are applied by the account before
 * calling in.
 */
export class ModuleLifecycleRouter {
  private readonly ctx: AccountContext;
  private readonly handlers: Record<ModuleCategory, CategoryHandler>;

  constructor(ctx: AccountContext) {
    this.ctx = ctx;
    this.handlers = createCategoryHandlers(ctx);
  }

  /**
   * Install `module` as `moduleTypeId`.
   *
   * Checks, in order: the category is supported, the module has code, the
   * module reports the category, and the attestation gate allows it.
   */
  async install(moduleTypeId: ModuleTypeId, module: Address, initData: Hex): Promise<void> {
    const category = this.requireCategory(moduleTypeId);
    const code = this.requireModule(module);

    if (!code.isModuleType(moduleTypeId)) {
      throw new LatchkeyError(
        ErrorCode.MISMATCH_MODULE_TYPE_ID,
        `Module ${module} does not report type ${moduleTypeId}`,
        { module },
      );
    }
    await this.ctx.gate.check(module, moduleTypeId);

    await this.handlers[category].install(module, code, initData);
    if (category === 'validator') this.ctx.state.validatorEverInstalled = true;
    this.ctx.events.queue('module.installed', { moduleTypeId, module });
    this.ctx.telemetry.track('module.install', { category });
  }

  async uninstall(moduleTypeId: ModuleTypeId, module: Address, deInitData: Hex): Promise<void> {
    const category = this.requireCategory(moduleTypeId);
    const code = this.requireModule(module);

    await this.handlers[category].uninstall(module, code, deInitData);
    this.ctx.events.queue('module.uninstalled', { moduleTypeId, module });
    this.ctx.telemetry.track('module.uninstall', { category });
  }

  /** Unknown categories are reported as not installed */
  isInstalled(moduleTypeId: ModuleTypeId, module: Address, additionalContext: Hex): boolean {
    const category = toModuleCategory(moduleTypeId);
    if (!category) return false;
    return this.handlers[category].isInstalled(module, additionalContext);
  }

  /**
   * Remove every validator, executor and the hook without letting a
   * misbehaving module stop the purge, then reset the registry bookkeeping.
   *
   * @returns One entry per removed module, carrying what `onUninstall` threw
   */
  async purgeTrust(): Promise<ForcedRemoval[]> {
    const registry = this.ctx.state.registry;
    const targets: Array<{ moduleTypeId: ModuleTypeId; module: Address }> = [
      ...registry.list('validator').map((module) => ({ moduleTypeId: MODULE_TYPE_VALIDATOR, module })),
      ...registry.list('executor').map((module) => ({ moduleTypeId: MODULE_TYPE_EXECUTOR, module })),
    ];
    const hook = registry.getHook();
    if (hook !== undefined) targets.push({ moduleTypeId: MODULE_TYPE_HOOK, module: hook });

    registry.reset();

    const removals: ForcedRemoval[] = [];
    for (const target of targets) {
      removals.push({ ...target, error: await this.tryOnUninstall(target.module) });
    }
    return removals;
  }

  /** The single place where a module's failure is captured instead of propagated */
  private async tryOnUninstall(module: Address): Promise<unknown> {
    const code = this.ctx.host.getCode(module);
    if (!isModule(code)) {
      return new LatchkeyError(ErrorCode.INVALID_MODULE, `Module ${module} has no code`, { module });
    }
    try {
      await code.onUninstall(this.ctx.address, '0x');
      return undefined;
    } catch (err) {
      return err;
    }
  }

  private requireCategory(moduleTypeId: ModuleTypeId): ModuleCategory {
    const category = toModuleCategory(moduleTypeId);
    if (!category) {
      throw new LatchkeyError(ErrorCode.UNSUPPORTED_MODULE_TYPE, `Unsupported module type ${moduleTypeId}`);
    }
    return category;
  }

  private requireModule(module: Address): Module {
    const code = this.ctx.host.getCode(module);
    if (!isModule(code)) {
      throw new LatchkeyError(ErrorCode.INVALID_MODULE, `No module code at ${module}`, { module });
    }
    return code;
  }
}
