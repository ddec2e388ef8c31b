import {
  isAddressEqual,
  size,
  slice,
  toFunctionSelector,
  type Address,
  type Hex,
} from 'viem';
import type { AccountContext } from '../../core/context.js';
import { ErrorCode } from '../../errors/codes.js';
import { LatchkeyError } from '../../errors/LatchkeyError.js';
import {
  CALLTYPE_SINGLE,
  CALLTYPE_STATIC,
  type ModuleCategory,
} from '../../types/account.js';
import {
  isFallbackModule,
  isHookModule,
  isPreValidationHookERC1271,
  isPreValidationHookERC4337,
  isValidatorModule,
  type Module,
} from '../../types/modules.js';
import { lowerHex, tail } from '../../utils/hex.js';
import type { ListCategory } from '../registry/types.js';
import type { CategoryHandler } from './types.js';

/** Selectors a fallback handler may never claim */
const FORBIDDEN_FALLBACK_SELECTORS: readonly Hex[] = [
  '0x00000000',
  toFunctionSelector('onInstall(bytes)'),
  toFunctionSelector('onUninstall(bytes)'),
];

type ShapeCheck = (code: Module) => boolean;

function requireShape(module: Address, code: Module, check: ShapeCheck, category: ModuleCategory): void {
  if (!check(code)) {
    throw new LatchkeyError(
      ErrorCode.INVALID_MODULE,
      `Module ${module} does not implement the ${category} interface`,
      { module },
    );
  }
}

/**
 * Handler for categories stored as an ordered set.
 */
function listHandler(
  ctx: AccountContext,
  category: ListCategory,
  check: ShapeCheck,
): CategoryHandler {
  const registry = ctx.state.registry;
  return {
    async install(module, code, initData) {
      requireShape(module, code, check, category);
      registry.add(category, module);
      await code.onInstall(ctx.address, initData);
    },
    async uninstall(module, code, deInitData) {
      registry.remove(category, module);
      await code.onUninstall(ctx.address, deInitData);
    },
    isInstalled(module) {
      return registry.exists(category, module);
    },
  };
}

function validatorHandler(ctx: AccountContext): CategoryHandler {
  const base = listHandler(ctx, 'validator', isValidatorModule);
  return {
    ...base,
    async uninstall(module, code, deInitData) {
      const registry = ctx.state.registry;
      if (registry.exists('validator', module) && registry.count('validator') === 1) {
        throw new LatchkeyError(
          ErrorCode.CANNOT_REMOVE_LAST_VALIDATOR,
          `Validator ${module} is the last one installed`,
          { module },
        );
      }
      await base.uninstall(module, code, deInitData);
    },
  };
}

function hookHandler(ctx: AccountContext): CategoryHandler {
  const registry = ctx.state.registry;
  return {
    async install(module, code, initData) {
      requireShape(module, code, isHookModule, 'hook');
      registry.setHook(module);
      await code.onInstall(ctx.address, initData);
    },
    async uninstall(module, code, deInitData) {
      const current = registry.getHook();
      if (current === undefined || !isAddressEqual(current, module)) {
        throw new LatchkeyError(ErrorCode.MODULE_NOT_INSTALLED, `Hook ${module} is not installed`, { module });
      }
      registry.clearHook();
      await code.onUninstall(ctx.address, deInitData);
    },
    isInstalled(module) {
      const current = registry.getHook();
      return current !== undefined && isAddressEqual(current, module);
    },
  };
}

/**
 * Fallback handlers bind one selector each.
 *
 * - install data: `selector(4) ‖ callType(1) ‖ moduleInitData`
 * - uninstall data: `selector(4) ‖ moduleDeInitData`
 * - query context: `selector(4)`
 */
function fallbackHandler(ctx: AccountContext): CategoryHandler {
  const registry = ctx.state.registry;
  return {
    async install(module, code, initData) {
      requireShape(module, code, isFallbackModule, 'fallback');
      if (size(initData) < 5) {
        throw new LatchkeyError(
          ErrorCode.INVALID_INIT_DATA,
          'Fallback init data must start with selector(4) and callType(1)',
          { module },
        );
      }
      const selector = lowerHex(slice(initData, 0, 4));
      const callType = lowerHex(slice(initData, 4, 5));
      if (FORBIDDEN_FALLBACK_SELECTORS.includes(selector)) {
        throw new LatchkeyError(
          ErrorCode.FORBIDDEN_FALLBACK_SELECTOR,
          `Selector ${selector} cannot be routed to a fallback handler`,
          { module },
        );
      }
      if (callType !== CALLTYPE_SINGLE && callType !== CALLTYPE_STATIC) {
        throw new LatchkeyError(
          ErrorCode.UNSUPPORTED_FALLBACK_CALL_TYPE,
          `Fallback call type ${callType} is not supported`,
          { module },
        );
      }
      registry.setFallback(selector, { handler: module, callType });
      await code.onInstall(ctx.address, tail(initData, 5));
    },
    async uninstall(module, code, deInitData) {
      if (size(deInitData) < 4) {
        throw new LatchkeyError(
          ErrorCode.INVALID_INIT_DATA,
          'Fallback uninstall data must start with selector(4)',
          { module },
        );
      }
      const selector = slice(deInitData, 0, 4);
      const binding = registry.getFallback(selector);
      if (!binding || !isAddressEqual(binding.handler, module)) {
        throw new LatchkeyError(
          ErrorCode.MODULE_NOT_INSTALLED,
          `Fallback ${module} is not installed for selector ${selector}`,
          { module },
        );
      }
      registry.clearFallback(selector);
      await code.onUninstall(ctx.address, tail(deInitData, 4));
    },
    isInstalled(module, additionalContext) {
      if (size(additionalContext) < 4) return false;
      const binding = registry.getFallback(slice(additionalContext, 0, 4));
      return binding !== undefined && isAddressEqual(binding.handler, module);
    },
  };
}

/**
 * One handler per supported category; the closed {@link ModuleCategory} union
 * makes a missing entry a compile error.
 */
export function createCategoryHandlers(ctx: AccountContext): Record<ModuleCategory, CategoryHandler> {
  return {
    validator: validatorHandler(ctx),
    executor: listHandler(ctx, 'executor', () => true),
    fallback: fallbackHandler(ctx),
    hook: hookHandler(ctx),
    preValidationHookERC1271: listHandler(ctx, 'preValidationHookERC1271', isPreValidationHookERC1271),
    preValidationHookERC4337: listHandler(ctx, 'preValidationHookERC4337', isPreValidationHookERC4337),
  };
}
