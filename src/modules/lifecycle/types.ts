import type { Address, Hex } from 'viem';
import type { Module } from '../../types/modules.js';

/**
 * Install/uninstall/query behaviour for one module category.
 */
export interface CategoryHandler {
  install(module: Address, code: Module, initData: Hex): Promise<void>;
  uninstall(module: Address, code: Module, deInitData: Hex): Promise<void>;
  isInstalled(module: Address, additionalContext: Hex): boolean;
}

/** Outcome of a best-effort removal; the registry entry is gone either way */
export interface ForcedRemoval {
  moduleTypeId: bigint;
  module: Address;
  /** What the module's `onUninstall` threw, if anything */
  error?: unknown;
}
