import type { Address, Hex } from 'viem';
import type { CallType } from '../../types/account.js';

/** Categories stored as ordered address sets */
export type ListCategory =
  | 'validator'
  | 'executor'
  | 'preValidationHookERC1271'
  | 'preValidationHookERC4337';

/** Handler bound to a fallback selector */
export interface FallbackBinding {
  handler: Address;
  /** `CALLTYPE_SINGLE` or `CALLTYPE_STATIC` */
  callType: CallType;
}

/** Opaque copy of registry contents, used to roll back a failed invocation */
export interface RegistrySnapshot {
  readonly lists: ReadonlyMap<ListCategory, readonly Address[]>;
  readonly hook: Address | undefined;
  readonly fallbacks: ReadonlyMap<Hex, FallbackBinding>;
}

/**
 * Storage of installed modules.
 *
 * Each address appears at most once per category; categories are independent.
 * Only the module lifecycle router writes to a registry.
 */
export interface ModuleRegistry {
  exists(category: ListCategory, module: Address): boolean;
  /** @throws LatchkeyError MODULE_ALREADY_INSTALLED */
  add(category: ListCategory, module: Address): void;
  /** @throws LatchkeyError MODULE_NOT_INSTALLED */
  remove(category: ListCategory, module: Address): void;
  /** Installed modules in registration order */
  list(category: ListCategory): readonly Address[];
  count(category: ListCategory): number;

  getHook(): Address | undefined;
  /** @throws LatchkeyError HOOK_ALREADY_INSTALLED */
  setHook(module: Address): void;
  clearHook(): void;

  getFallback(selector: Hex): FallbackBinding | undefined;
  /** @throws LatchkeyError FALLBACK_ALREADY_INSTALLED */
  setFallback(selector: Hex, binding: FallbackBinding): void;
  clearFallback(selector: Hex): void;

  /** Empty the trust-bearing categories: validators, executors and the hook slot */
  reset(): void;

  snapshot(): RegistrySnapshot;
  restore(snapshot: RegistrySnapshot): void;
}
