import { isAddressEqual, type Address, type Hex } from 'viem';
import { ErrorCode } from '../../errors/codes.js';
import { LatchkeyError } from '../../errors/LatchkeyError.js';
import { lowerHex } from '../../utils/hex.js';
import type {
  FallbackBinding,
  ListCategory,
  ModuleRegistry,
  RegistrySnapshot,
} from './types.js';

const LIST_CATEGORIES: readonly ListCategory[] = [
  'validator',
  'executor',
  'preValidationHookERC1271',
  'preValidationHookERC4337',
];

/**
 * Module registry backed by in-memory ordered arrays.
 *
 * @example
 * ```typescript
 * const registry = new InMemoryModuleRegistry();
 * registry.add('validator', ownableValidator);
 * registry.exists('validator', ownableValidator); // true
 * ```
 */
export class InMemoryModuleRegistry implements ModuleRegistry {
  private lists: Map<ListCategory, Address[]> = new Map(
    LIST_CATEGORIES.map((category) => [category, []]),
  );
  private hook: Address | undefined;
  private fallbacks: Map<Hex, FallbackBinding> = new Map();

  exists(category: ListCategory, module: Address): boolean {
    return this.entries(category).some((entry) => isAddressEqual(entry, module));
  }

  add(category: ListCategory, module: Address): void {
    if (this.exists(category, module)) {
      throw new LatchkeyError(
        ErrorCode.MODULE_ALREADY_INSTALLED,
        `Module ${module} is already installed as ${category}`,
        { module },
      );
    }
    this.entries(category).push(module);
  }

  remove(category: ListCategory, module: Address): void {
    const entries = this.entries(category);
    const index = entries.findIndex((entry) => isAddressEqual(entry, module));
    if (index === -1) {
      throw new LatchkeyError(
        ErrorCode.MODULE_NOT_INSTALLED,
        `Module ${module} is not installed as ${category}`,
        { module },
      );
    }
    entries.splice(index, 1);
  }

  list(category: ListCategory): readonly Address[] {
    return [...this.entries(category)];
  }

  count(category: ListCategory): number {
    return this.entries(category).length;
  }

  getHook(): Address | undefined {
    return this.hook;
  }

  setHook(module: Address): void {
    if (this.hook !== undefined) {
      throw new LatchkeyError(
        ErrorCode.HOOK_ALREADY_INSTALLED,
        `Hook ${this.hook} is already installed`,
        { module: this.hook },
      );
    }
    this.hook = module;
  }

  clearHook(): void {
    this.hook = undefined;
  }

  getFallback(selector: Hex): FallbackBinding | undefined {
    return this.fallbacks.get(lowerHex(selector));
  }

  setFallback(selector: Hex, binding: FallbackBinding): void {
    const normalized = lowerHex(selector);
    const existing = this.fallbacks.get(normalized);
    if (existing) {
      throw new LatchkeyError(
        ErrorCode.FALLBACK_ALREADY_INSTALLED,
        `Selector ${normalized} is already handled by ${existing.handler}`,
        { module: existing.handler },
      );
    }
    this.fallbacks.set(normalized, { ...binding });
  }

  clearFallback(selector: Hex): void {
    this.fallbacks.delete(lowerHex(selector));
  }

  reset(): void {
    this.lists.set('validator', []);
    this.lists.set('executor', []);
    this.hook = undefined;
  }

  snapshot(): RegistrySnapshot {
    return {
      lists: new Map(LIST_CATEGORIES.map((category) => [category, this.list(category)])),
      hook: this.hook,
      fallbacks: new Map(this.fallbacks),
    };
  }

  restore(snapshot: RegistrySnapshot): void {
    this.lists = new Map(
      LIST_CATEGORIES.map((category) => [category, [...(snapshot.lists.get(category) ?? [])]]),
    );
    this.hook = snapshot.hook;
    this.fallbacks = new Map(snapshot.fallbacks);
  }

  private entries(category: ListCategory): Address[] {
    let entries = this.lists.get(category);
    if (!entries) {
      entries = [];
      this.lists.set(category, entries);
    }
    return entries;
  }
}
