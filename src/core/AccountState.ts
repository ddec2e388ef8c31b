import type { Address } from 'viem';
import type { ModuleRegistry, RegistrySnapshot } from '../modules/registry/types.js';

/** Restorable copy of {@link AccountState} */
export interface AccountStateSnapshot {
  readonly registry: RegistrySnapshot;
  readonly initialized: boolean;
  readonly validatorEverInstalled: boolean;
  readonly implementation: Address | undefined;
}

/**
 * Mutable account state shared by reference between the engines.
 *
 * Engines read from it freely; writes to `registry` go through the module
 * lifecycle router, and writes to the flags through the account itself.
 */
export class AccountState {
  readonly registry: ModuleRegistry;
  /** One-time initialization completed */
  initialized = false;
  /** A validator was installed at some point; purges do not clear it */
  validatorEverInstalled = false;
  /** Implementation the account was last initialized or purged under */
  implementation: Address | undefined;

  constructor(registry: ModuleRegistry) {
    this.registry = registry;
  }

  /**
   * Whether the self-signature bootstrap path is still open. It closes for
   * good once the account is initialized or has had a validator.
   */
  isBootstrapping(): boolean {
    return !this.initialized && !this.validatorEverInstalled && this.registry.count('validator') === 0;
  }

  snapshot(): AccountStateSnapshot {
    return {
      registry: this.registry.snapshot(),
      initialized: this.initialized,
      validatorEverInstalled: this.validatorEverInstalled,
      implementation: this.implementation,
    };
  }

  restore(snapshot: AccountStateSnapshot): void {
    this.registry.restore(snapshot.registry);
    this.initialized = snapshot.initialized;
    this.validatorEverInstalled = snapshot.validatorEverInstalled;
    this.implementation = snapshot.implementation;
  }
}
