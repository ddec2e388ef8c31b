import { getAddress, isAddressEqual, type Address } from 'viem';
import type { ModuleTypeId } from '../../types/account.js';

interface Attestation {
  attester: Address;
  module: Address;
  moduleTypes: Set<ModuleTypeId>;
  revoked: boolean;
}

/**
 * In-memory store of attester statements about modules.
 *
 * @example
 * ```typescript
 * const registry = new AttestationRegistry();
 * registry.attest(auditor, ownableValidator, [MODULE_TYPE_VALIDATOR]);
 * registry.isAttested(auditor, ownableValidator, MODULE_TYPE_VALIDATOR); // true
 * ```
 */
export class AttestationRegistry {
  private readonly attestations: Attestation[] = [];

  attest(attester: Address, module: Address, moduleTypes: readonly ModuleTypeId[]): void {
    const existing = this.find(attester, module);
    if (existing) {
      existing.moduleTypes = new Set(moduleTypes);
      existing.revoked = false;
      return;
    }
    this.attestations.push({
      attester: getAddress(attester),
      module: getAddress(module),
      moduleTypes: new Set(moduleTypes),
      revoked: false,
    });
  }

  revoke(attester: Address, module: Address): void {
    const existing = this.find(attester, module);
    if (existing) existing.revoked = true;
  }

  isAttested(attester: Address, module: Address, moduleTypeId: ModuleTypeId): boolean {
    const attestation = this.find(attester, module);
    return attestation !== undefined && !attestation.revoked && attestation.moduleTypes.has(moduleTypeId);
  }

  private find(attester: Address, module: Address): Attestation | undefined {
    return this.attestations.find(
      (a) => isAddressEqual(a.attester, attester) && isAddressEqual(a.module, module),
    );
  }
}
