import type { Address } from 'viem';
import { ErrorCode } from '../../errors/codes.js';
import { LatchkeyError } from '../../errors/LatchkeyError.js';
import type { ModuleTypeId } from '../../types/account.js';
import type { AttestationRegistry } from './AttestationRegistry.js';
import type { AttestationGate, ThresholdAttestationOptions } from './types.js';

/**
 * Gate used when no attestation registry is configured: every module passes.
 */
export class OpenAttestationGate implements AttestationGate {
  async check(_module: Address, _moduleTypeId: ModuleTypeId): Promise<void> {
    // No registry configured
  }
}

/**
 * Gate that requires `threshold` of the trusted attesters to vouch for a
 * module in the given category.
 *
 * @example
 * ```typescript
 * const gate = new ThresholdAttestationGate(registry, {
 *   attesters: [auditorA, auditorB],
 *   threshold: 1,
 * });
 * const account = new SmartAccount({ address, host, gate });
 * ```
 */
export class ThresholdAttestationGate implements AttestationGate {
  private readonly registry: AttestationRegistry;
  private readonly attesters: readonly Address[];
  private readonly threshold: number;

  constructor(registry: AttestationRegistry, opts: ThresholdAttestationOptions) {
    if (!Number.isInteger(opts.threshold) || opts.threshold < 1) {
      throw new LatchkeyError(ErrorCode.INVALID_CONFIG, `Attestation threshold must be a positive integer, got ${opts.threshold}`);
    }
    if (opts.threshold > opts.attesters.length) {
      throw new LatchkeyError(
        ErrorCode.INVALID_CONFIG,
        `Attestation threshold ${opts.threshold} exceeds ${opts.attesters.length} trusted attesters`,
      );
    }
    this.registry = registry;
    this.attesters = [...opts.attesters];
    this.threshold = opts.threshold;
  }

  async check(module: Address, moduleTypeId: ModuleTypeId): Promise<void> {
    const attested = this.attesters.filter((attester) =>
      this.registry.isAttested(attester, module, moduleTypeId),
    ).length;

    if (attested < this.threshold) {
      throw new LatchkeyError(
        ErrorCode.MODULE_NOT_ATTESTED,
        `Module ${module} has ${attested}/${this.threshold} attestations for type ${moduleTypeId}`,
        { module },
      );
    }
  }
}
