import type { Address } from 'viem';
import type { ModuleTypeId } from '../../types/account.js';

/**
 * External veto over module installation and executor-initiated execution.
 */
export interface AttestationGate {
  /**
   * Allow or deny `module` acting as `moduleTypeId`.
   *
   * @throws LatchkeyError MODULE_NOT_ATTESTED when denied
   */
  check(module: Address, moduleTypeId: ModuleTypeId): Promise<void>;
}

/** Options for {@link ThresholdAttestationGate} */
export interface ThresholdAttestationOptions {
  /** Attesters whose attestations count */
  attesters: readonly Address[];
  /** Number of distinct trusted attestations required */
  threshold: number;
}
