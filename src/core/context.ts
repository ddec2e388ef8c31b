import type { Address } from 'viem';
import type { ExecutionHost } from '../host/types.js';
import type { AttestationGate } from '../modules/attestation/types.js';
import type { AccountState } from './AccountState.js';
import type { EventQueue } from './EventQueue.js';
import type { Telemetry } from './Telemetry.js';

/**
 * Collaborators handed to every engine of one account.
 */
export interface AccountContext {
  readonly address: Address;
  readonly entryPoint: Address;
  readonly host: ExecutionHost;
  readonly state: AccountState;
  readonly gate: AttestationGate;
  readonly events: EventQueue;
  readonly telemetry: Telemetry;
}
