import { describe, it, expect, beforeEach } from 'vitest';
import { ErrorCode } from '../../src/errors/codes.js';
import { AttestationRegistry } from '../../src/modules/attestation/AttestationRegistry.js';
import { OpenAttestationGate, ThresholdAttestationGate } from '../../src/modules/attestation/AttestationGate.js';
import { encodeSingleExecution } from '../../src/modules/execution/codec.js';
import { encodeMode } from '../../src/modules/execution/mode.js';
import {
  CALLTYPE_SINGLE,
  EXECTYPE_DEFAULT,
  MODULE_TYPE_EXECUTOR,
  MODULE_TYPE_VALIDATOR,
} from '../../src/types/account.js';
import { ADDR, catchError, createAccountFixture } from '../fixtures/mocks.js';

const SECOND_ATTESTER = '0x0000000000000000000000000000000000007002';

describe('AttestationRegistry', () => {
  it('records attestations per module type', () => {
    const registry = new AttestationRegistry();
    registry.attest(ADDR.attester, ADDR.validatorA, [MODULE_TYPE_VALIDATOR]);

    expect(registry.isAttested(ADDR.attester, ADDR.validatorA, MODULE_TYPE_VALIDATOR)).toBe(true);
    expect(registry.isAttested(ADDR.attester, ADDR.validatorA, MODULE_TYPE_EXECUTOR)).toBe(false);
  });

  it('revoke() withdraws and attest() reinstates', () => {
    const registry = new AttestationRegistry();
    registry.attest(ADDR.attester, ADDR.validatorA, [MODULE_TYPE_VALIDATOR]);
    registry.revoke(ADDR.attester, ADDR.validatorA);
    expect(registry.isAttested(ADDR.attester, ADDR.validatorA, MODULE_TYPE_VALIDATOR)).toBe(false);

    registry.attest(ADDR.attester, ADDR.validatorA, [MODULE_TYPE_VALIDATOR]);
    expect(registry.isAttested(ADDR.attester, ADDR.validatorA, MODULE_TYPE_VALIDATOR)).toBe(true);
  });
});

describe('OpenAttestationGate', () => {
  it('allows everything', async () => {
    await expect(new OpenAttestationGate().check(ADDR.empty, 99n)).resolves.toBeUndefined();
  });
});

describe('ThresholdAttestationGate', () => {
  let registry: AttestationRegistry;

  beforeEach(() => {
    registry = new AttestationRegistry();
  });

  it('validates the threshold', () => {
    expect(
      catchError(() => new ThresholdAttestationGate(registry, { attesters: [ADDR.attester], threshold: 0 })),
    ).toMatchObject({ code: ErrorCode.INVALID_CONFIG });
    expect(
      catchError(() => new ThresholdAttestationGate(registry, { attesters: [ADDR.attester], threshold: 2 })),
    ).toMatchObject({ code: ErrorCode.INVALID_CONFIG });
  });

  it('counts only trusted attesters', async () => {
    const gate = new ThresholdAttestationGate(registry, {
      attesters: [ADDR.attester, SECOND_ATTESTER],
      threshold: 2,
    });
    registry.attest(ADDR.attester, ADDR.validatorA, [MODULE_TYPE_VALIDATOR]);
    registry.attest(ADDR.recipient, ADDR.validatorA, [MODULE_TYPE_VALIDATOR]);

    await expect(gate.check(ADDR.validatorA, MODULE_TYPE_VALIDATOR)).rejects.toMatchObject({
      code: ErrorCode.MODULE_NOT_ATTESTED,
      message: `Module ${ADDR.validatorA} has 1/2 attestations for type 1`,
    });

    registry.attest(SECOND_ATTESTER, ADDR.validatorA, [MODULE_TYPE_VALIDATOR]);
    await expect(gate.check(ADDR.validatorA, MODULE_TYPE_VALIDATOR)).resolves.toBeUndefined();
  });

  it('re-checks executors on every executeFromExecutor call', async () => {
    registry.attest(ADDR.attester, ADDR.executor, [MODULE_TYPE_EXECUTOR]);
    const gate = new ThresholdAttestationGate(registry, { attesters: [ADDR.attester], threshold: 1 });
    const f = createAccountFixture({ gate });
    await f.account.installModule(f.entryPoint, MODULE_TYPE_EXECUTOR, ADDR.executor, '0x');
    const mode = encodeMode({ callType: CALLTYPE_SINGLE, execType: EXECTYPE_DEFAULT });
    const tick = encodeSingleExecution({ target: ADDR.counter, value: 0n, callData: '0x' });

    await f.account.executeFromExecutor(ADDR.executor, mode, tick);
    registry.revoke(ADDR.attester, ADDR.executor);

    await expect(f.account.executeFromExecutor(ADDR.executor, mode, tick)).rejects.toMatchObject({
      code: ErrorCode.MODULE_NOT_ATTESTED,
    });
    expect(f.counter.count()).toBe(1n);
  });
});
