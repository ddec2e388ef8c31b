import { describe, it, expect } from 'vitest';
import {
  SIG_VALIDATION_FAILED_AUTHORIZER,
  isSignatureFailure,
  isValidAt,
  packValidationData,
  parseValidationData,
} from '../../src/modules/authorization/validation-data.js';
import { ZERO_ADDRESS } from '../../src/types/account.js';
import { ADDR } from '../fixtures/mocks.js';

describe('validation data', () => {
  it('treats 0 as success without expiry', () => {
    expect(parseValidationData(0n)).toEqual({
      authorizer: ZERO_ADDRESS,
      validUntil: 0xffffffffffff,
      validAfter: 0,
    });
  });

  it('treats 1 as a signature failure', () => {
    expect(parseValidationData(1n).authorizer).toBe(SIG_VALIDATION_FAILED_AUTHORIZER);
    expect(isSignatureFailure(1n)).toBe(true);
    expect(isSignatureFailure(0n)).toBe(false);
  });

  it('packs fields at their bit offsets', () => {
    const packed = packValidationData({ authorizer: ADDR.attester, validUntil: 2, validAfter: 3 });
    expect(packed).toBe(BigInt(ADDR.attester) | (2n << 160n) | (3n << 208n));
    expect(parseValidationData(packed)).toEqual({ authorizer: ADDR.attester, validUntil: 2, validAfter: 3 });
  });

  it('checks the validity window', () => {
    const packed = packValidationData({ authorizer: ZERO_ADDRESS, validUntil: 200, validAfter: 100 });
    expect(isValidAt(packed, 99)).toBe(false);
    expect(isValidAt(packed, 100)).toBe(true);
    expect(isValidAt(packed, 200)).toBe(true);
    expect(isValidAt(packed, 201)).toBe(false);
    expect(isValidAt(1n, 150)).toBe(false);
  });
});
