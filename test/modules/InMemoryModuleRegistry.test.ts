import { describe, it, expect, beforeEach } from 'vitest';
import { ErrorCode } from '../../src/errors/codes.js';
import { InMemoryModuleRegistry } from '../../src/modules/registry/InMemoryModuleRegistry.js';
import { CALLTYPE_SINGLE, CALLTYPE_STATIC } from '../../src/types/account.js';
import { ADDR, catchError } from '../fixtures/mocks.js';

describe('InMemoryModuleRegistry', () => {
  let registry: InMemoryModuleRegistry;

  beforeEach(() => {
    registry = new InMemoryModuleRegistry();
  });

  it('lists modules in registration order', () => {
    registry.add('validator', ADDR.validatorB);
    registry.add('validator', ADDR.validatorA);

    expect(registry.list('validator')).toEqual([ADDR.validatorB, ADDR.validatorA]);
    expect(registry.count('validator')).toBe(2);
  });

  it('keeps categories independent', () => {
    registry.add('validator', ADDR.validatorA);
    registry.add('executor', ADDR.validatorA);

    registry.remove('validator', ADDR.validatorA);

    expect(registry.exists('validator', ADDR.validatorA)).toBe(false);
    expect(registry.exists('executor', ADDR.validatorA)).toBe(true);
  });

  it('compares addresses case-insensitively', () => {
    registry.add('executor', '0x000000000000000000000000000000000000abcd');
    expect(registry.exists('executor', '0x000000000000000000000000000000000000ABCD')).toBe(true);
  });

  it('rejects duplicates and unknown removals', () => {
    registry.add('validator', ADDR.validatorA);

    expect(catchError(() => registry.add('validator', ADDR.validatorA))).toMatchObject({
      code: ErrorCode.MODULE_ALREADY_INSTALLED,
    });
    expect(catchError(() => registry.remove('executor', ADDR.validatorA))).toMatchObject({
      code: ErrorCode.MODULE_NOT_INSTALLED,
    });
  });

  it('holds a single hook', () => {
    registry.setHook(ADDR.hook);

    expect(catchError(() => registry.setHook(ADDR.hookB))).toMatchObject({
      code: ErrorCode.HOOK_ALREADY_INSTALLED,
      module: ADDR.hook,
    });
    registry.clearHook();
    expect(registry.getHook()).toBeUndefined();
  });

  it('binds fallback selectors regardless of case', () => {
    registry.setFallback('0xABCDEF01', { handler: ADDR.fallback, callType: CALLTYPE_STATIC });

    expect(registry.getFallback('0xabcdef01')).toEqual({ handler: ADDR.fallback, callType: CALLTYPE_STATIC });
    expect(
      catchError(() => registry.setFallback('0xabcdef01', { handler: ADDR.executor, callType: CALLTYPE_SINGLE })),
    ).toMatchObject({ code: ErrorCode.FALLBACK_ALREADY_INSTALLED });

    registry.clearFallback('0xAbCdEf01');
    expect(registry.getFallback('0xabcdef01')).toBeUndefined();
  });

  it('reset() clears validators, executors and the hook only', () => {
    registry.add('validator', ADDR.validatorA);
    registry.add('executor', ADDR.executor);
    registry.add('preValidationHookERC4337', ADDR.preHookA);
    registry.setHook(ADDR.hook);
    registry.setFallback('0x12345678', { handler: ADDR.fallback, callType: CALLTYPE_SINGLE });

    registry.reset();

    expect(registry.count('validator')).toBe(0);
    expect(registry.count('executor')).toBe(0);
    expect(registry.getHook()).toBeUndefined();
    expect(registry.list('preValidationHookERC4337')).toEqual([ADDR.preHookA]);
    expect(registry.getFallback('0x12345678')?.handler).toBe(ADDR.fallback);
  });

  it('restore() undoes every change made after snapshot()', () => {
    registry.add('validator', ADDR.validatorA);
    const snapshot = registry.snapshot();

    registry.add('validator', ADDR.validatorB);
    registry.remove('validator', ADDR.validatorA);
    registry.setHook(ADDR.hook);
    registry.setFallback('0x12345678', { handler: ADDR.fallback, callType: CALLTYPE_SINGLE });

    registry.restore(snapshot);

    expect(registry.list('validator')).toEqual([ADDR.validatorA]);
    expect(registry.getHook()).toBeUndefined();
    expect(registry.getFallback('0x12345678')).toBeUndefined();
  });

  it('snapshots are not affected by later writes', () => {
    const snapshot = registry.snapshot();
    registry.add('executor', ADDR.executor);
    expect(snapshot.lists.get('executor')).toEqual([]);
  });
});
