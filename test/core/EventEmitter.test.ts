import { describe, it, expect, vi, afterEach } from 'vitest';
import { LatchkeyEventEmitter } from '../../src/core/EventEmitter.js';
import { ADDR } from '../fixtures/mocks.js';

describe('LatchkeyEventEmitter', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('on() returns an unsubscribe function', () => {
    const emitter = new LatchkeyEventEmitter();
    const unsub = emitter.on('module.installed', () => {});
    expect(typeof unsub).toBe('function');
  });

  it('emit() calls registered listeners with data', () => {
    const emitter = new LatchkeyEventEmitter();
    const listener = vi.fn();
    emitter.on('module.installed', listener);

    const data = { moduleTypeId: 1n, module: ADDR.validatorA };
    emitter.emit('module.installed', data);

    expect(listener).toHaveBeenCalledOnce();
    expect(listener).toHaveBeenCalledWith(data);
  });

  it('supports multiple listeners on the same event', () => {
    const emitter = new LatchkeyEventEmitter();
    const listener1 = vi.fn();
    const listener2 = vi.fn();
    emitter.on('execution.tryFailed', listener1);
    emitter.on('execution.tryFailed', listener2);

    const data = { index: 1, returnData: '0x' as const };
    emitter.emit('execution.tryFailed', data);

    expect(listener1).toHaveBeenCalledWith(data);
    expect(listener2).toHaveBeenCalledWith(data);
  });

  it('unsubscribe function from on() removes the listener', () => {
    const emitter = new LatchkeyEventEmitter();
    const listener = vi.fn();
    const unsub = emitter.on('module.uninstalled', listener);

    unsub();
    emitter.emit('module.uninstalled', { moduleTypeId: 2n, module: ADDR.executor });
    expect(listener).not.toHaveBeenCalled();
  });

  it('off() on an event without listeners is a no-op', () => {
    const emitter = new LatchkeyEventEmitter();
    expect(() => emitter.off('account.redelegated', vi.fn())).not.toThrow();
  });

  it('keeps delivering to other listeners when one throws', () => {
    const emitter = new LatchkeyEventEmitter();
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const bad = vi.fn(() => {
      throw new Error('boom');
    });
    const good = vi.fn();
    emitter.on('module.installed', bad);
    emitter.on('module.installed', good);

    emitter.emit('module.installed', { moduleTypeId: 1n, module: ADDR.validatorA });

    expect(bad).toHaveBeenCalledOnce();
    expect(good).toHaveBeenCalledOnce();
  });

  it('re-emits listener errors as error events', () => {
    const emitter = new LatchkeyEventEmitter();
    const onError = vi.fn();
    emitter.on('error', onError);
    emitter.on('module.installed', () => {
      throw new Error('boom');
    });

    emitter.emit('module.installed', { moduleTypeId: 1n, module: ADDR.validatorA });

    expect(onError).toHaveBeenCalledWith({ code: 'LISTENER_ERROR', message: 'boom' });
  });

  it('logs listener errors when nobody listens for error events', () => {
    const emitter = new LatchkeyEventEmitter();
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
    emitter.on('account.initialized', () => {
      throw new Error('boom');
    });

    emitter.emit('account.initialized', { account: ADDR.recipient });

    expect(consoleError).toHaveBeenCalledWith(
      '[Latchkey] Unhandled listener error on "account.initialized":',
      'boom',
    );
  });

  it('warns instead of recursing when an error listener throws', () => {
    const emitter = new LatchkeyEventEmitter();
    const consoleWarn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    emitter.on('error', () => {
      throw new Error('listener broke');
    });

    emitter.emit('error', { code: 'X', message: 'y' });

    expect(consoleWarn).toHaveBeenCalledWith('[Latchkey] Error listener threw:', 'listener broke');
  });

  it('the same listener added twice is called once', () => {
    const emitter = new LatchkeyEventEmitter();
    const listener = vi.fn();
    emitter.on('module.purgeFailed', listener);
    emitter.on('module.purgeFailed', listener);

    emitter.emit('module.purgeFailed', { moduleTypeId: 1n, module: ADDR.validatorA, reason: 'r' });
    expect(listener).toHaveBeenCalledOnce();
  });
});
