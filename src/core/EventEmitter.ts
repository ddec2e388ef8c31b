import type { Address, Hex } from 'viem';

/**
 * Account-level events.
 */
export interface LatchkeyEvents {
  'module.installed': { moduleTypeId: bigint; module: Address };
  'module.uninstalled': { moduleTypeId: bigint; module: Address };
  'module.purgeFailed': { moduleTypeId: bigint; module: Address; reason: string };
  'execution.tryFailed': { index: number; returnData: Hex };
  'execution.tryDelegateFailed': { delegate: Address; returnData: Hex };
  'account.initialized': { account: Address; implementation?: Address };
  'account.redelegated': { account: Address; implementation?: Address };
  'error': { code: string; message: string };
}

/** Listener callback type */
type Listener<T> = (data: T) => void;

type ListenerMap = { [K in keyof LatchkeyEvents]?: Set<Listener<LatchkeyEvents[K]>> };

/**
 * Typed event emitter for account events.
 *
 * @example
 * ```typescript
 * const emitter = new LatchkeyEventEmitter();
 * emitter.on('execution.tryFailed', (data) => {
 *   console.log(`Unit ${data.index} reverted with ${data.returnData}`);
 * });
 * ```
 */
export class LatchkeyEventEmitter {
  private listeners: ListenerMap = {};

  /**
   * Subscribe to an event.
   *
   * @returns A function to unsubscribe
   */
  on<K extends keyof LatchkeyEvents>(
    event: K,
    listener: Listener<LatchkeyEvents[K]>,
  ): () => void {
    const listeners: { [P in K]?: Set<Listener<LatchkeyEvents[P]>> } = this.listeners;
    const set: Set<Listener<LatchkeyEvents[K]>> = listeners[event] ?? new Set();
    listeners[event] = set;
    set.add(listener);

    return () => this.off(event, listener);
  }

  /**
   * Unsubscribe from an event.
   */
  off<K extends keyof LatchkeyEvents>(
    event: K,
    listener: Listener<LatchkeyEvents[K]>,
  ): void {
    const set = this.listeners[event];
    if (set) {
      set.delete(listener);
      if (set.size === 0) {
        delete this.listeners[event];
      }
    }
  }

  /**
   * Emit an event to all subscribers.
   */
  emit<K extends keyof LatchkeyEvents>(
    event: K,
    data: LatchkeyEvents[K],
  ): void {
    const set = this.listeners[event];
    if (!set) return;

    for (const listener of set) {
      try {
        listener(data);
      } catch (err) {
        this.reportListenerError(event, err);
      }
    }
  }

  private reportListenerError(event: keyof LatchkeyEvents, err: unknown): void {
    const message = err instanceof Error ? err.message : String(err);
    if (event === 'error') {
      console.warn('[Latchkey] Error listener threw:', message);
      return;
    }
    // Re-emit listener errors as 'error' event so consumers can observe failures
    if ((this.listeners['error']?.size ?? 0) > 0) {
      this.emit('error', { code: 'LISTENER_ERROR', message });
    } else {
      console.error(`[Latchkey] Unhandled listener error on "${event}":`, message);
    }
  }
}
