import type { LatchkeyEventEmitter, LatchkeyEvents } from './EventEmitter.js';

/**
 * Holds events raised during an invocation until it commits.
 *
 * Events queued inside a frame that later rolls back are dropped with
 * {@link EventQueue.discard}; the outermost frame delivers the rest.
 */
export class EventQueue {
  private pending: Array<() => void> = [];

  constructor(private readonly emitter: LatchkeyEventEmitter) {}

  queue<K extends keyof LatchkeyEvents>(event: K, data: LatchkeyEvents[K]): void {
    this.pending.push(() => this.emitter.emit(event, data));
  }

  /** Position to roll back to */
  mark(): number {
    return this.pending.length;
  }

  discard(mark: number): void {
    this.pending.length = Math.min(mark, this.pending.length);
  }

  flush(): void {
    const deliveries = this.pending;
    this.pending = [];
    for (const deliver of deliveries) {
      deliver();
    }
  }
}
