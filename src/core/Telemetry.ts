/**
 * Anonymized operation counters.
 *
 * Collects operation names and coarse attributes such as call type or module
 * category. Addresses, hashes and signatures are never recorded: string
 * values that look like hex are dropped before buffering.
 *
 * Telemetry is opt-out: enabled by default but can be disabled via config.
 */
export class Telemetry {
  private readonly enabled: boolean;
  private readonly sink: TelemetrySink | undefined;
  private buffer: TelemetryEvent[] = [];
  private static readonly MAX_BUFFER_SIZE = 100;

  constructor(enabled: boolean, sink?: TelemetrySink) {
    this.enabled = enabled;
    this.sink = sink;
  }

  /**
   * Track an anonymized telemetry event.
   *
   * @param event - Event name (e.g., 'account.execute', 'module.install')
   * @param data - Coarse attributes; hex strings are stripped
   */
  track(event: string, data?: Record<string, string | number | boolean>): void {
    if (!this.enabled) return;

    const scrubbed: Record<string, string | number | boolean> = {};
    for (const [name, value] of Object.entries(data ?? {})) {
      if (typeof value === 'string' && /^0x[0-9a-fA-F]*$/.test(value)) continue;
      scrubbed[name] = value;
    }

    this.buffer.push({ event, data: scrubbed, timestamp: Date.now() });

    // Auto-flush when buffer is full
    if (this.buffer.length >= Telemetry.MAX_BUFFER_SIZE) {
      this.flush();
    }
  }

  /** Number of buffered, not yet flushed events */
  get pending(): number {
    return this.buffer.length;
  }

  /**
   * Hand buffered events to the sink, if one is configured, and clear the buffer.
   */
  flush(): void {
    if (!this.enabled || this.buffer.length === 0) return;

    const events = this.buffer;
    this.buffer = [];
    this.sink?.(events);
  }
}

/** Receiver of flushed telemetry batches */
export type TelemetrySink = (events: readonly TelemetryEvent[]) => void;

/** Buffered telemetry event */
export interface TelemetryEvent {
  event: string;
  data: Record<string, string | number | boolean>;
  timestamp: number;
}
