/**
 * Axiom log provider.
 * Buffers events and ships them in batches to Axiom's ingest API.
 * A failed batch stays buffered for the next flush, up to `maxBuffer`
 * events; beyond that the oldest are dropped.
 */

import type { ILogProvider, LogEvent, LogLevel } from './ILogProvider.js';
import { LOG_LEVEL_ORDER } from './ILogProvider.js';

export interface AxiomLogProviderOptions {
  /** Axiom API token (Bearer). */
  apiToken: string;
  dataset: string;
  /** Stamped on every event as `service`. Default: 'govgap'. */
  service?: string;
  /** Flush after this many buffered events. Default: 50. */
  flushThreshold?: number;
  /** Auto-flush interval in ms. Default: 10_000. 0 disables. */
  flushIntervalMs?: number;
  /** Cap on retained events while Axiom is unreachable. Default: 1000. */
  maxBuffer?: number;
  minLevel?: LogLevel;
}

const AXIOM_INGEST_URL = 'https://api.axiom.co/v1/datasets';

interface AxiomEvent extends LogEvent {
  service: string;
  _time: string;
}

export class AxiomLogProvider implements ILogProvider {
  private buffer: AxiomEvent[] = [];
  private readonly apiToken: string;
  private readonly dataset: string;
  private readonly service: string;
  private readonly flushThreshold: number;
  private readonly maxBuffer: number;
  private readonly minLevel: LogLevel;
  private flushTimer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<void> | null = null;

  constructor(options: AxiomLogProviderOptions) {
    this.apiToken = options.apiToken;
    this.dataset = options.dataset;
    this.service = options.service ?? 'govgap';
    this.flushThreshold = options.flushThreshold ?? 50;
    this.maxBuffer = options.maxBuffer ?? 1000;
    this.minLevel = options.minLevel ?? 'info';

    const intervalMs = options.flushIntervalMs ?? 10_000;
    if (intervalMs > 0) {
      this.flushTimer = setInterval(() => {
        void this.flush();
      }, intervalMs);
      // Don't hold the process open for the timer
      this.flushTimer.unref();
    }
  }

  get pending(): number {
    return this.buffer.length;
  }

  log(event: LogEvent): void {
    if (LOG_LEVEL_ORDER[event.level] < LOG_LEVEL_ORDER[this.minLevel]) return;

    const timestamp = event.timestamp ?? new Date().toISOString();
    this.buffer.push({ ...event, timestamp, _time: timestamp, service: this.service });

    if (this.buffer.length > this.maxBuffer) {
      this.buffer.splice(0, this.buffer.length - this.maxBuffer);
    }

    if (this.buffer.length >= this.flushThreshold) {
      void this.flush();
    }
  }

  /** One request at a time; a flush during a flush waits for the first. */
  async flush(): Promise<void> {
    if (this.inFlight) return this.inFlight;
    if (this.buffer.length === 0) return;

    this.inFlight = this.send([...this.buffer]).finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  /** Stop the auto-flush timer and flush remaining events. */
  async dispose(): Promise<void> {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
    await this.flush();
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'info', message, fields });
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'warn', message, fields });
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'error', message, fields });
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'debug', message, fields });
  }

  private async send(batch: AxiomEvent[]): Promise<void> {
    try {
      const response = await fetch(`${AXIOM_INGEST_URL}/${this.dataset}/ingest`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiToken}`,
        },
        body: JSON.stringify(batch),
      });

      if (response.ok) {
        // Drop what was sent, by identity: the buffer may have been trimmed meanwhile
        const sent = new Set(batch);
        this.buffer = this.buffer.filter((event) => !sent.has(event));
      } else {
        console.error(`Axiom ingest rejected ${batch.length} events (HTTP ${response.status})`);
      }
    } catch (err) {
      // Logging must not take the app down; the batch stays buffered
      console.error(
        `Axiom ingest failed for ${batch.length} events: ${err instanceof Error ? err.message : String(err)}`
      );
    }
  }
}
