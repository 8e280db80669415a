/**
 * Axiom log provider.
 * Buffers events and ships them in batches to Axiom's ingest API, flattened
 * into Axiom's row shape (`_time`, level, message, service, then fields).
 *
 * Delivery is best effort: a failed flush keeps the batch for the next
 * attempt and records the failure in `lastFlushError`. The buffer is capped;
 * the oldest events are dropped first. Disabled when apiToken is empty.
 */

import type { ILogProvider, LogEvent } from './ILogProvider.js';

export interface AxiomLogProviderOptions {
  /** Axiom API token (Bearer). Empty string disables sending. */
  apiToken: string;
  dataset: string;
  /** Added to every row as `service`. Default: 'menu-veg-classifier'. */
  service?: string;
  /** Flush after this many buffered events. Default: 50. */
  flushThreshold?: number;
  /** Auto-flush interval in ms. Default: 10_000. 0 disables. */
  flushIntervalMs?: number;
  /** Maximum retained events while the ingest API is failing. Default: 1000. */
  maxBufferSize?: number;
}

export type AxiomRow = Record<string, unknown> & {
  _time: string;
  level: string;
  message: string;
  service: string;
};

const AXIOM_INGEST_URL = 'https://api.axiom.co/v1/datasets';

export class AxiomLogProvider implements ILogProvider {
  private buffer: AxiomRow[] = [];
  private readonly apiToken: string;
  private readonly dataset: string;
  private readonly service: string;
  private readonly flushThreshold: number;
  private readonly maxBufferSize: number;
  private flushTimer: ReturnType<typeof setInterval> | null = null;
  private readonly enabled: boolean;

  /** Events discarded because the buffer was full. */
  dropped = 0;
  /** Message of the most recent failed flush; null after a success. */
  lastFlushError: string | null = null;

  constructor(options: AxiomLogProviderOptions) {
    this.apiToken = options.apiToken;
    this.dataset = options.dataset;
    this.service = options.service ?? 'menu-veg-classifier';
    this.flushThreshold = options.flushThreshold ?? 50;
    this.maxBufferSize = options.maxBufferSize ?? 1000;
    this.enabled = Boolean(this.apiToken);

    const intervalMs = options.flushIntervalMs ?? 10_000;
    if (this.enabled && intervalMs > 0) {
      this.flushTimer = setInterval(() => {
        void this.flush();
      }, intervalMs);
      this.flushTimer.unref();
    }
  }

  get pending(): number {
    return this.buffer.length;
  }

  log(event: LogEvent): void {
    if (!this.enabled) return;

    this.buffer.push(this.toRow(event));
    if (this.buffer.length > this.maxBufferSize) {
      const excess = this.buffer.length - this.maxBufferSize;
      this.buffer.splice(0, excess);
      this.dropped += excess;
    }

    if (this.buffer.length >= this.flushThreshold) {
      void this.flush();
    }
  }

  async flush(): Promise<void> {
    if (!this.enabled || this.buffer.length === 0) return;

    const batch = [...this.buffer];

    try {
      const response = await fetch(`${AXIOM_INGEST_URL}/${encodeURIComponent(this.dataset)}/ingest`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiToken}`,
        },
        body: JSON.stringify(batch),
      });

      if (!response.ok) {
        this.lastFlushError = `Axiom ingest failed with status ${response.status}`;
        return;
      }

      // Rows that arrived during the request stay buffered.
      this.buffer.splice(0, Math.min(batch.length, this.buffer.length));
      this.lastFlushError = null;
    } catch (err) {
      this.lastFlushError = err instanceof Error ? err.message : String(err);
    }
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

  // ── Private ──

  private toRow(event: LogEvent): AxiomRow {
    const { level, message, timestamp, fields, ...rest } = event;
    return {
      ...fields,
      ...rest,
      _time: timestamp ?? new Date().toISOString(),
      level,
      message,
      service: this.service,
    };
  }
}
