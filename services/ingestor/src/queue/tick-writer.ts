// src/queue/tick-writer.ts
import { logger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import { storeRetries, ticksDuplicate, ticksLost, ticksStored } from '../metrics/metrics.js';
import { appendTick, type AppendResult } from '../repositories/ticks.repo.js';
import type { Tick } from '../feed/types.js';

export type TickWriterOptions = {
  symbol: string;
  maxPending: number;
  retry: { retries: number; baseMs: number };
  append?: (t: Tick) => Promise<AppendResult>;
  sleep?: (ms: number) => Promise<void>;
};

export type WriterStats = { stored: number; duplicate: number; lost: number };

/**
 * Serial append queue for one symbol. Ticks are written in receipt order; the
 * queue is bounded, so a slow or unreachable store costs dropped ticks, never
 * unbounded memory. A stall here only delays this symbol.
 */
export class TickWriter {
  private readonly queue: Tick[] = [];
  private draining: Promise<void> | null = null;
  private readonly append: (t: Tick) => Promise<AppendResult>;
  readonly stats: WriterStats = { stored: 0, duplicate: 0, lost: 0 };

  constructor(private readonly opts: TickWriterOptions) {
    this.append = opts.append ?? appendTick;
  }

  enqueue(t: Tick): boolean {
    if (this.queue.length >= this.opts.maxPending) {
      this.stats.lost++;
      ticksLost.inc({ symbol: this.opts.symbol, cause: 'queue_full' });
      logger.warn({ symbol: this.opts.symbol, idKey: t.idKey, pending: this.queue.length }, 'writer queue full; tick dropped');
      return false;
    }
    this.queue.push(t);
    if (!this.draining) this.draining = this.drainLoop();
    return true;
  }

  pending(): number {
    return this.queue.length;
  }

  /** Resolves once everything queued so far is written or dropped. */
  async drain(): Promise<void> {
    while (this.draining) await this.draining;
  }

  private async drainLoop(): Promise<void> {
    for (let t = this.queue.shift(); t; t = this.queue.shift()) {
      await this.write(t);
    }
    this.draining = null;
  }

  private async write(t: Tick): Promise<void> {
    try {
      const res = await withRetry(() => this.append(t), {
        retries: this.opts.retry.retries,
        baseMs: this.opts.retry.baseMs,
        sleep: this.opts.sleep,
        onRetry: (attempt, err, delayMs) => {
          storeRetries.inc();
          logger.warn({ symbol: t.symbol, attempt, delayMs, err }, 'raw tick append failed; retrying');
        },
      });
      if (res === 'inserted') {
        this.stats.stored++;
        ticksStored.inc({ symbol: t.symbol });
      } else {
        this.stats.duplicate++;
        ticksDuplicate.inc({ symbol: t.symbol });
      }
    } catch (err) {
      this.stats.lost++;
      ticksLost.inc({ symbol: t.symbol, cause: 'store_unavailable' });
      logger.error({ symbol: t.symbol, idKey: t.idKey, err }, 'raw tick dropped after retries');
    }
  }
}
