import { cfg } from '../config/index.js';
import { pool } from '../db/pool.js';
import { logger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import { aggCandlesUpserted, aggCursor, aggPasses, aggPassFailures, aggRetries, aggTicksFolded } from '../metrics/metrics.js';
import { advanceCursor, lockCursor } from '../repositories/cursor.repo.js';
import { selectTicksAfter } from '../repositories/ticks.repo.js';
import { upsertCandleDeltas } from '../repositories/candles.repo.js';
import { foldTicks } from './fold.service.js';
import type { PassResult } from '../types/domain.js';

export type PassStatus = {
  lastSuccessAt: number | null;  // epoch ms
  lastFailureAt: number | null;
  lastError: string | null;
  last: PassResult | null;
};

const status: PassStatus = { lastSuccessAt: null, lastFailureAt: null, lastError: null, last: null };

export function passStatus(): PassStatus {
  return { ...status };
}

/**
 * One transactional step: lock the cursor row, fold the ticks past it, merge
 * the deltas and move the cursor. Either all of it commits or none of it does.
 */
export async function aggregateOnce(): Promise<PassResult> {
  const { cursorName, batchMax, settleMs } = cfg.agg;
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const cursor = await lockCursor(client, cursorName);
    const ticks = await selectTicksAfter(client, cursor, batchMax, settleMs);
    if (!ticks.length) {
      await client.query('COMMIT');
      return { ticks: 0, candles: 0, cursor };
    }

    const deltas = foldTicks(ticks);
    await upsertCandleDeltas(client, deltas);
    const next = ticks.reduce((max, t) => Math.max(max, t.id), cursor);
    await advanceCursor(client, cursorName, next);
    await client.query('COMMIT');
    return { ticks: ticks.length, candles: deltas.length, cursor: next };
  } catch (err) {
    try {
      await client.query('ROLLBACK');
    } catch (rbErr) {
      logger.warn({ err: rbErr }, 'rollback failed');
    }
    throw err;
  } finally {
    client.release();
  }
}

/** Retried pass; a pass that still fails leaves its ticks for the next one. */
export async function runAggregationPass(): Promise<PassResult> {
  try {
    const res = await withRetry(aggregateOnce, {
      retries: cfg.store.retry,
      baseMs: cfg.store.retryBaseMs,
      onRetry: (attempt, err, delayMs) => {
        aggRetries.inc();
        logger.warn({ attempt, delayMs, err }, 'aggregation pass failed; retrying');
      },
    });
    aggPasses.inc();
    aggTicksFolded.inc(res.ticks);
    aggCandlesUpserted.inc(res.candles);
    aggCursor.set(res.cursor);
    status.lastSuccessAt = Date.now();
    status.last = res;
    if (res.ticks) logger.debug(res, 'aggregation pass committed');
    return res;
  } catch (err) {
    aggPassFailures.inc();
    status.lastFailureAt = Date.now();
    status.lastError = err instanceof Error ? err.message : String(err);
    throw err;
  }
}
