import { parseLimit } from '../utils/pagination.js';
import { httpError } from '../utils/errors.js';
import { nowSec, toEpochSec } from '../utils/time.js';
import { bucketStartSec } from './fold.service.js';
import { getCandleBefore, getCandleRange, getLatestCandle, setSentiment } from '../repositories/candles.repo.js';
import type { Candle, SeriesCandle } from '../types/domain.js';

type SeriesQuery = { from?: unknown; to?: unknown; limit?: unknown };

export const MAX_SERIES_MINUTES = 10080; // one week

/**
 * Continuous one-minute series over [fromSec, toSec]. A minute with no row is
 * carried forward as a flat candle at the previous close and sentiment with
 * zero volume; minutes before the first known close are left out.
 */
export function fillCandleGaps(rows: Candle[], fromSec: number, toSec: number, prior: Candle | null): SeriesCandle[] {
  const byTs = new Map(rows.map(r => [r.ts, r]));
  const out: SeriesCandle[] = [];
  let last: Candle | null = prior;

  const first = Math.ceil(fromSec / 60) * 60;
  for (let t = first; t <= toSec; t += 60) {
    const row = byTs.get(t);
    if (row) {
      out.push({ ...row, filled: false });
      last = row;
    } else if (last) {
      const c = last.close;
      out.push({
        symbol: last.symbol, ts: t,
        open: c, high: c, low: c, close: c,
        volume: 0, tradeCount: 0, sentiment: last.sentiment,
        filled: true,
      });
    }
  }
  return out;
}

function epochParam(raw: unknown, name: string): number | undefined {
  if (raw === undefined || raw === '') return undefined;
  const v = typeof raw === 'string' || typeof raw === 'number' ? toEpochSec(raw) : null;
  if (v === null) throw httpError(400, 'VALIDATION_ERROR', `invalid ${name}`);
  return v;
}

export async function candleSeriesSvc(symbol: string, q: SeriesQuery) {
  const sym = symbol.toUpperCase();
  const limit = parseLimit(q.limit, 1, 1440, 60);

  // never fill minutes that have not started
  const toSec = Math.min(bucketStartSec(epochParam(q.to, 'to') ?? nowSec()), bucketStartSec(nowSec()));
  const from = epochParam(q.from, 'from');
  const fromSec = from === undefined ? toSec - (limit - 1) * 60 : Math.ceil(from / 60) * 60;

  if (fromSec > toSec) throw httpError(400, 'VALIDATION_ERROR', 'from must not be after to');
  if ((toSec - fromSec) / 60 + 1 > MAX_SERIES_MINUTES)
    throw httpError(400, 'VALIDATION_ERROR', `window exceeds ${MAX_SERIES_MINUTES} minutes`);

  const [rows, prior] = await Promise.all([
    getCandleRange(sym, fromSec, toSec),
    getCandleBefore(sym, fromSec),
  ]);
  const items = fillCandleGaps(rows, fromSec, toSec, prior);
  return { symbol: sym, from: fromSec, to: toSec, items };
}

export async function latestCandleSvc(symbol: string) {
  const row = await getLatestCandle(symbol.toUpperCase());
  if (!row) throw httpError(404, 'NOT_FOUND', 'no candles');
  return row;
}

/** Touches only sentiment_score of the bucket, for one symbol or all of them. */
export async function updateSentimentSvc(bucketTime: number | string, score: number, symbol?: string) {
  const sec = toEpochSec(bucketTime);
  if (sec === null) throw httpError(400, 'VALIDATION_ERROR', 'invalid bucketTime');
  const bucket = bucketStartSec(sec);
  const updated = await setSentiment(bucket, score, symbol ? symbol.toUpperCase() : null);
  return { bucketTime: bucket, updated };
}
