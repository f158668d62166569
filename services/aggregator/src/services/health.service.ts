import { cfg } from '../config/index.js';
import { dbHealth } from '../db/pool.js';
import { getNewestBuckets } from '../repositories/candles.repo.js';
import { passStatus } from './aggregate.service.js';
import { nowSec } from '../utils/time.js';

export async function readinessSvc() {
  const [dbOk] = await Promise.allSettled([dbHealth()]);
  const checks = { db: dbOk.status === 'fulfilled' && dbOk.value ? 'ok' : 'fail' };
  const status = checks.db === 'ok' ? 'ready' : 'not_ready';
  return { status, checks, aggregation: passStatus() };
}

/**
 * Age of the newest candle per symbol. Stale data is the only outward sign
 * of a feed or store that has been failing for a while.
 */
export async function freshnessSvc(now = nowSec()) {
  const rows = await getNewestBuckets();
  const symbols = rows.map(r => {
    const ageSec = Math.max(0, now - r.ts);
    return { symbol: r.symbol, lastBucket: r.ts, ageSec, stale: ageSec > cfg.stalenessSec };
  });
  const status = symbols.length && symbols.every(s => !s.stale) ? 'fresh' : 'stale';
  return { status, stalenessSec: cfg.stalenessSec, symbols };
}
