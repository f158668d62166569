import type { PoolClient } from 'pg';
import { SQL } from '../db/sql.js';
import type { RawTick } from '../types/domain.js';

type RawTickDbRow = { id: string; symbol: string; price: number; quantity: number; tradeTimeMs: number };

/** Settled raw ticks past `afterId`, in id order. */
export async function selectTicksAfter(
  client: PoolClient,
  afterId: number,
  limit: number,
  settleMs: number
): Promise<RawTick[]> {
  const { rows } = await client.query<RawTickDbRow>(SQL.ticks.afterCursor, [afterId, limit, settleMs]);
  return rows.map(r => ({
    id: Number(r.id),
    symbol: r.symbol,
    price: Number(r.price),
    quantity: Number(r.quantity),
    tradeTimeMs: Number(r.tradeTimeMs),
  }));
}
