import { pool } from '../db/pool.js';
import { INSERT_RAW_TICK } from '../db/sql.js';
import type { Tick } from '../feed/types.js';

export type AppendResult = 'inserted' | 'duplicate';

// One atomic row per tick; never touches other rows.
export async function appendTick(t: Tick): Promise<AppendResult> {
  const r = await pool.query(INSERT_RAW_TICK, [
    t.idKey,
    t.symbol,
    t.price,
    t.quantity,
    t.tradeId,
    t.tradeTimeMs,
    t.ingestTimeMs,
  ]);
  return r.rowCount === 1 ? 'inserted' : 'duplicate';
}
