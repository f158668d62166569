import type { PoolClient } from 'pg';
import { pool } from '../db/pool.js';
import { SQL } from '../db/sql.js';
import type { Candle, CandleDelta } from '../types/domain.js';

type CandleDbRow = {
  symbol: string; ts: number; open: number; high: number; low: number; close: number;
  volume: number; tradeCount: number; sentiment: number;
};

function toCandle(r: CandleDbRow): Candle {
  return {
    symbol: r.symbol,
    ts: Number(r.ts),
    open: Number(r.open),
    high: Number(r.high),
    low: Number(r.low),
    close: Number(r.close),
    volume: Number(r.volume),
    tradeCount: Number(r.tradeCount),
    sentiment: Number(r.sentiment),
  };
}

export async function upsertCandleDeltas(client: PoolClient, rows: CandleDelta[]): Promise<void> {
  if (!rows.length) return;
  await client.query(SQL.candles.upsertDeltas, [
    rows.map(r => r.symbol),
    rows.map(r => r.bucketSec),
    rows.map(r => r.open),
    rows.map(r => r.openTs),
    rows.map(r => r.openSeq),
    rows.map(r => r.high),
    rows.map(r => r.low),
    rows.map(r => r.close),
    rows.map(r => r.closeTs),
    rows.map(r => r.closeSeq),
    rows.map(r => r.volume),
    rows.map(r => r.tradeCount),
  ]);
}

// fromSec/toSec are inclusive bucket starts
export async function getCandleRange(symbol: string, fromSec: number, toSec: number): Promise<Candle[]> {
  const { rows } = await pool.query<CandleDbRow>(SQL.candles.range, [symbol, fromSec, toSec]);
  return rows.map(toCandle);
}

export async function getCandleBefore(symbol: string, beforeSec: number): Promise<Candle | null> {
  const { rows } = await pool.query<CandleDbRow>(SQL.candles.lastBefore, [symbol, beforeSec]);
  return rows.length ? toCandle(rows[0]) : null;
}

export async function getLatestCandle(symbol: string): Promise<Candle | null> {
  const { rows } = await pool.query<CandleDbRow>(SQL.candles.latest, [symbol]);
  return rows.length ? toCandle(rows[0]) : null;
}

export async function getNewestBuckets(): Promise<Array<{ symbol: string; ts: number }>> {
  const { rows } = await pool.query<{ symbol: string; ts: number }>(SQL.candles.newestPerSymbol);
  return rows.map(r => ({ symbol: r.symbol, ts: Number(r.ts) }));
}

/** Writes only sentiment_score; returns the number of candles touched. */
export async function setSentiment(bucketSec: number, score: number, symbol: string | null): Promise<number> {
  const r = await pool.query(SQL.candles.setSentiment, [bucketSec, score, symbol]);
  return r.rowCount ?? 0;
}
