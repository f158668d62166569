import { pool } from '../db/pool.js';
import { SQL } from '../db/sql.js';
import type { ForecastItem, ForecastRow } from '../types/domain.js';

type ForecastDbRow = {
  executionTime: number; forecastTime: number; predictedPrice: number;
  lowerBound: number | null; upperBound: number | null;
};

// one statement, so a batch is appended whole or not at all
export async function appendForecasts(executionSec: number, items: ForecastItem[]): Promise<number> {
  if (!items.length) return 0;
  const r = await pool.query(SQL.forecasts.appendBatch, [
    executionSec,
    items.map(i => i.forecastTime),
    items.map(i => i.predictedPrice),
    items.map(i => i.lowerBound),
    items.map(i => i.upperBound),
  ]);
  return r.rowCount ?? 0;
}

export async function getLatestForecastBatch(): Promise<ForecastRow[]> {
  const { rows } = await pool.query<ForecastDbRow>(SQL.forecasts.latestBatch);
  return rows.map(r => ({
    executionTime: Number(r.executionTime),
    forecastTime: Number(r.forecastTime),
    predictedPrice: Number(r.predictedPrice),
    lowerBound: r.lowerBound == null ? null : Number(r.lowerBound),
    upperBound: r.upperBound == null ? null : Number(r.upperBound),
  }));
}
