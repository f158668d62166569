import { httpError } from '../utils/errors.js';
import { toEpochSec } from '../utils/time.js';
import { appendForecasts, getLatestForecastBatch } from '../repositories/forecasts.repo.js';
import type { ForecastItem } from '../types/domain.js';

type ForecastInput = {
  forecastTime: number | string;
  predictedPrice: number;
  lowerBound?: number | null;
  upperBound?: number | null;
};

export async function appendForecastsSvc(executionTime: number | string | undefined, items: ForecastInput[]) {
  const execSec = executionTime === undefined ? Date.now() / 1000 : toEpochSec(executionTime);
  if (execSec === null) throw httpError(400, 'VALIDATION_ERROR', 'invalid executionTime');

  const rows: ForecastItem[] = items.map((it, i) => {
    const t = toEpochSec(it.forecastTime);
    if (t === null) throw httpError(400, 'VALIDATION_ERROR', `invalid items[${i}].forecastTime`);
    return {
      forecastTime: t,
      predictedPrice: it.predictedPrice,
      lowerBound: it.lowerBound ?? null,
      upperBound: it.upperBound ?? null,
    };
  });

  const inserted = await appendForecasts(execSec, rows);
  return { executionTime: execSec, inserted };
}

export async function latestForecastBatchSvc() {
  const items = await getLatestForecastBatch();
  return { executionTime: items.length ? items[0].executionTime : null, items };
}
