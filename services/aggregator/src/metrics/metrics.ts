import { Registry, collectDefaultMetrics, Counter, Gauge, Histogram } from 'prom-client';

export const registry = new Registry();
collectDefaultMetrics({ register: registry });

export const httpReqDuration = new Histogram({
  name: 'http_request_duration_ms',
  help: 'HTTP request duration',
  labelNames: ['method', 'route', 'code'],
  buckets: [10, 25, 50, 100, 250, 500, 1000, 2000, 5000],
  registers: [registry],
});

export const aggPasses = new Counter({ name: 'aggregator_passes_total', help: 'Committed aggregation passes', registers: [registry] });
export const aggPassFailures = new Counter({ name: 'aggregator_pass_failures_total', help: 'Passes rolled back after retries', registers: [registry] });
export const aggRetries = new Counter({ name: 'aggregator_store_retries_total', help: 'Pass attempts retried', registers: [registry] });
export const aggTicksFolded = new Counter({ name: 'aggregator_ticks_folded_total', help: 'Raw ticks folded into candles', registers: [registry] });
export const aggCandlesUpserted = new Counter({ name: 'aggregator_candles_upserted_total', help: 'Candle rows merged', registers: [registry] });
export const aggCursor = new Gauge({ name: 'aggregator_cursor', help: 'Last raw tick id folded', registers: [registry] });

export const schedulerSkips = new Counter({
  name: 'scheduler_skipped_runs_total',
  help: 'Runs skipped because the previous one was still in flight',
  labelNames: ['task'],
  registers: [registry],
});
export const schedulerFailures = new Counter({
  name: 'scheduler_failed_runs_total',
  help: 'Runs that threw',
  labelNames: ['task'],
  registers: [registry],
});
