import { buildApp } from './app.js';
import { cfg } from './config/index.js';
import { logger } from './utils/logger.js';
import { pool } from './db/pool.js';
import { startPeriodic } from './scheduler/periodic.js';
import { runAggregationPass } from './services/aggregate.service.js';

const app = buildApp();
const server = app.listen(cfg.port, () => {
  logger.info({ port: cfg.port, prefix: cfg.apiPrefix }, 'aggregator api listening');
});

const aggregation = startPeriodic('aggregate_1m', cfg.agg.intervalMs, runAggregationPass);
void aggregation.runNow();

logger.info(
  { env: cfg.env, intervalMs: cfg.agg.intervalMs, batchMax: cfg.agg.batchMax, cursor: cfg.agg.cursorName },
  'aggregator started'
);

process.on('uncaughtException', (err) => {
  logger.error({ err }, 'uncaughtException');
  void shutdown(1);
});
process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'unhandledRejection');
  void shutdown(1);
});

process.on('SIGINT', () => void shutdown(0));
process.on('SIGTERM', () => void shutdown(0));

let closing = false;
async function shutdown(code: number) {
  if (closing) return;
  closing = true;
  logger.warn({ code }, 'aggregator shutting down');

  // let the in-flight pass commit or roll back before the pool goes away
  await aggregation.stop();
  await new Promise<void>((res) => server.close(() => res()));

  try {
    await pool.end();
  } catch (e) {
    logger.error({ err: e }, 'error closing pg pool');
  }

  logger.info('bye');
  process.exit(code);
}
