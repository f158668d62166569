import type { Server } from 'node:http';
import { cfg } from './config/index.js';
import { logger } from './utils/logger.js';
import { pool } from './db/pool.js';
import { startOpsServer } from './server/ops.js';
import { startIngestion } from './services/ingest.service.js';

const ingestion = startIngestion(cfg.symbols);
const opsServer: Server | null = cfg.opsPort > 0 ? startOpsServer(cfg.opsPort, ingestion) : null;

logger.info(
  {
    env: cfg.env,
    symbols: ingestion.symbols,
    feedUrl: cfg.feedUrl,
    backoff: cfg.backoff,
    livenessTimeoutMs: cfg.livenessTimeoutMs,
    opsPort: cfg.opsPort || undefined,
  },
  'ingestor started'
);

let closing = false;
async function shutdown(sig: string) {
  if (closing) return;
  closing = true;
  logger.warn({ sig }, 'ingestor shutting down');

  try {
    await ingestion.stop();
  } catch (e) {
    logger.error({ err: e }, 'error stopping ingestion');
  }

  if (opsServer) {
    await new Promise<void>((res) => opsServer.close(() => res()));
  }

  try {
    await pool.end();
  } catch (e) {
    logger.error({ err: e }, 'error closing pg pool');
  }

  logger.info('bye');
  process.exit(0);
}

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));
