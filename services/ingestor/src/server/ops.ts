import http from 'node:http';
import { registry } from '../metrics/metrics.js';
import { dbHealth } from '../db/pool.js';
import { logger } from '../utils/logger.js';
import type { Ingestion } from '../services/ingest.service.js';

function json(res: http.ServerResponse, status: number, body: unknown) {
  res.writeHead(status, { 'content-type': 'application/json' });
  res.end(JSON.stringify(body));
}

export function startOpsServer(port: number, ingestion: Ingestion) {
  const server = http.createServer(async (req, res) => {
    const url = req.url || '/';
    try {
      if (url === '/ops/health/liveness') {
        json(res, 200, { ok: true });
        return;
      }
      if (url === '/ops/health/readiness') {
        const db = await dbHealth().catch((err: unknown) => {
          logger.warn({ err }, 'readiness db check failed');
          return false;
        });
        const feeds = ingestion.status();
        const connected = Object.values(feeds).filter(f => f.state === 'connected').length;
        const status = db && connected > 0 ? 'ready' : 'not_ready';
        json(res, status === 'ready' ? 200 : 503, { status, checks: { db: db ? 'ok' : 'fail' }, feeds });
        return;
      }
      if (url === '/ops/metrics') {
        res.writeHead(200, { 'content-type': registry.contentType });
        res.end(await registry.metrics());
        return;
      }
      json(res, 404, { error: { code: 'NOT_FOUND', message: 'unknown path' } });
    } catch (err) {
      logger.error({ err, url }, 'ops request failed');
      json(res, 500, { error: { code: 'INTERNAL', message: 'unexpected error' } });
    }
  });

  server.listen(port, () => {
    logger.info({ port }, 'ops server listening');
  });

  return server;
}
