// src/app.ts
import express from 'express';
import helmet from 'helmet';
import cors from 'cors';
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import YAML from 'yaml';
import { z } from 'zod';
import swaggerUi from 'swagger-ui-express';
import { pinoHttp } from 'pino-http';
import { requestId } from './middleware/request-id.js';
import { errorHandler } from './middleware/error.js';
import { requireApiKeyForWrites } from './middleware/auth.js';
import { apiRouter } from './routes/index.js';
import { cfg } from './config/index.js';
import { logger } from './utils/logger.js';

function openapiPath(): string | undefined {
  const candidates = [
    fileURLToPath(new URL('./openapi/openapi.yaml', import.meta.url)),
    path.resolve('services/aggregator/src/openapi/openapi.yaml'),
  ];
  return candidates.find((p) => fs.existsSync(p));
}

function mountDocs(app: express.Express) {
  const found = openapiPath();
  if (!found) {
    logger.warn('openapi file not found; swagger UI skipped');
    return;
  }
  try {
    const doc = z.record(z.unknown()).parse(YAML.parse(fs.readFileSync(found, 'utf8')));
    app.get('/docs.json', (_req, res) => res.json(doc));
    app.use('/docs', swaggerUi.serve, swaggerUi.setup(doc));
    logger.info({ openapi: found }, 'swagger UI mounted at /docs');
  } catch (err) {
    logger.error({ err, openapi: found }, 'failed to load openapi document');
  }
}

export function buildApp() {
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: cfg.cors.origins ?? true, credentials: false }));
  app.use(express.json({ limit: '1mb' }));
  app.use(requestId);

  if (cfg.env !== 'production') {
    app.use(pinoHttp({ logger, autoLogging: true }));
    mountDocs(app);
  }

  app.use(cfg.apiPrefix, requireApiKeyForWrites, apiRouter());
  app.use(errorHandler);

  return app;
}
