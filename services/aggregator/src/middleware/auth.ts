import type { Request, Response, NextFunction } from 'express';
import { cfg } from '../config/index.js';

// Reads are open; only the collaborator write paths (POST /webhooks/*) need a key.
export function requireApiKeyForWrites(req: Request, res: Response, next: NextFunction) {
  const url = req.originalUrl || req.url;
  const needsKey = req.method === 'POST' && url.startsWith(`${cfg.apiPrefix}/webhooks/`);
  if (!needsKey) return next();

  const headerKey = req.header('x-api-key');
  if (!headerKey || headerKey !== cfg.apiKey) {
    return res.status(401).json({
      error: { code: 'AUTH_REQUIRED', message: 'invalid or missing x-api-key' }
    });
  }
  return next();
}
