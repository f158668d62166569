import type { ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { logger } from '../utils/logger.js';
import { isHttpError } from '../utils/errors.js';

export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
  if (err instanceof ZodError) {
    res.status(400).json({ error: { code: 'VALIDATION_ERROR', message: err.message } });
    return;
  }
  // body-parser sets status/type on malformed JSON
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    res.status(400).json({ error: { code: 'VALIDATION_ERROR', message: 'malformed JSON body' } });
    return;
  }
  if (isHttpError(err) && err.status < 500) {
    res.status(err.status).json({ error: { code: err.code, message: err.message } });
    return;
  }
  const status = isHttpError(err) ? err.status : 500;
  const code = isHttpError(err) ? err.code : 'INTERNAL_ERROR';
  logger.error({ err, rid: req.rid }, 'request error');
  res.status(status).json({ error: { code, message: err instanceof Error ? err.message : 'internal error' } });
};
