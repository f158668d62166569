import { pino } from 'pino';
import { cfg } from '../config/index.js';

export const logger = pino(
  cfg.logPretty
    ? { level: cfg.logLevel, base: { svc: 'aggregator' }, transport: { target: 'pino-pretty', options: { colorize: true } } }
    : { level: cfg.logLevel, base: { svc: 'aggregator' } }
);
