// src/config/index.ts
import { z } from 'zod';

function toArray(csv?: string): string[] {
  return (csv ?? '')
    .split(',')
    .map(s => s.trim().toUpperCase())
    .filter(Boolean);
}

const Env = z.object({
  NODE_ENV: z.enum(['development','test','production']).default('development'),
  OPS_PORT: z.coerce.number().int().nonnegative().default(0),

  DATABASE_URL: z.string(),

  // single-stream endpoint; one connection per symbol, subscribed after open
  FEED_URL: z.string().url().default('wss://stream.binance.com:9443/ws'),
  SYMBOLS: z.string().default('BTCUSDT,ETHUSDT,SOLUSDT,XRPUSDT'),

  // feed reconnect
  BACKOFF_BASE_MS: z.coerce.number().int().positive().default(1000),
  BACKOFF_MAX_MS: z.coerce.number().int().positive().default(30000),
  BACKOFF_FACTOR: z.coerce.number().min(1).default(2),
  LIVENESS_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  SUBSCRIBE_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),

  // store writes
  STORE_RETRY: z.coerce.number().int().nonnegative().default(3),
  STORE_RETRY_BASE_MS: z.coerce.number().int().positive().default(200),
  WRITER_MAX_PENDING: z.coerce.number().int().positive().default(1000),

  LOG_LEVEL: z.enum(['fatal','error','warn','info','debug','trace','silent']).default('info'),
  LOG_PRETTY: z.union([z.literal('1'), z.literal('0')]).default('1'),
});

const e = Env.parse(process.env);

export const cfg = {
  env: e.NODE_ENV,
  opsPort: e.OPS_PORT,

  databaseUrl: e.DATABASE_URL,

  feedUrl: e.FEED_URL,
  symbols: toArray(e.SYMBOLS),

  backoff: { baseMs: e.BACKOFF_BASE_MS, maxMs: e.BACKOFF_MAX_MS, factor: e.BACKOFF_FACTOR },
  livenessTimeoutMs: e.LIVENESS_TIMEOUT_MS,
  subscribeTimeoutMs: e.SUBSCRIBE_TIMEOUT_MS,

  store: { retry: e.STORE_RETRY, retryBaseMs: e.STORE_RETRY_BASE_MS },
  writerMaxPending: e.WRITER_MAX_PENDING,

  logLevel: e.LOG_LEVEL,
  logPretty: e.LOG_PRETTY === '1',
} as const;
