// src/config/index.ts
import { z } from 'zod';

function parseCorsOrigins(value?: string): '*' | string[] | undefined {
  if (!value) return undefined;
  if (value.trim() === '*') return '*';
  const origins = value
    .split(',')
    .map((part) => part.trim())
    .filter(Boolean);
  return origins.length ? origins : undefined;
}

const Env = z.object({
  NODE_ENV: z.enum(['development','test','production']).default('development'),
  PORT: z.coerce.number().int().positive().default(4100),
  API_PREFIX: z.string().default('/api/v1'),
  API_KEY: z.string().default('dev-key'),
  CORS_ALLOW_ORIGINS: z.string().optional(),

  DATABASE_URL: z.string(),

  // periodic fold
  AGG_INTERVAL_MS: z.coerce.number().int().positive().default(5000),
  AGG_BATCH_MAX: z.coerce.number().int().positive().default(5000),
  AGG_SETTLE_MS: z.coerce.number().int().nonnegative().default(2000),
  AGG_CURSOR_NAME: z.string().min(1).default('candles_1m'),

  STORE_RETRY: z.coerce.number().int().nonnegative().default(3),
  STORE_RETRY_BASE_MS: z.coerce.number().int().positive().default(200),

  STALENESS_SEC: z.coerce.number().int().positive().default(120),

  LOG_LEVEL: z.enum(['fatal','error','warn','info','debug','trace','silent']).default('info'),
  LOG_PRETTY: z.union([z.literal('1'), z.literal('0')]).default('1'),
});

const e = Env.parse(process.env);

export const cfg = {
  env: e.NODE_ENV,
  port: e.PORT,
  apiPrefix: e.API_PREFIX,
  apiKey: e.API_KEY,
  cors: { origins: parseCorsOrigins(e.CORS_ALLOW_ORIGINS) },

  databaseUrl: e.DATABASE_URL,

  agg: {
    intervalMs: e.AGG_INTERVAL_MS,
    batchMax: e.AGG_BATCH_MAX,
    settleMs: e.AGG_SETTLE_MS,
    cursorName: e.AGG_CURSOR_NAME,
  },
  store: { retry: e.STORE_RETRY, retryBaseMs: e.STORE_RETRY_BASE_MS },
  stalenessSec: e.STALENESS_SEC,

  logLevel: e.LOG_LEVEL,
  logPretty: e.LOG_PRETTY === '1',
} as const;
