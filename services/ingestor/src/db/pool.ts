import pg from 'pg';
import { cfg } from '../config/index.js';
import { logger } from '../utils/logger.js';

export const pool = new pg.Pool({ connectionString: cfg.databaseUrl });

// idle client dropped by the server; the next checkout opens a new one
pool.on('error', (err) => logger.warn({ err }, 'pg idle client error'));

export async function dbHealth(): Promise<boolean> {
  const r = await pool.query<{ ok: number }>('SELECT 1 AS ok');
  return r.rows[0]?.ok === 1;
}
