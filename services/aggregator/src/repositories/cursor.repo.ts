import type { PoolClient } from 'pg';
import { SQL } from '../db/sql.js';

// Cursor rows are only touched inside the caller's transaction.

export async function lockCursor(client: PoolClient, name: string): Promise<number> {
  await client.query(SQL.cursor.ensure, [name]);
  const { rows } = await client.query<{ lastTickId: string }>(SQL.cursor.lock, [name]);
  return rows.length ? Number(rows[0].lastTickId) : 0;
}

export async function advanceCursor(client: PoolClient, name: string, lastTickId: number): Promise<void> {
  await client.query(SQL.cursor.advance, [name, lastTickId]);
}
