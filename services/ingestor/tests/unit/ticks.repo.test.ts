import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Mock } from 'vitest';

vi.mock('../../src/db/pool.js', () => {
  return { pool: { query: vi.fn() } };
});

import { appendTick } from '../../src/repositories/ticks.repo.js';
import { pool } from '../../src/db/pool.js';
import { INSERT_RAW_TICK } from '../../src/db/sql.js';

const tick = {
  idKey: 'BTCUSDT:t:42', symbol: 'BTCUSDT', price: 100.5, quantity: 0.25,
  tradeId: 42, tradeTimeMs: 1704067210000, ingestTimeMs: 1704067211000,
};

describe('ticks.repo', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('inserts one row with the tick fields', async () => {
    (pool.query as unknown as Mock).mockResolvedValue({ rowCount: 1 });
    await expect(appendTick(tick)).resolves.toBe('inserted');
    expect(pool.query).toHaveBeenCalledWith(INSERT_RAW_TICK, [
      'BTCUSDT:t:42', 'BTCUSDT', 100.5, 0.25, 42, 1704067210000, 1704067211000,
    ]);
  });

  it('reports a duplicate when the id key already exists', async () => {
    (pool.query as unknown as Mock).mockResolvedValue({ rowCount: 0 });
    await expect(appendTick(tick)).resolves.toBe('duplicate');
  });

  it('propagates store errors to the caller', async () => {
    (pool.query as unknown as Mock).mockRejectedValue(new Error('connection terminated'));
    await expect(appendTick(tick)).rejects.toThrow('connection terminated');
  });
});
