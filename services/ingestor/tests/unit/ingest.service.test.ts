import { EventEmitter } from 'node:events';
import { describe, it, expect, vi } from 'vitest';
import { normalizeSymbols, startIngestion } from '../../src/services/ingest.service.js';
import type { FeedSocket, Tick } from '../../src/feed/types.js';
import type { AppendResult } from '../../src/repositories/ticks.repo.js';

class FakeSocket extends EventEmitter implements FeedSocket {
  sent: string[] = [];
  send(data: string) { this.sent.push(data); }
  close() {}
  terminate() {}

  subscribedTo(): string {
    const { params } = JSON.parse(this.sent[0]) as { params: string[] };
    return params[0];
  }

  ack() {
    this.emit('open');
    const { id } = JSON.parse(this.sent[0]) as { id: number };
    this.emit('message', JSON.stringify({ result: null, id }));
  }
}

async function flush(turns = 200) {
  for (let i = 0; i < turns; i++) await Promise.resolve();
}

describe('normalizeSymbols', () => {
  it('upper-cases, trims and dedupes while keeping order', () => {
    expect(normalizeSymbols([' btcusdt', 'ETHUSDT', 'BTCUSDT', ''])).toEqual(['BTCUSDT', 'ETHUSDT']);
  });
});

describe('startIngestion', () => {
  it('runs each symbol on its own connection and store queue', async () => {
    const sockets: FakeSocket[] = [];
    const createSocket = () => {
      const s = new FakeSocket();
      sockets.push(s);
      return s;
    };
    const stored: string[] = [];
    const append = vi.fn(async (t: Tick): Promise<AppendResult> => {
      stored.push(t.idKey);
      return 'inserted';
    });
    const delays: number[] = [];

    const ing = startIngestion(['btcusdt', 'ethusdt'], {
      createSocket,
      append,
      sleep: async (ms) => { delays.push(ms); },
    });

    expect(sockets).toHaveLength(2);
    sockets[0].ack();
    sockets[1].emit('open');
    expect(sockets[0].subscribedTo()).toBe('btcusdt@trade');
    expect(sockets[1].subscribedTo()).toBe('ethusdt@trade');

    // ETH drops before it is acknowledged; BTC keeps streaming
    sockets[1].emit('close', 1006, '');
    await flush();
    sockets[0].emit('message', JSON.stringify({ e: 'trade', s: 'BTCUSDT', t: 7, p: '100', q: '1', T: 1704067210000 }));

    expect(delays).toEqual([1000]);
    expect(sockets).toHaveLength(3);
    const status = ing.status();
    expect(status.BTCUSDT.state).toBe('connected');
    expect(status.ETHUSDT).toMatchObject({ state: 'connecting', failures: 1 });

    await ing.stop();
    expect(stored).toEqual(['BTCUSDT:t:7']);
    expect(ing.status().BTCUSDT).toEqual({
      state: 'disconnected', failures: 0, pending: 0, stored: 1, duplicate: 0, lost: 0,
    });
    expect(ing.status().ETHUSDT.state).toBe('disconnected');
  });

  it('stamps ingest time from one non-decreasing clock across symbols', async () => {
    const sockets: FakeSocket[] = [];
    const stamps: Array<[string, number]> = [];
    let wall = 5000;

    const ing = startIngestion(['btcusdt', 'ethusdt'], {
      createSocket: () => {
        const s = new FakeSocket();
        sockets.push(s);
        return s;
      },
      append: async (t: Tick): Promise<AppendResult> => {
        stamps.push([t.symbol, t.ingestTimeMs]);
        return 'inserted';
      },
      sleep: async () => {},
      now: () => wall,
    });

    sockets[0].ack();
    sockets[0].emit('message', JSON.stringify({ e: 'trade', s: 'BTCUSDT', t: 1, p: '100', q: '1', T: 1704067210000 }));
    // wall clock steps back before the other symbol sees anything
    wall = 4000;
    sockets[1].ack();
    sockets[1].emit('message', JSON.stringify({ e: 'trade', s: 'ETHUSDT', t: 2, p: '50', q: '1', T: 1704067210500 }));

    await ing.stop();
    expect(Object.fromEntries(stamps)).toEqual({ BTCUSDT: 5000, ETHUSDT: 5000 });
  });
});
