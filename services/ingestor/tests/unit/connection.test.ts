import { EventEmitter } from 'node:events';
import { describe, it, expect, afterEach, vi } from 'vitest';
import { SymbolConnection } from '../../src/feed/connection.js';
import type { FeedSocket, Tick } from '../../src/feed/types.js';

// In-process stand-in for the ws adapter.
class FakeSocket extends EventEmitter implements FeedSocket {
  sent: string[] = [];
  closedWith: number | null = null;
  terminated = false;

  send(data: string) { this.sent.push(data); }
  close(code?: number) { this.closedWith = code ?? 1000; }
  terminate() { this.terminated = true; }

  sentMethods(): string[] {
    return this.sent.map(s => (JSON.parse(s) as { method: string }).method);
  }

  open() { this.emit('open'); }

  ack() {
    this.open();
    const { id } = JSON.parse(this.sent[0]) as { id: number };
    this.emit('message', JSON.stringify({ result: null, id }));
  }

  fail() {
    this.emit('error', new Error('connect ECONNREFUSED'));
    this.emit('close', 1006, '');
  }
}

type Step = 'fail' | 'ack' | 'open' | 'reject' | 'hang';

function scripted(script: Step[]) {
  const sockets: FakeSocket[] = [];
  const factory = () => {
    const s = new FakeSocket();
    const step = script[sockets.length] ?? 'hang';
    sockets.push(s);
    queueMicrotask(() => {
      if (step === 'fail') s.fail();
      else if (step === 'ack') s.ack();
      else if (step === 'open') s.open();
      else if (step === 'reject') {
        s.open();
        s.emit('message', JSON.stringify({ error: { code: 2, msg: 'Invalid request' }, id: 1 }));
      }
    });
    return s;
  };
  return { sockets, factory };
}

async function flush(turns = 200) {
  for (let i = 0; i < turns; i++) await Promise.resolve();
}

function build(script: Step[]) {
  const { sockets, factory } = scripted(script);
  const delays: number[] = [];
  const conn = new SymbolConnection({
    symbol: 'BTCUSDT',
    url: 'wss://feed.test/ws',
    policy: { baseMs: 1000, maxMs: 30000, factor: 2 },
    livenessTimeoutMs: 30000,
    subscribeTimeoutMs: 10000,
    createSocket: factory,
    sleep: async (ms) => { delays.push(ms); },
  });
  return { conn, sockets, delays };
}

const tradeMsg = (symbol: string, t: number) => JSON.stringify({
  e: 'trade', s: symbol, t, p: '100', q: '1', T: 1704067210000,
});

describe('SymbolConnection', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('backs off 1s, 2s, 4s over three failures and resets to 1s after connecting', async () => {
    const { conn, sockets, delays } = build(['fail', 'fail', 'fail', 'ack', 'hang']);
    conn.start();
    await flush();

    expect(delays).toEqual([1000, 2000, 4000]);
    expect(conn.getState()).toBe('connected');
    expect(conn.getFailures()).toBe(0);

    sockets[3].emit('close', 1006, '');
    await flush();

    expect(delays).toEqual([1000, 2000, 4000, 1000]);
    expect(sockets).toHaveLength(5);
    expect(conn.getState()).toBe('connecting');

    await conn.stop();
    expect(conn.getState()).toBe('disconnected');
    expect(sockets[4].terminated).toBe(true);
  });

  it('walks the state machine in order', async () => {
    const { conn, sockets } = build(['fail', 'ack']);
    const seen: string[] = [];
    conn.on('state', (s: string) => seen.push(s));
    conn.start();
    await flush();
    sockets[1].emit('close', 1001, 'going away');
    await flush();
    await conn.stop();

    expect(seen).toEqual([
      'connecting', 'backoff', 'connecting', 'connected', 'backoff', 'connecting', 'disconnected',
    ]);
  });

  it('subscribes to the symbol trade stream on open', async () => {
    const { conn, sockets } = build(['ack']);
    conn.start();
    await flush();
    expect(JSON.parse(sockets[0].sent[0])).toEqual({ method: 'SUBSCRIBE', params: ['btcusdt@trade'], id: 1 });
    await conn.stop();
  });

  it('unsubscribes and closes cleanly on stop while connected', async () => {
    const { conn, sockets } = build(['ack']);
    conn.start();
    await flush();
    await conn.stop();

    expect(sockets[0].sentMethods()).toEqual(['SUBSCRIBE', 'UNSUBSCRIBE']);
    expect(sockets[0].closedWith).toBe(1000);
    expect(sockets[0].terminated).toBe(false);
  });

  it('emits ticks for its own symbol only', async () => {
    const { conn, sockets } = build(['ack']);
    const ticks: Tick[] = [];
    conn.on('tick', (t: Tick) => ticks.push(t));
    conn.start();
    await flush();

    sockets[0].emit('message', tradeMsg('BTCUSDT', 1));
    sockets[0].emit('message', tradeMsg('ETHUSDT', 2));
    sockets[0].emit('message', tradeMsg('BTCUSDT', 3));

    expect(ticks.map(t => t.idKey)).toEqual(['BTCUSDT:t:1', 'BTCUSDT:t:3']);
    await conn.stop();
  });

  it('drops malformed messages without reconnecting', async () => {
    const { conn, sockets, delays } = build(['ack']);
    conn.start();
    await flush();

    sockets[0].emit('message', 'garbage');
    sockets[0].emit('message', JSON.stringify({ e: 'trade', s: 'BTCUSDT', p: 'NaN', q: '1', T: 1 }));
    await flush();

    expect(conn.getState()).toBe('connected');
    expect(sockets).toHaveLength(1);
    expect(delays).toEqual([]);
    await conn.stop();
  });

  it('treats a rejected subscription as a failure', async () => {
    const { conn, sockets, delays } = build(['reject', 'hang']);
    conn.start();
    await flush();

    expect(sockets[0].terminated).toBe(true);
    expect(delays).toEqual([1000]);
    expect(conn.getState()).toBe('connecting');
    await conn.stop();
  });

  it('gives up on a subscription that is never acknowledged', async () => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
    const { conn, sockets, delays } = build(['open', 'hang']);
    conn.start();
    await flush();
    expect(conn.getState()).toBe('connecting');

    vi.advanceTimersByTime(10000);
    await flush();

    expect(sockets[0].terminated).toBe(true);
    expect(delays).toEqual([1000]);
    await conn.stop();
  });

  it('forces a reconnect when the feed goes quiet', async () => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
    const { conn, sockets, delays } = build(['ack', 'hang']);
    conn.start();
    await flush();
    expect(conn.getState()).toBe('connected');

    vi.advanceTimersByTime(20000);
    sockets[0].emit('ping');
    vi.advanceTimersByTime(20000);
    sockets[0].emit('message', tradeMsg('BTCUSDT', 9));
    vi.advanceTimersByTime(29999);
    await flush();
    expect(conn.getState()).toBe('connected');
    expect(delays).toEqual([]);

    vi.advanceTimersByTime(1);
    await flush();
    expect(sockets[0].terminated).toBe(true);
    expect(delays).toEqual([1000]);
    expect(sockets).toHaveLength(2);
    await conn.stop();
  });
});
