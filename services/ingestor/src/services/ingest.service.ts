import { cfg } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { monotonicClock } from '../utils/clock.js';
import { SymbolConnection } from '../feed/connection.js';
import { createWsSocket } from '../feed/socket.js';
import { TickWriter, type WriterStats } from '../queue/tick-writer.js';
import type { ConnectionState, SocketFactory, Tick } from '../feed/types.js';
import type { AppendResult } from '../repositories/ticks.repo.js';

export type IngestionDeps = {
  createSocket?: SocketFactory;
  append?: (t: Tick) => Promise<AppendResult>;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
  now?: () => number;
};

export type SymbolStatus = { state: ConnectionState; failures: number; pending: number } & WriterStats;

export type Ingestion = {
  symbols: string[];
  status(): Record<string, SymbolStatus>;
  stop(): Promise<void>;
};

export function normalizeSymbols(symbols: string[]): string[] {
  return [...new Set(symbols.map(s => s.trim().toUpperCase()).filter(Boolean))];
}

/**
 * One independent connection + writer pair per symbol. Nothing is shared
 * between pairs, so a reconnect or a slow store on one symbol leaves the
 * others untouched.
 */
export function startIngestion(symbols: string[], deps: IngestionDeps = {}): Ingestion {
  const list = normalizeSymbols(symbols);
  // one ingest clock for the whole process
  const clock = monotonicClock(deps.now);
  const pairs = list.map((symbol) => {
    const writer = new TickWriter({
      symbol,
      maxPending: cfg.writerMaxPending,
      retry: { retries: cfg.store.retry, baseMs: cfg.store.retryBaseMs },
      append: deps.append,
    });
    const conn = new SymbolConnection({
      symbol,
      url: cfg.feedUrl,
      policy: cfg.backoff,
      livenessTimeoutMs: cfg.livenessTimeoutMs,
      subscribeTimeoutMs: cfg.subscribeTimeoutMs,
      createSocket: deps.createSocket ?? ((url) => createWsSocket(url, cfg.subscribeTimeoutMs)),
      sleep: deps.sleep,
      now: clock,
    });
    conn.on('tick', (t: Tick) => { writer.enqueue(t); });
    return { symbol, conn, writer };
  });

  for (const p of pairs) p.conn.start();
  logger.info({ symbols: list, feedUrl: cfg.feedUrl }, 'ingestion started');

  return {
    symbols: list,
    status() {
      const out: Record<string, SymbolStatus> = {};
      for (const p of pairs) {
        out[p.symbol] = {
          state: p.conn.getState(),
          failures: p.conn.getFailures(),
          pending: p.writer.pending(),
          ...p.writer.stats,
        };
      }
      return out;
    },
    async stop() {
      // close subscriptions first so nothing new is queued, then flush writers
      await Promise.all(pairs.map(p => p.conn.stop()));
      await Promise.all(pairs.map(p => p.writer.drain()));
      logger.info({ symbols: list }, 'ingestion stopped');
    },
  };
}
