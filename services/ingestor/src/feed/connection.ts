/**
 * SymbolConnection - one live trade subscription for one symbol.
 *
 * disconnected -> connecting -> connected -> backoff -> connecting ...
 *
 * The backoff state lives on the instance and is only advanced through
 * nextBackoff(); connections for different symbols share nothing.
 */
import { EventEmitter } from 'node:events';
import { logger } from '../utils/logger.js';
import { monotonicClock } from '../utils/clock.js';
import { feedReconnects, feedState, ticksReceived, ticksRejected } from '../metrics/metrics.js';
import { initialBackoff, nextBackoff, type BackoffPolicy, type BackoffState } from './backoff.js';
import { parseFeedMessage } from './parse.js';
import { CONNECTION_STATES, type ConnectionState, type FeedSocket, type SocketFactory } from './types.js';

export type ConnectionOptions = {
  symbol: string;
  url: string;
  policy: BackoffPolicy;
  livenessTimeoutMs: number;
  subscribeTimeoutMs: number;
  createSocket: SocketFactory;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
  /** Ingest clock; pass the process-wide one so stamps stay ordered across symbols. */
  now?: () => number;
};

export function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise<void>((resolve) => {
    if (signal.aborted) { resolve(); return; }
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });
}

export class SymbolConnection extends EventEmitter {
  readonly symbol: string;
  private readonly stream: string;
  private readonly opts: ConnectionOptions;
  private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;
  private readonly clock: () => number;

  private abort = new AbortController();
  private state: ConnectionState = 'disconnected';
  private backoff: BackoffState = initialBackoff();
  private requestId = 0;
  private stopping = false;
  private loop: Promise<void> | null = null;
  private endSession: ((reason: string) => void) | null = null;

  constructor(opts: ConnectionOptions) {
    super();
    this.opts = opts;
    this.symbol = opts.symbol.toUpperCase();
    this.stream = `${this.symbol.toLowerCase()}@trade`;
    this.sleep = opts.sleep ?? abortableSleep;
    this.clock = opts.now ?? monotonicClock();
    this.setMetricState('disconnected');
  }

  getState(): ConnectionState {
    return this.state;
  }

  /** Consecutive failures since the last successful subscription. */
  getFailures(): number {
    return this.backoff.failures;
  }

  start(): void {
    if (this.loop) return;
    this.stopping = false;
    this.abort = new AbortController();
    this.loop = this.run();
  }

  /** Unsubscribes and closes best effort, then waits for the loop to exit. */
  async stop(): Promise<void> {
    if (!this.loop) return;
    this.stopping = true;
    this.abort.abort();
    this.endSession?.('shutdown');
    await this.loop;
    this.loop = null;
  }

  private async run(): Promise<void> {
    while (!this.stopping) {
      this.transition('connecting');
      const reason = await this.session();
      if (this.stopping) break;

      this.transition('backoff');
      feedReconnects.inc({ symbol: this.symbol });
      const next = nextBackoff(this.opts.policy, this.backoff);
      this.backoff = next.state;
      logger.warn(
        { symbol: this.symbol, reason, delayMs: next.delayMs, failures: this.backoff.failures },
        'feed connection lost; backing off'
      );
      this.emit('backoff', next.delayMs);
      await this.sleep(next.delayMs, this.abort.signal);
    }
    this.transition('disconnected');
  }

  /** Resolves with the reason the session ended; never rejects. */
  private session(): Promise<string> {
    return new Promise<string>((resolve) => {
      let socket: FeedSocket;
      try {
        socket = this.opts.createSocket(this.opts.url);
      } catch (err) {
        logger.warn({ symbol: this.symbol, err }, 'feed socket could not be created');
        resolve('connect_failed');
        return;
      }

      const subscribeId = ++this.requestId;
      let ackTimer: NodeJS.Timeout | null = null;
      let liveTimer: NodeJS.Timeout | null = null;
      let ended = false;

      const finish = (reason: string) => {
        if (ended) return;
        ended = true;
        if (ackTimer) clearTimeout(ackTimer);
        if (liveTimer) clearTimeout(liveTimer);
        this.endSession = null;
        socket.removeAllListeners();
        if (reason === 'shutdown' && this.state === 'connected') {
          socket.send(JSON.stringify({ method: 'UNSUBSCRIBE', params: [this.stream], id: ++this.requestId }));
          socket.close(1000, 'shutdown');
        } else {
          socket.terminate();
        }
        resolve(reason);
      };

      const armLiveness = () => {
        if (liveTimer) clearTimeout(liveTimer);
        liveTimer = setTimeout(() => finish('liveness_timeout'), this.opts.livenessTimeoutMs);
      };

      socket.on('open', () => {
        socket.send(JSON.stringify({ method: 'SUBSCRIBE', params: [this.stream], id: subscribeId }));
        ackTimer = setTimeout(() => finish('subscribe_timeout'), this.opts.subscribeTimeoutMs);
      });

      socket.on('message', (data) => {
        if (this.state === 'connected') armLiveness();
        const msg = parseFeedMessage(data, this.clock());
        switch (msg.kind) {
          case 'ack':
            if (msg.id === subscribeId && this.state === 'connecting') {
              if (ackTimer) { clearTimeout(ackTimer); ackTimer = null; }
              this.backoff = initialBackoff();
              this.transition('connected');
              armLiveness();
            }
            return;
          case 'feed_error':
            logger.warn({ symbol: this.symbol, code: msg.code, message: msg.message }, 'feed rejected subscription');
            finish('subscription_failed');
            return;
          case 'rejected':
            ticksRejected.inc({ reason: msg.reason });
            logger.debug({ symbol: this.symbol, reason: msg.reason }, 'feed message dropped');
            return;
          case 'trade':
            if (msg.tick.symbol !== this.symbol) {
              ticksRejected.inc({ reason: 'unexpected_symbol' });
              return;
            }
            ticksReceived.inc({ symbol: this.symbol });
            this.emit('tick', msg.tick);
            return;
        }
      });

      socket.on('ping', () => {
        if (this.state === 'connected') armLiveness();
      });
      socket.on('error', (err) => {
        logger.warn({ symbol: this.symbol, err: err.message }, 'feed socket error');
        finish('socket_error');
      });
      socket.on('close', (code) => finish(`closed_${code}`));

      this.endSession = finish;
    });
  }

  private transition(next: ConnectionState): void {
    if (this.state === next) return;
    const prev = this.state;
    this.state = next;
    this.setMetricState(next);
    logger.info({ symbol: this.symbol, from: prev, to: next }, 'feed state');
    this.emit('state', next, prev);
  }

  private setMetricState(current: ConnectionState): void {
    for (const s of CONNECTION_STATES) feedState.set({ symbol: this.symbol, state: s }, s === current ? 1 : 0);
  }
}
