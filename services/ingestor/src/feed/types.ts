export type Tick = {
  idKey: string;        // redelivery identity (see parse.ts)
  symbol: string;       // upper case, e.g. "BTCUSDT"
  price: number;
  quantity: number;
  tradeId: number | null;
  tradeTimeMs: number;  // source-assigned, epoch millis
  ingestTimeMs: number; // assigned on receipt, epoch millis
};

export type FeedMessage =
  | { kind: 'trade'; tick: Tick }
  | { kind: 'ack'; id: number }
  | { kind: 'feed_error'; code: number | null; message: string }
  | { kind: 'rejected'; reason: RejectReason };

export type RejectReason =
  | 'invalid_json'
  | 'unknown_event'
  | 'missing_symbol'
  | 'invalid_price'
  | 'invalid_quantity'
  | 'invalid_trade_time';

export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'backoff';

export const CONNECTION_STATES: readonly ConnectionState[] = ['disconnected', 'connecting', 'connected', 'backoff'];

/** Minimal surface of a WebSocket client the connection loop depends on. */
export interface FeedSocket {
  on(event: 'open', listener: () => void): this;
  on(event: 'message', listener: (data: string) => void): this;
  on(event: 'ping', listener: () => void): this;
  on(event: 'error', listener: (err: Error) => void): this;
  on(event: 'close', listener: (code: number, reason: string) => void): this;
  send(data: string): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
  removeAllListeners(): this;
}

export type SocketFactory = (url: string) => FeedSocket;
