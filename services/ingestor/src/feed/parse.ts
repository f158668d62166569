import { z } from 'zod';
import type { FeedMessage, Tick } from './types.js';

const Envelope = z.object({ stream: z.string(), data: z.unknown() });

const Ack = z.object({ result: z.union([z.null(), z.array(z.unknown())]), id: z.number() });

const FeedError = z.union([
  z.object({ error: z.object({ code: z.number().optional(), msg: z.string() }) }),
  z.object({ code: z.number(), msg: z.string() }),
]);

// Field checks happen below so each failure maps to a reject reason.
const TradeEvent = z.object({
  e: z.literal('trade'),
  s: z.unknown(),
  t: z.unknown(),
  p: z.unknown(),
  q: z.unknown(),
  T: z.unknown(),
});

function positiveNumber(v: unknown): number | null {
  let n = Number.NaN;
  if (typeof v === 'number') n = v;
  else if (typeof v === 'string' && v.trim() !== '') n = Number(v);
  return Number.isFinite(n) && n > 0 ? n : null;
}

/**
 * Identity used to drop redelivered trades: the exchange trade id when the
 * feed sends one, else the (symbol, trade time, price, quantity) composite.
 */
export function tickIdKey(symbol: string, tradeId: number | null, tradeTimeMs: number, price: number, quantity: number): string {
  return tradeId !== null
    ? `${symbol}:t:${tradeId}`
    : `${symbol}:${tradeTimeMs}:${price}:${quantity}`;
}

function decode(raw: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(raw) as unknown };
  } catch {
    return { ok: false };
  }
}

/**
 * Strict parse-or-reject for one inbound frame. Never throws; anything that is
 * not a well-formed trade, an ack or a feed error comes back as `rejected`.
 */
export function parseFeedMessage(raw: string, receivedAtMs: number): FeedMessage {
  const decoded = decode(raw);
  if (!decoded.ok) return { kind: 'rejected', reason: 'invalid_json' };

  const env = Envelope.safeParse(decoded.value);
  const body = env.success ? env.data.data : decoded.value;

  const ack = Ack.safeParse(body);
  if (ack.success) return { kind: 'ack', id: ack.data.id };

  const err = FeedError.safeParse(body);
  if (err.success) {
    const d = err.data;
    return 'error' in d
      ? { kind: 'feed_error', code: d.error.code ?? null, message: d.error.msg }
      : { kind: 'feed_error', code: d.code, message: d.msg };
  }

  const ev = TradeEvent.safeParse(body);
  if (!ev.success) return { kind: 'rejected', reason: 'unknown_event' };
  const t = ev.data;

  if (typeof t.s !== 'string' || t.s.trim() === '') return { kind: 'rejected', reason: 'missing_symbol' };
  const price = positiveNumber(t.p);
  if (price === null) return { kind: 'rejected', reason: 'invalid_price' };
  const quantity = positiveNumber(t.q);
  if (quantity === null) return { kind: 'rejected', reason: 'invalid_quantity' };
  const tradeTimeMs = positiveNumber(t.T);
  if (tradeTimeMs === null || !Number.isInteger(tradeTimeMs)) return { kind: 'rejected', reason: 'invalid_trade_time' };

  const symbol = t.s.trim().toUpperCase();
  const tradeId = typeof t.t === 'number' && Number.isInteger(t.t) && t.t >= 0 ? t.t : null;

  const tick: Tick = {
    idKey: tickIdKey(symbol, tradeId, tradeTimeMs, price, quantity),
    symbol,
    price,
    quantity,
    tradeId,
    tradeTimeMs,
    ingestTimeMs: receivedAtMs,
  };
  return { kind: 'trade', tick };
}
