import type { CandleDelta, RawTick } from '../types/domain.js';

export function bucketStartSec(tsSec: number): number {
  return Math.floor(tsSec / 60) * 60;
}

/** Trade time first; ties go to ingest order (raw tick id). */
export function compareTicks(a: Pick<RawTick, 'tradeTimeMs' | 'id'>, b: Pick<RawTick, 'tradeTimeMs' | 'id'>): number {
  return a.tradeTimeMs - b.tradeTimeMs || a.id - b.id;
}

function before(aTs: number, aSeq: number, bTs: number, bSeq: number): boolean {
  return compareTicks({ tradeTimeMs: aTs, id: aSeq }, { tradeTimeMs: bTs, id: bSeq }) < 0;
}

/**
 * Reduces ticks to one delta per (bucket, symbol). Ticks are deduplicated by
 * id and folded in trade-time order, so the result does not depend on the
 * order they were handed in.
 */
export function foldTicks(ticks: RawTick[]): CandleDelta[] {
  const unique = new Map<number, RawTick>();
  for (const t of ticks) if (!unique.has(t.id)) unique.set(t.id, t);
  const ordered = [...unique.values()].sort(compareTicks);

  const by = new Map<string, CandleDelta>();
  for (const t of ordered) {
    const bucketSec = bucketStartSec(Math.floor(t.tradeTimeMs / 1000));
    const k = `${t.symbol}|${bucketSec}`;
    const cur = by.get(k);

    if (!cur) {
      by.set(k, {
        symbol: t.symbol, bucketSec,
        open: t.price, openTs: t.tradeTimeMs, openSeq: t.id,
        high: t.price,
        low: t.price,
        close: t.price, closeTs: t.tradeTimeMs, closeSeq: t.id,
        volume: t.quantity,
        tradeCount: 1,
      });
    } else {
      cur.high = Math.max(cur.high, t.price);
      cur.low = Math.min(cur.low, t.price);
      cur.close = t.price; cur.closeTs = t.tradeTimeMs; cur.closeSeq = t.id;
      cur.volume += t.quantity;
      cur.tradeCount += 1;
    }
  }

  return [...by.values()];
}

/** In-memory twin of the candle upsert: the same merge the store applies on conflict. */
export function mergeCandle(existing: CandleDelta | null, delta: CandleDelta): CandleDelta {
  if (!existing) return { ...delta };
  const takeOpen = before(delta.openTs, delta.openSeq, existing.openTs, existing.openSeq);
  const takeClose = before(existing.closeTs, existing.closeSeq, delta.closeTs, delta.closeSeq);
  return {
    symbol: existing.symbol,
    bucketSec: existing.bucketSec,
    open: takeOpen ? delta.open : existing.open,
    openTs: takeOpen ? delta.openTs : existing.openTs,
    openSeq: takeOpen ? delta.openSeq : existing.openSeq,
    high: Math.max(existing.high, delta.high),
    low: Math.min(existing.low, delta.low),
    close: takeClose ? delta.close : existing.close,
    closeTs: takeClose ? delta.closeTs : existing.closeTs,
    closeSeq: takeClose ? delta.closeSeq : existing.closeSeq,
    volume: existing.volume + delta.volume,
    tradeCount: existing.tradeCount + delta.tradeCount,
  };
}
