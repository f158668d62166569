/** Epoch seconds from a number of seconds or an ISO-8601 string; null when unusable. */
export function toEpochSec(v: number | string): number | null {
  if (typeof v === 'number') return Number.isFinite(v) ? v : null;
  const trimmed = v.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) return Number(trimmed);
  const ms = Date.parse(trimmed);
  return Number.isNaN(ms) ? null : ms / 1000;
}

export function nowSec(): number {
  return Math.floor(Date.now() / 1000);
}
