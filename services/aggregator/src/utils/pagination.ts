export function parseLimit(raw: unknown, min = 1, max = 1440, dflt = 60) {
  const n = Number(raw ?? dflt);
  if (!Number.isFinite(n)) return dflt;
  return Math.max(min, Math.min(max, Math.floor(n)));
}
