/**
 * Wall clock that never runs backwards within the process, so ingest
 * timestamps stay ordered across NTP steps.
 */
export function monotonicClock(now: () => number = Date.now): () => number {
  let last = 0;
  return () => {
    const t = now();
    last = t > last ? t : last;
    return last;
  };
}
