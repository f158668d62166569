export type RetryOptions = {
  retries: number;   // attempts after the first
  baseMs: number;    // first delay; doubles per attempt
  onRetry?: (attempt: number, err: unknown, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
};

const defaultSleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

/**
 * Runs `fn` until it resolves or `retries` extra attempts have failed, waiting
 * baseMs * 2^(attempt-1) between attempts. The last error is rethrown.
 */
export async function withRetry<T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> {
  const sleep = opts.sleep ?? defaultSleep;
  let attempt = 0;
  for (;;) {
    try {
      return await fn();
    } catch (err) {
      attempt++;
      if (attempt > opts.retries) throw err;
      const delayMs = opts.baseMs * Math.pow(2, attempt - 1);
      opts.onRetry?.(attempt, err, delayMs);
      await sleep(delayMs);
    }
  }
}
