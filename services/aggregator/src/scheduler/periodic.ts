import { logger } from '../utils/logger.js';
import { schedulerFailures, schedulerSkips } from '../metrics/metrics.js';

export type Periodic = {
  /** Runs the task now unless a run is in flight; resolves false when skipped. */
  runNow(): Promise<boolean>;
  isRunning(): boolean;
  /** Stops the interval and waits for the in-flight run. */
  stop(): Promise<void>;
};

/**
 * Fixed-interval runner with a skip-if-running guard: a tick that lands while
 * the previous run is still going is dropped, never queued.
 */
export function startPeriodic(name: string, intervalMs: number, task: () => Promise<unknown>): Periodic {
  let inFlight: Promise<void> | null = null;
  let stopped = false;

  const runNow = async (): Promise<boolean> => {
    if (stopped) return false;
    if (inFlight) {
      schedulerSkips.inc({ task: name });
      logger.debug({ task: name }, 'previous run still in flight; skipped');
      return false;
    }
    const run = Promise.resolve()
      .then(task)
      .then(
        () => undefined,
        (err: unknown) => {
          schedulerFailures.inc({ task: name });
          logger.error({ task: name, err }, 'periodic run failed');
        }
      )
      .finally(() => { inFlight = null; });
    inFlight = run;
    await run;
    return true;
  };

  const timer = setInterval(() => { void runNow(); }, intervalMs);
  logger.info({ task: name, intervalMs }, 'periodic task scheduled');

  return {
    runNow,
    isRunning: () => inFlight !== null,
    async stop() {
      stopped = true;
      clearInterval(timer);
      if (inFlight) await inFlight;
    },
  };
}
