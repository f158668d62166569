export type BackoffPolicy = {
  baseMs: number;
  maxMs: number;
  factor: number;
};

/** Consecutive failures since the last successful connection. */
export type BackoffState = { readonly failures: number };

export function initialBackoff(): BackoffState {
  return { failures: 0 };
}

/**
 * Delay before the next attempt and the state to carry forward.
 * delay = min(maxMs, baseMs * factor^failures), so the sequence never
 * decreases and never exceeds the ceiling.
 */
export function nextBackoff(policy: BackoffPolicy, state: BackoffState): { delayMs: number; state: BackoffState } {
  const raw = policy.baseMs * Math.pow(policy.factor, state.failures);
  const delayMs = Math.min(policy.maxMs, Math.max(policy.baseMs, Math.round(raw)));
  return { delayMs, state: { failures: state.failures + 1 } };
}
