import { describe, it, expect } from 'vitest';
import { initialBackoff, nextBackoff, type BackoffState } from '../../src/feed/backoff.js';

const policy = { baseMs: 1000, maxMs: 30000, factor: 2 };

function delays(n: number, from: BackoffState = initialBackoff()) {
  const out: number[] = [];
  let state = from;
  for (let i = 0; i < n; i++) {
    const next = nextBackoff(policy, state);
    out.push(next.delayMs);
    state = next.state;
  }
  return { out, state };
}

describe('backoff', () => {
  it('grows exponentially from the base', () => {
    expect(delays(3).out).toEqual([1000, 2000, 4000]);
  });

  it('is non-decreasing and capped at the ceiling', () => {
    const { out } = delays(10);
    expect(out).toEqual([1000, 2000, 4000, 8000, 16000, 30000, 30000, 30000, 30000, 30000]);
    for (let i = 1; i < out.length; i++) expect(out[i]).toBeGreaterThanOrEqual(out[i - 1]);
  });

  it('counts failures in the carried state', () => {
    expect(delays(3).state).toEqual({ failures: 3 });
  });

  it('starts over at the base after a reset', () => {
    delays(3);
    expect(nextBackoff(policy, initialBackoff()).delayMs).toBe(1000);
  });

  it('never goes below the base when factor is 1', () => {
    const flat = { baseMs: 500, maxMs: 30000, factor: 1 };
    expect(nextBackoff(flat, { failures: 9 }).delayMs).toBe(500);
  });
});
