// src/utils/backoff.ts
// Exponential backoff with bounded jitter, shared by the fetcher and the
// quarantine mover.

export interface BackoffOptions {
  /** Delay before the first retry, in ms. */
  baseMs: number;
  /** Upper bound of the uniform random term added to each delay, in ms. */
  jitterMs: number;
  /** Hard ceiling for any single delay, in ms. */
  capMs: number;
}

export const DEFAULT_BACKOFF: BackoffOptions = {
  baseMs: 800,
  jitterMs: 300,
  capMs: 8000,
};

/**
 * min(base × 2^attempt + uniform(0, jitter), cap), with `attempt` counted from 0.
 * While jitter ≤ base the sequence is non-decreasing whatever the random draws.
 */
export function computeBackoffDelay(
  attempt: number,
  options: BackoffOptions = DEFAULT_BACKOFF,
  random: () => number = Math.random
): number {
  const exp = options.baseMs * Math.pow(2, Math.max(0, attempt));
  return Math.min(exp + random() * options.jitterMs, options.capMs);
}

export type SleepFn = (ms: number) => Promise<void>;

export const sleep: SleepFn = (ms) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });
