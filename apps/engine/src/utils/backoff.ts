export interface BackoffPolicy {
  initialIntervalMs: number;
  multiplier: number;
  maxIntervalMs: number;
  // fraction of the delay, applied as ± spread
  jitter: number;
}

export const DEFAULT_BACKOFF: BackoffPolicy = {
  initialIntervalMs: 1000,
  multiplier: 2,
  maxIntervalMs: 5 * 60_000,
  jitter: 0.1,
};

// Exponential backoff: base-2 gives 1s → 2s → 4s → 8s (capped at maxIntervalMs).
// attempt is 1-indexed; attempt=1 waits initialIntervalMs, attempt=2 waits 2x that, etc.
export function calculateBackOff(
  attempt: number,
  policy: BackoffPolicy = DEFAULT_BACKOFF,
  random: () => number = Math.random
): number {
  const exponent = Math.max(0, attempt - 1);
  let delay = policy.initialIntervalMs * Math.pow(policy.multiplier, exponent);
  delay = Math.min(delay, policy.maxIntervalMs);
  // jitter spreads retries of tasks that failed together
  const spread = delay * policy.jitter;
  const offset = random() * spread * 2 - spread;
  return Math.max(0, Math.floor(delay + offset));
}
