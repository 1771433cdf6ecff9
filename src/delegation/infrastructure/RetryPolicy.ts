// src/delegation/infrastructure/RetryPolicy.ts

/**
 * Backoff configuration for transient transport failures.
 */
export type RetryPolicy = {
  /**
   * Retries after the first attempt. 3 means at most 4 attempts.
   */
  maxRetries: number;
  baseDelayMs: number;
  multiplier: number;
  maxDelayMs: number;

  /**
   * Fraction of the delay applied as +/- jitter, in [0..1].
   */
  jitter: number;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  baseDelayMs: 500,
  multiplier: 2,
  maxDelayMs: 4_000,
  jitter: 0.2,
};

/**
 * Delay before the given retry (1-based):
 * min(base * multiplier^(retry-1), max) +/- jitter.
 */
export function computeBackoffDelay(
  policy: RetryPolicy,
  retry: number,
  random: () => number = Math.random,
): number {
  const exponential = policy.baseDelayMs * Math.pow(policy.multiplier, retry - 1);
  const bounded = Math.min(exponential, policy.maxDelayMs);
  const jitterDelta = bounded * policy.jitter;
  const jitter = random() * jitterDelta * 2 - jitterDelta;
  return Math.max(0, Math.round(bounded + jitter));
}
