/**
 * Retry policy applied by ResilienceService to every capability call
 */
export interface RetryPolicy {
  /** Total attempts including the first one */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Per-attempt timeout; 0 disables it */
  timeoutMs: number;
}

/**
 * Exponential backoff: base, 2×base, 4×base … capped at maxDelayMs.
 * `retryNumber` is 1 for the wait before the second attempt.
 */
export function computeBackoffDelay(
  retryNumber: number,
  policy: Pick<RetryPolicy, 'baseDelayMs' | 'maxDelayMs'>,
): number {
  const exponent = Math.max(0, retryNumber - 1);
  return Math.min(policy.baseDelayMs * Math.pow(2, exponent), policy.maxDelayMs);
}
