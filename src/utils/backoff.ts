/**
 * Exponential Backoff Utility
 *
 * Computes delays between attempts with jitter and runs an operation
 * until it succeeds, fails permanently, or runs out of attempts.
 */

export interface RetryPolicy {
  initialMs: number;
  maxMs: number;
  factor: number;
  jitter: number;
  maxAttempts: number;  // total attempts, including the first
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  initialMs: 500,
  maxMs: 8000,
  factor: 2,
  jitter: 0.25,
  maxAttempts: 5,
};

/**
 * Compute the delay before retrying after a failed attempt.
 *
 * @param policy - Retry policy configuration
 * @param attempt - Zero-based number of the attempt that just failed
 * @param random - Source of randomness in [0, 1)
 * @returns Delay in milliseconds, or null if no attempts remain
 */
export function computeBackoff(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number | null {
  if (attempt + 1 >= policy.maxAttempts) return null;

  const base = policy.initialMs * Math.pow(policy.factor, attempt);
  const capped = Math.min(base, policy.maxMs);

  // Apply jitter: ±jitter% of the computed delay
  const jitterRange = capped * policy.jitter;
  const jitterOffset = (random() * 2 - 1) * jitterRange;

  return Math.round(capped + jitterOffset);
}

export interface RetryOptions {
  policy: RetryPolicy;
  shouldRetry: (error: unknown) => boolean;
  /** Server-requested delay for this error, overriding the computed backoff (capped at policy.maxMs) */
  delayHint?: (error: unknown) => number | null;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `operation` until it resolves. Errors rejected by `shouldRetry`, and the
 * error of the last allowed attempt, are rethrown unchanged.
 */
export async function withRetry<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const wait = options.sleep ?? sleep;

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error: unknown) {
      if (!options.shouldRetry(error)) throw error;

      const backoff = computeBackoff(options.policy, attempt, options.random);
      if (backoff === null) throw error;

      // A server hint may shorten or stretch the wait, never past maxMs
      const delayMs = Math.min(options.delayHint?.(error) ?? backoff, options.policy.maxMs);
      options.onRetry?.(error, attempt, delayMs);
      await wait(delayMs);
    }
  }
}
