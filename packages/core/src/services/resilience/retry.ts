/**
 * Bounded retry with exponential backoff and jitter
 */

import { isRetryable, RateLimitError } from "../../errors";
import { systemClock, type Clock } from "../../utils/clock";

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitter: number; // fraction of the delay, 0.2 = +/-20%
  clock?: Clock;
  random?: () => number;
  /** Stops further attempts and backoff sleeps once aborted */
  signal?: AbortSignal;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Delay before the attempt that follows `attempt` (1-based)
 */
export function computeBackoff(
  attempt: number,
  options: Pick<RetryOptions, "baseDelayMs" | "maxDelayMs" | "jitter">,
  random: () => number = Math.random
): number {
  const exponential = Math.min(
    options.maxDelayMs,
    options.baseDelayMs * Math.pow(2, attempt - 1)
  );
  const spread = exponential * options.jitter * (random() * 2 - 1);
  return Math.round(Math.min(options.maxDelayMs, Math.max(0, exponential + spread)));
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const clock = options.clock ?? systemClock;
  const shouldRetry = options.shouldRetry ?? isRetryable;

  for (let attempt = 1; ; attempt++) {
    options.signal?.throwIfAborted();
    try {
      return await operation(attempt);
    } catch (error) {
      if (options.signal?.aborted || attempt >= options.maxAttempts || !shouldRetry(error)) {
        throw error;
      }

      let delayMs = computeBackoff(attempt, options, options.random);
      if (error instanceof RateLimitError && error.retryAfterMs !== undefined) {
        delayMs = Math.max(delayMs, error.retryAfterMs);
      }

      options.onRetry?.(error, attempt, delayMs);
      await clock.sleep(delayMs, options.signal);
    }
  }
}

/**
 * Worst-case wall time of one retried call: every attempt runs to its timeout
 * and every backoff takes its full jitter. Retry-After hints are not bounded
 * here.
 */
export function retryBudgetMs(
  attemptTimeoutMs: number,
  options: Pick<RetryOptions, "maxAttempts" | "baseDelayMs" | "maxDelayMs" | "jitter">
): number {
  let total = options.maxAttempts * attemptTimeoutMs;
  for (let attempt = 1; attempt < options.maxAttempts; attempt++) {
    total += computeBackoff(attempt, options, () => 1);
  }
  return total;
}
