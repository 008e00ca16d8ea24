/**
 * Retry with bounded, jittered exponential backoff
 */

export interface BackoffOptions {
  /** Delay before the second attempt */
  initialDelayMs: number;
  maxDelayMs: number;
  /** Default 2 */
  exponentialBase?: number;
}

export interface RetryOptions extends BackoffOptions {
  /** Total attempts including the first */
  maxAttempts: number;
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
  /** Source of jitter in [0, 1) */
  random?: () => number;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  initialDelayMs: 100,
  maxDelayMs: 2000,
};

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Delay after a failed attempt (1-based). The exponential delay is capped,
 * then jittered into its upper half.
 */
export function computeBackoffDelay(
  attempt: number,
  options: BackoffOptions,
  random: () => number = Math.random
): number {
  const base = options.exponentialBase ?? 2;
  const exponential = Math.min(
    options.maxDelayMs,
    options.initialDelayMs * base ** (attempt - 1)
  );
  const half = exponential / 2;
  return Math.round(half + random() * half);
}

/**
 * Run `fn` until it resolves, the attempts run out, or `shouldRetry`
 * declines. The last error is rethrown.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const wait = options.sleep ?? sleep;
  const maxAttempts = Math.max(1, options.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      const retryable = options.shouldRetry?.(error, attempt) ?? true;
      if (attempt >= maxAttempts || !retryable) {
        throw error;
      }
      const delayMs = computeBackoffDelay(attempt, options, options.random);
      options.onRetry?.(error, attempt, delayMs);
      await wait(delayMs);
    }
  }
}
