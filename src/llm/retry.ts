export type RetryOptions = {
  /** Total attempts, first call included. */
  maxAttempts: number;
  baseDelayMs: number;
  isRetryable: (err: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (info: { attempt: number; maxAttempts: number; delayMs: number; error: unknown }) => void;
};

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_RETRY_BASE_DELAY_MS = 2000;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Delay before the retry that follows attempt `attemptIndex` (0-based): base, 2x base, 4x base... */
export function backoffDelayMs(baseDelayMs: number, attemptIndex: number): number {
  return baseDelayMs * 2 ** attemptIndex;
}

/**
 * Runs `operation` until it succeeds, a non-retryable error is thrown, or attempts run out.
 * The last retryable error is rethrown as-is.
 */
export async function withRetry<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
  const wait = options.sleep ?? sleep;

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (err) {
      if (!options.isRetryable(err) || attempt >= maxAttempts - 1) {
        throw err;
      }

      const delayMs = backoffDelayMs(options.baseDelayMs, attempt);
      options.onRetry?.({ attempt: attempt + 1, maxAttempts, delayMs, error: err });
      await wait(delayMs);
    }
  }
}
