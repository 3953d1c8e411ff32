/**
 * Exponential backoff for transient failures. Only the HTTP client retries;
 * nothing above it does.
 */

export interface RetryOptions {
  /** Attempts including the first one (default: 3) */
  maxAttempts?: number;
  /** Delay before the second attempt in milliseconds (default: 4000) */
  initialBackoffMs?: number;
  /** Upper bound for a single delay (default: 10000) */
  maxBackoffMs?: number;
  /** Decides whether an error is worth another attempt (default: all errors) */
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown, nextDelayMs: number) => void;
}

const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxAttempts: 3,
  initialBackoffMs: 4000,
  maxBackoffMs: 10000,
  isRetryable: () => true,
  onRetry: () => {},
};

export async function withRetry<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  let backoff = opts.initialBackoffMs;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= opts.maxAttempts || !opts.isRetryable(error)) {
        throw error;
      }

      const delay = Math.min(backoff, opts.maxBackoffMs);
      opts.onRetry(attempt, error, delay);
      await sleep(delay);
      backoff *= 2;
    }
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
