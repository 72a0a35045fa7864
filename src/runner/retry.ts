/**
 * Retry / back-off policy for storage writes.
 *
 * Contended writes are wrapped with `withRetry` so transient lock
 * conflicts are handled uniformly; anything the caller marks as
 * non-retryable fails on the first attempt.
 */

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffFactor: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 250,
  maxDelayMs: 5_000,
  backoffFactor: 2,
};

export interface RetryResult<T> {
  success: boolean;
  value?: T;
  attempts: number;
  errors: string[];
  /** The error thrown by the final attempt, when every attempt failed. */
  lastError?: unknown;
}

export interface RetryOptions {
  /** Return false to stop retrying on this error. Defaults to always retry. */
  isRetryable?: (err: unknown) => boolean;
  /** Called before each back-off sleep. */
  onRetry?: (attempt: number, delayMs: number, err: unknown) => void;
  sleep?: (ms: number) => Promise<void>;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute `fn` with exponential back-off.
 */
export async function withRetry<T>(
  fn: () => T | Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  options: RetryOptions = {},
): Promise<RetryResult<T>> {
  const errors: string[] = [];
  const wait = options.sleep ?? sleep;
  let delay = policy.initialDelayMs;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    try {
      const value = await fn();
      return { success: true, value, attempts: attempt, errors };
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      errors.push(`attempt ${attempt}: ${msg}`);

      if (options.isRetryable && !options.isRetryable(err)) {
        return { success: false, attempts: attempt, errors, lastError: err };
      }

      if (attempt < policy.maxAttempts) {
        const capped = Math.min(delay, policy.maxDelayMs);
        options.onRetry?.(attempt, capped, err);
        await wait(capped);
        delay *= policy.backoffFactor;
      } else {
        return { success: false, attempts: attempt, errors, lastError: err };
      }
    }
  }

  return { success: false, attempts: policy.maxAttempts, errors };
}
