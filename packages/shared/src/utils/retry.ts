import { defaultErrorClassifier } from './errors.js';

export interface RetryOptions {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries: number;
  /** Base delay in milliseconds for exponential backoff (default: 500) */
  baseDelayMs: number;
  /** Maximum delay cap in milliseconds (default: 10000) */
  maxDelayMs: number;
  /** Maximum random jitter to add in milliseconds (default: 100) */
  jitterMs: number;
  /** Callback invoked before each retry attempt */
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
  /** Custom function to determine if an error is retryable (default: isRetryableError) */
  isRetryable?: (error: Error) => boolean;
  /** Optional function to call before each attempt (e.g., rate limiter) */
  beforeAttempt?: () => Promise<unknown>;
  /** Stops waiting between attempts; the last error is rethrown */
  signal?: AbortSignal;
}

const DEFAULT_OPTIONS: RetryOptions = {
  maxRetries: 3,
  baseDelayMs: 500,
  maxDelayMs: 10_000,
  jitterMs: 100,
};

/**
 * Retry anything that is not a permanent failure: transient item errors and
 * systemic upstream errors (network, timeouts, 429, 5xx).
 */
export function isRetryableError(error: Error): boolean {
  return defaultErrorClassifier(error).kind !== 'permanent';
}

/**
 * Calculates the delay for a retry attempt using exponential backoff with jitter.
 *
 * Formula: min(maxDelay, baseDelay * 2^attempt) + random(0, jitter)
 */
export function calculateRetryDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  jitterMs: number
): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);
  const jitter = Math.random() * jitterMs;
  return cappedDelay + jitter;
}

/**
 * Executes a function with retry logic, exponential backoff, and jitter.
 *
 * @example
 * const message = await withRetry(
 *   () => transport.executeOne('fetch', id),
 *   {
 *     maxRetries: 3,
 *     beforeAttempt: () => limiter.acquire(),
 *     onRetry: (error, attempt) => log.warn('item_retry', { attempt, error: error.message }),
 *   }
 * );
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const isRetryable = opts.isRetryable ?? isRetryableError;
  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
    try {
      if (opts.beforeAttempt) {
        await opts.beforeAttempt();
      }
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (!isRetryable(lastError) || attempt >= opts.maxRetries || opts.signal?.aborted) {
        throw lastError;
      }

      const delay = calculateRetryDelay(attempt, opts.baseDelayMs, opts.maxDelayMs, opts.jitterMs);
      opts.onRetry?.(lastError, attempt + 1, delay);
      await sleep(delay, opts.signal);
    }
  }

  throw lastError ?? new Error('withRetry: no attempts made');
}

/**
 * Resolves after `ms`, or early (without rejecting) when the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
