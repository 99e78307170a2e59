/**
 * Exponential backoff for manifest and segment requests
 */

import { ENV } from './env';
import { CancelledError, FetchError, ManifestFetchError } from './errors';

export interface RetryConfig {
  /** Maximum number of retry attempts */
  maxRetries: number;
  /** Initial delay between retries in milliseconds */
  initialDelay: number;
  /** Maximum delay between retries in milliseconds */
  maxDelay: number;
  /** Exponential backoff base */
  exponentialBase: number;
  /** Randomize each delay between half and all of its value */
  jitter: boolean;
  /** HTTP status codes that should trigger retry */
  retryableStatusCodes: Set<number>;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: ENV.fetchRetries,
  initialDelay: ENV.fetchRetryBaseMs,
  maxDelay: 60000,
  exponentialBase: 2,
  jitter: true,
  retryableStatusCodes: new Set([408, 429, 500, 502, 503, 504]),
};

export interface RetryHooks {
  signal?: AbortSignal;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
}

export function calculateDelay(attempt: number, config: RetryConfig): number {
  let delay = Math.min(
    config.initialDelay * Math.pow(config.exponentialBase, attempt),
    config.maxDelay
  );

  if (config.jitter) {
    // "Equal jitter": random value between 50% and 100% of delay
    delay = delay * (0.5 + Math.random() * 0.5);
  }

  return delay;
}

// Transport-level failures surface from fetch as TypeError ("fetch failed", "terminated") or ky's TimeoutError
function isTransient(cause: unknown): boolean {
  return cause instanceof Error && (cause.name === 'TypeError' || cause.name === 'TimeoutError');
}

export function shouldRetry(attempt: number, error: unknown, config: RetryConfig): boolean {
  if (attempt >= config.maxRetries) {
    return false;
  }

  if (error instanceof FetchError || error instanceof ManifestFetchError) {
    if (error.statusCode !== undefined) {
      return config.retryableStatusCodes.has(error.statusCode);
    }
    return isTransient(error.cause);
  }

  return false;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    function onAbort() {
      clearTimeout(timer);
      reject(new CancelledError());
    }
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Runs `fn` until it succeeds, the error is not retryable, or attempts run out.
 * Cancellation interrupts the wait between attempts.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  hooks: RetryHooks = {}
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    if (hooks.signal?.aborted) {
      throw new CancelledError();
    }
    try {
      return await fn(attempt);
    } catch (error) {
      if (hooks.signal?.aborted || !shouldRetry(attempt, error, config)) {
        throw error;
      }
      const delay = calculateDelay(attempt, config);
      hooks.onRetry?.(attempt + 1, error, delay);
      await sleep(delay, hooks.signal);
    }
  }
}
