/**
 * Retry and timeout helpers for external calls
 */

import { ExternalFetchTimeoutError, isRetryableError } from "./errors.js";

export interface RetryOptions {
  /** Total attempts, including the first one */
  attempts: number;
  backoffMs?: number;
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number) => void;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `fn` up to `attempts` times with exponential backoff.
 * The last error is re-thrown unchanged.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const shouldRetry = options.shouldRetry ?? isRetryableError;
  const backoffMs = options.backoffMs ?? 0;
  let attempt = 0;

  for (;;) {
    attempt++;
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= options.attempts || !shouldRetry(error, attempt)) {
        throw error;
      }
      options.onRetry?.(error, attempt);
      if (backoffMs > 0) {
        await sleep(backoffMs * Math.pow(2, attempt - 1));
      }
    }
  }
}

/**
 * Reject with ExternalFetchTimeoutError if `promise` does not settle in time.
 * The underlying call is not cancelled; its late result is ignored.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ExternalFetchTimeoutError(label, ms)), ms);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
