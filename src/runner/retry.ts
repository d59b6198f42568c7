import type { RetryConfig } from '../parser/schema.ts';
import { TIMEOUTS } from '../utils/constants.ts';
import { CancelledError } from './errors.ts';

export interface RetryOptions {
  /** Called before each retry with the 1-based retry number */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** Return false to give up immediately */
  shouldRetry?: (error: Error) => boolean;
  /** Aborting stops the backoff wait and rejects with CancelledError */
  signal?: AbortSignal;
}

/**
 * Calculate backoff delay in milliseconds
 */
export function calculateBackoff(
  attempt: number,
  backoff: 'linear' | 'exponential',
  baseDelay: number = TIMEOUTS.DEFAULT_RETRY_BASE_DELAY_MS
): number {
  if (backoff === 'exponential') {
    return baseDelay * 2 ** attempt;
  }
  // Linear backoff
  return baseDelay * (attempt + 1);
}

/**
 * Sleep for a given duration
 */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Execute a function with retry logic
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  retry?: RetryConfig,
  options: RetryOptions = {}
): Promise<T> {
  const maxRetries = retry?.count ?? 0;
  const backoffType = retry?.backoff ?? 'linear';
  const baseDelay = retry?.baseDelay ?? TIMEOUTS.DEFAULT_RETRY_BASE_DELAY_MS;

  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn(attempt + 1);
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      // Don't retry if we've exhausted attempts or the error is final
      if (attempt >= maxRetries) break;
      if (options.shouldRetry && !options.shouldRetry(lastError)) break;

      // Calculate delay and wait before retry
      const delay = calculateBackoff(attempt, backoffType, baseDelay);
      options.onRetry?.(attempt + 1, lastError, delay);
      await sleep(delay, options.signal);
    }
  }

  throw lastError ?? new Error('Operation failed with no error details');
}
