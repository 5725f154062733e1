// Exponential backoff with jitter for provider calls
import { errorMessage } from '@/core/errors';
import { logger } from '@/services/logger';

export interface RetryOptions {
  maxRetries?: number;
  initialDelay?: number;
  maxDelay?: number;
  jitter?: boolean;
  exponentialBase?: number;
  /** Only errors this accepts are retried; everything else is rethrown at once. */
  shouldRetry?: (error: unknown) => boolean;
  /** Aborting stops waiting between attempts. */
  signal?: AbortSignal;
  label?: string;
}

export function backoffDelay(attempt: number, options: RetryOptions = {}, random: () => number = Math.random): number {
  const { initialDelay = 100, maxDelay = 5000, jitter = true, exponentialBase = 2 } = options;
  const exponentialDelay = initialDelay * Math.pow(exponentialBase, attempt);
  // up to 25% extra so concurrent callers spread out
  const jitterAmount = jitter ? random() * 0.25 * exponentialDelay : 0;
  return Math.min(exponentialDelay + jitterAmount, maxDelay);
}

export async function retryWithBackoff<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { maxRetries = 3, shouldRetry = () => true, signal, label = 'call' } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= maxRetries || !shouldRetry(error) || signal?.aborted) throw error;

      const delay = backoffDelay(attempt, options);
      logger.debug('retry:scheduled', {
        label,
        attempt: attempt + 1,
        maxRetries,
        delayMs: Math.round(delay),
        error: errorMessage(error),
      });
      await sleep(delay, signal);
    }
  }
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason instanceof Error ? signal.reason : new Error('aborted'));
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
