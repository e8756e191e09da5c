import { getLogger } from './logger.js';

export interface RetryOptions {
  maxAttempts?: number; // total attempts including the first
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Return false to rethrow immediately */
  shouldRetry?: (err: unknown) => boolean;
}

export function sleep(ms: number): Promise<void> {
  return new Promise(r => setTimeout(r, ms));
}

/**
 * Run `fn` with exponential backoff plus a little jitter.
 * Throws the last error once `maxAttempts` is reached.
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const { maxAttempts = 4, baseDelayMs = 500, maxDelayMs = 10_000, shouldRetry = () => true } = options;
  const log = getLogger();

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= maxAttempts || !shouldRetry(err)) throw err;

      const delay = Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs) + Math.random() * 100;
      log.warn(
        { attempt, maxAttempts, delayMs: Math.round(delay), err: err instanceof Error ? err.message : String(err) },
        'Retryable error',
      );
      await sleep(delay);
    }
  }
}
