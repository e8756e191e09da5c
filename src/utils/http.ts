import { retryWithBackoff, type RetryOptions } from './retry.js';

export const REQUEST_TIMEOUT_MS = 30_000;

/** Non-2xx response. `status` is 0 for network failures and timeouts. */
export class HttpError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly url: string,
  ) {
    super(message);
    this.name = 'HttpError';
  }

  get retryable(): boolean {
    return this.status === 0 || this.status === 429 || this.status >= 500;
  }
}

export interface FetchJsonOptions extends Omit<RetryOptions, 'shouldRetry'> {
  timeoutMs?: number;
  /** Statuses answered with `null` instead of an error */
  nullOn?: number[];
}

function redact(url: string): string {
  return url.replace(/(api_key|key)=[^&]+/g, '$1=***');
}

/**
 * GET a JSON document. Retries 429, 5xx and network errors; fails fast on other 4xx.
 * API keys are redacted from error messages.
 */
export async function fetchJson(url: string, options: FetchJsonOptions = {}): Promise<unknown> {
  const { timeoutMs = REQUEST_TIMEOUT_MS, nullOn = [], ...retry } = options;
  const safeUrl = redact(url);

  return retryWithBackoff(
    async () => {
      let res: Response;
      try {
        res = await fetch(url, {
          headers: { Accept: 'application/json' },
          signal: AbortSignal.timeout(timeoutMs),
        });
      } catch (err) {
        throw new HttpError(
          `Request failed for ${safeUrl}: ${err instanceof Error ? err.message : String(err)}`,
          0,
          safeUrl,
        );
      }

      if (nullOn.includes(res.status)) return null;
      if (!res.ok) {
        throw new HttpError(`HTTP ${res.status} for ${safeUrl}`, res.status, safeUrl);
      }
      const body: unknown = await res.json();
      return body;
    },
    {
      ...retry,
      shouldRetry: err => err instanceof HttpError && err.retryable,
    },
  );
}
