import pRetry from 'p-retry';
import type { HttpConfig } from '../config/environment';
import { logger } from './logger';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export class HttpStatusError extends Error {
  constructor(
    public readonly url: string,
    public readonly status: number,
    public readonly statusText: string
  ) {
    super(`HTTP ${status}: ${statusText}`);
    this.name = 'HttpStatusError';
  }
}

export function buildRequestHeaders(http: HttpConfig): Record<string, string> {
  return {
    'User-Agent': http.userAgent,
    'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.5',
  };
}

/** Server-side and throttling statuses are worth another attempt, other 4xx are not. */
export function isRetryableStatus(status: number): boolean {
  return status >= 500 || status === 429;
}

/**
 * GET a page as text with the browser-like headers and the configured timeout.
 * @throws HttpStatusError on a non-2xx response, Error on timeout or network failure
 */
export async function fetchPage(
  url: string,
  http: HttpConfig,
  fetchImpl: FetchLike = fetch
): Promise<string> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), http.timeoutMs);

  try {
    const response = await fetchImpl(url, {
      signal: controller.signal,
      headers: buildRequestHeaders(http)
    });

    if (!response.ok) {
      throw new HttpStatusError(url, response.status, response.statusText);
    }

    return await response.text();
  } catch (error) {
    if (error instanceof HttpStatusError) {
      throw error;
    }
    // fetch reports network failures as TypeError, which p-retry refuses to retry
    const reason = error instanceof Error
      ? (error.name === 'AbortError' ? `timed out after ${http.timeoutMs}ms` : error.message)
      : String(error);
    throw new Error(`Request to ${url} failed: ${reason}`, { cause: error });
  } finally {
    clearTimeout(timeout);
  }
}

/**
 * fetchPage with retries for transient failures (network errors, 5xx, 429).
 * Any other HTTP status aborts at once and the HttpStatusError is rethrown.
 */
export async function fetchPageWithRetry(
  url: string,
  http: HttpConfig,
  fetchImpl: FetchLike = fetch
): Promise<string> {
  return pRetry(
    async () => {
      try {
        return await fetchPage(url, http, fetchImpl);
      } catch (error) {
        if (error instanceof HttpStatusError && !isRetryableStatus(error.status)) {
          throw new pRetry.AbortError(error);
        }
        throw error;
      }
    },
    {
      retries: http.listingRetries,
      minTimeout: http.retryMinTimeoutMs,
      onFailedAttempt: error => {
        logger.warn(
          `Attempt ${error.attemptNumber} to fetch ${url} failed (${error.retriesLeft} retries left): ${error.message}`
        );
      }
    }
  );
}
