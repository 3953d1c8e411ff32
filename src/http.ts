import { HttpStatusError, MalformedDataError, TransientNetworkError, errorMessage } from './errors';
import { logger } from './logger';
import { RateLimiter } from './rate-limiter';
import { RetryOptions, withRetry } from './retry';
import { HttpFetcher } from './types';

export interface HttpClientOptions {
  /** Milliseconds before a request is aborted */
  timeoutMs: number;
  maxRetries: number;
  userAgent: string;
  limiter?: RateLimiter;
  headers?: Record<string, string>;
  /** Backoff tuning, mostly for tests */
  retry?: Pick<RetryOptions, 'initialBackoffMs' | 'maxBackoffMs'>;
}

function isTransientStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

export function createHttpClient(options: HttpClientOptions): HttpFetcher {
  const headers = {
    'User-Agent': options.userAgent,
    'Accept-Language': 'en-US,en;q=0.9',
    ...options.headers,
  };

  async function request(url: string, accept: string): Promise<Response> {
    await options.limiter?.acquire();

    let res: Response;
    try {
      res = await fetch(url, {
        headers: { ...headers, Accept: accept },
        redirect: 'follow',
        signal: AbortSignal.timeout(options.timeoutMs),
      });
    } catch (err) {
      // fetch only rejects on aborts and network-level failures
      throw new TransientNetworkError(`Request to ${url} failed: ${errorMessage(err)}`, { cause: err });
    }

    if (!res.ok) {
      // an unread body holds its connection until collected
      await res.body?.cancel();
      if (isTransientStatus(res.status)) {
        throw new TransientNetworkError(`HTTP ${res.status} for ${url}`);
      }
      throw new HttpStatusError(res.status, url);
    }
    return res;
  }

  function retrying<T>(url: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(fn, {
      ...options.retry,
      maxAttempts: options.maxRetries,
      isRetryable: (err) => err instanceof TransientNetworkError,
      onRetry: (attempt, err, delay) =>
        logger.warn(`Retrying ${url} in ${Math.round(delay)}ms (attempt ${attempt} failed)`, {
          error: errorMessage(err),
        }),
    });
  }

  return {
    fetchText(url: string): Promise<string> {
      return retrying(url, async () => {
        const res = await request(url, 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8');
        return res.text();
      });
    },

    fetchJSON(url: string): Promise<unknown> {
      return retrying(url, async () => {
        const res = await request(url, 'application/json');
        const body = await res.text();
        try {
          const parsed: unknown = JSON.parse(body);
          return parsed;
        } catch {
          throw new MalformedDataError(`Response from ${url} is not valid JSON`);
        }
      });
    },

    fetchBinary(url: string): Promise<{ data: Buffer; contentType: string }> {
      return retrying(url, async () => {
        const res = await request(url, 'image/*,*/*;q=0.8');
        const data = Buffer.from(await res.arrayBuffer());
        return { data, contentType: res.headers.get('content-type') ?? 'application/octet-stream' };
      });
    },
  };
}
