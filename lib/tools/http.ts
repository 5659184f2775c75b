/**
 * HTTP Tool - Fetch content from URLs with timeout and retry support
 */

import { Logger, retry } from '../utils';

export interface HttpResponse {
  status: number;
  text: string;
  contentType: string;
  url: string;
}

export class HttpError extends Error {
  constructor(readonly status: number, statusText: string, readonly body: string) {
    super(`HTTP ${status}: ${statusText}`);
    this.name = 'HttpError';
  }
}

/**
 * Client errors other than 429 will not change on a second attempt
 */
export function isRetryableHttpError(error: Error): boolean {
  if (!(error instanceof HttpError)) {
    return true;
  }
  return error.status === 429 || error.status < 400 || error.status >= 500;
}

export class HttpTool {
  static async fetch(
    url: string,
    options: {
      headers?: Record<string, string>;
      timeout?: number;
      maxRetries?: number;
      retryDelayMs?: number;
    } = {}
  ): Promise<HttpResponse> {
    const { headers = {}, timeout = 10000, maxRetries = 3, retryDelayMs = 1000 } = options;

    Logger.debug('HTTP fetch', { url: redactQuery(url) });

    return retry(
      async () => {
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeout);

        try {
          const response = await fetch(url, {
            headers: {
              'User-Agent': 'Mozilla/5.0 (compatible; TwoHostNewscast/1.0)',
              ...headers,
            },
            signal: controller.signal,
          });

          const text = await response.text();

          if (!response.ok) {
            throw new HttpError(response.status, response.statusText, text);
          }

          return {
            status: response.status,
            text,
            contentType: response.headers.get('content-type') || 'text/plain',
            url: response.url,
          };
        } finally {
          clearTimeout(timeoutId);
        }
      },
      {
        maxRetries,
        delayMs: retryDelayMs,
        backoff: true,
        shouldRetry: isRetryableHttpError,
        onError: (error, attempt) => {
          Logger.warn(`HTTP fetch failed (attempt ${attempt})`, { url: redactQuery(url), error: error.message });
        },
      }
    );
  }
}

function redactQuery(url: string): string {
  const idx = url.indexOf('?');
  return idx < 0 ? url : url.slice(0, idx);
}
