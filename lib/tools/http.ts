/**
 * HTTP Tool - Fetch content from URLs with timeout and retry support
 */

import { Config } from '../config';
import { Logger } from '../utils';
import { FETCH_RETRY_POLICY, type RetryPolicy, retryWithPolicy } from '../utils/retry';

export const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

export class HttpStatusError extends Error {
  readonly status: number;

  constructor(status: number, statusText: string, readonly url: string) {
    super(`HTTP ${status}: ${statusText}`);
    this.name = 'HttpStatusError';
    this.status = status;
  }
}

export interface HttpResponse {
  status: number;
  text: string;
  contentType: string;
  url: string;
}

/**
 * Anything that can turn a URL into response text. Ingestion and the feed and
 * video tools depend on this rather than on HttpTool so tests can serve pages
 * from memory.
 */
export interface TextFetcher {
  fetchText(url: string): Promise<string>;
}

export interface HttpToolOptions {
  headers?: Record<string, string>;
  timeoutMs?: number;
  retryPolicy?: RetryPolicy;
}

export class HttpTool implements TextFetcher {
  private headers: Record<string, string>;
  private timeoutMs: number;
  private retryPolicy: RetryPolicy;

  constructor(options: HttpToolOptions = {}) {
    this.headers = options.headers ?? {};
    this.timeoutMs = options.timeoutMs ?? Config.FETCH_TIMEOUT_MS;
    this.retryPolicy = options.retryPolicy ?? FETCH_RETRY_POLICY;
  }

  async fetch(url: string): Promise<HttpResponse> {
    Logger.debug('HTTP fetch', { url });

    return retryWithPolicy(
      async () => {
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

        try {
          const response = await fetch(url, {
            headers: {
              'User-Agent': USER_AGENT,
              ...this.headers,
            },
            signal: controller.signal,
          });

          if (!response.ok) {
            throw new HttpStatusError(response.status, response.statusText, url);
          }

          const text = await response.text();

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
      this.retryPolicy,
      `HTTP fetch ${url}`
    );
  }

  async fetchText(url: string): Promise<string> {
    const response = await this.fetch(url);
    return response.text;
  }
}
