import axios, { type AxiosInstance } from 'axios';
import type { FetchOptions, FetchOutcome, FetchStrategy } from '../types/index.js';
import { getErrorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { sleep } from '../utils/sleep.js';

export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36';

export const ACCEPT_LANGUAGE = 'en-US,en;q=0.9,ar;q=0.8';

export interface HttpClientOptions {
  /** Total attempts per request (default: 2) */
  maxAttempts?: number;
  /** Fixed delay between attempts in ms (default: 1000) */
  retryDelayMs?: number;
}

export interface TextRequestOptions extends FetchOptions {
  accept?: string;
  maxAttempts?: number;
}

/**
 * Static page acquisition: a plain GET with browser-like headers.
 * Redirects are followed; anything other than a 2xx response is a failure.
 */
export class HttpClient implements FetchStrategy {
  readonly name = 'static' as const;

  private client: AxiosInstance;
  private maxAttempts: number;
  private retryDelayMs: number;

  constructor(options: HttpClientOptions = {}) {
    this.maxAttempts = options.maxAttempts ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 1000;

    this.client = axios.create({
      maxRedirects: 5,
      responseType: 'text',
      validateStatus: (status) => status >= 200 && status < 300,
    });
  }

  /**
   * Fetch a page as HTML; never throws
   */
  async fetch(url: string, options: FetchOptions): Promise<FetchOutcome> {
    try {
      const html = await this.getText(url, options);
      return { ok: true, html, strategy: this.name };
    } catch (error) {
      const message = getErrorMessage(error);
      logger.debug('Static fetch failed', { url, error: message });
      return { ok: false, error: message, strategy: this.name };
    }
  }

  /**
   * GET a URL as text with fixed-backoff retries; throws the last error
   */
  async getText(url: string, options: TextRequestOptions): Promise<string> {
    const attempts = Math.max(1, options.maxAttempts ?? this.maxAttempts);
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        return await this.doGet(url, options);
      } catch (error) {
        lastError = error;

        if (options.signal?.aborted || attempt >= attempts) {
          break;
        }

        logger.debug('Static request failed, retrying', {
          url,
          attempt,
          maxAttempts: attempts,
          delayMs: this.retryDelayMs,
          error: getErrorMessage(error),
        });
        await sleep(this.retryDelayMs, options.signal);
        if (options.signal?.aborted) {
          break;
        }
      }
    }

    throw lastError instanceof Error ? lastError : new Error(String(lastError));
  }

  private async doGet(url: string, options: TextRequestOptions): Promise<string> {
    const response = await this.client.get<string>(url, {
      timeout: options.timeoutMs,
      signal: options.signal,
      headers: {
        'User-Agent': BROWSER_USER_AGENT,
        Accept: options.accept ?? 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8',
        'Accept-Language': ACCEPT_LANGUAGE,
        Referer: url,
        'Cache-Control': 'no-cache',
        Pragma: 'no-cache',
      },
    });

    if (typeof response.data !== 'string') {
      throw new Error(`Unexpected response body for ${url}`);
    }

    return response.data;
  }
}
