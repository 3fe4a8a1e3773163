/**
 * HTTP Page Fetcher
 * Uses native fetch with a timeout and retries transient failures
 */

import { env } from '../../config/env';
import { CrawlError, CrawlErrorCode, getErrorMessage, isCrawlError } from '../errors/crawl.errors';
import { FetchedPage } from '../extraction/extraction.types';
import { PageFetcher } from './crawling.types';
import { retryWithBackoff } from './retry';

// Statuses worth another attempt
const RETRYABLE_STATUSES = new Set([408, 429, 500, 502, 503, 504, 522, 524]);

export interface HttpPageFetcherOptions {
  userAgent?: string;
  timeoutMs?: number;
  maxRetries?: number;
  retryBackoffMs?: number;
}

/**
 * Run `request` under an abort timer that stays armed until it settles,
 * so a body that stops arriving times out like a silent server
 */
async function fetchWithTimeout<T>(timeout: number, request: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);

  try {
    return await request(controller.signal);
  } catch (error) {
    if (controller.signal.aborted) {
      throw new Error(`Timed out after ${timeout}ms`);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}

export function isRetryableFetchError(error: unknown): boolean {
  if (!isCrawlError(error, CrawlErrorCode.FETCH_ERROR)) {
    return false;
  }
  const statusCode = error.details?.statusCode;
  // Network failures carry no status
  return typeof statusCode !== 'number' || RETRYABLE_STATUSES.has(statusCode);
}

export class HttpPageFetcher implements PageFetcher {
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryBackoffMs: number;

  constructor(options: HttpPageFetcherOptions = {}) {
    this.userAgent = options.userAgent ?? env.CRAWL_USER_AGENT;
    this.timeoutMs = options.timeoutMs ?? env.CRAWL_FETCH_TIMEOUT_MS;
    this.maxRetries = options.maxRetries ?? env.CRAWL_FETCH_RETRIES;
    this.retryBackoffMs = options.retryBackoffMs ?? env.CRAWL_RETRY_BACKOFF_MS;
  }

  async fetch(url: string): Promise<FetchedPage> {
    return retryWithBackoff(() => this.fetchOnce(url), {
      maxRetries: this.maxRetries,
      baseDelay: this.retryBackoffMs,
      isRetryable: isRetryableFetchError,
      onRetry: (error, attempt, delay) => {
        console.log(`Fetch retry ${attempt}/${this.maxRetries} for ${url} in ${delay}ms: ${getErrorMessage(error)}`);
      },
    });
  }

  private async fetchOnce(url: string): Promise<FetchedPage> {
    let response: Response;
    let html: string;
    try {
      ({ response, html } = await fetchWithTimeout(this.timeoutMs, async (signal) => {
        const res = await fetch(url, {
          method: 'GET',
          headers: {
            'User-Agent': this.userAgent,
            Accept: 'text/html,application/xhtml+xml,text/plain;q=0.9,*/*;q=0.8',
          },
          redirect: 'follow',
          signal,
        });
        return { response: res, html: res.ok ? await res.text() : '' };
      }));
    } catch (error) {
      throw new CrawlError(CrawlErrorCode.FETCH_ERROR, `Request to ${url} failed: ${getErrorMessage(error)}`, {
        details: { url },
        cause: error,
      });
    }

    if (!response.ok) {
      throw new CrawlError(CrawlErrorCode.FETCH_ERROR, `HTTP ${response.status} for ${url}`, {
        details: { url, statusCode: response.status },
      });
    }

    return {
      url: response.url || url,
      html,
      statusCode: response.status,
      contentType: response.headers.get('content-type') ?? undefined,
    };
  }
}
