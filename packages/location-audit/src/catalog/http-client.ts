/**
 * HTTP client for the catalog collaborator
 *
 * Centralizes the catalog's fetch operations with:
 * - Configurable timeouts via AbortController
 * - Typed error classes (status, timeout, network, JSON parse)
 * - Optional retries for idempotent JSON requests
 * - Streaming downloads straight to disk
 *
 * USAGE:
 * ```typescript
 * const client = new HTTPClient({ timeoutMs: 60000 });
 * const data = await client.fetchJSON('https://catalog.example.org/api/3/action/package_search');
 * await client.downloadToFile('https://catalog.example.org/file.zip', '/tmp/scratch/file.zip');
 * ```
 */

import { createWriteStream } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { logger } from '../core/utils/logger.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface HTTPClientConfig {
  /** Retry attempts for JSON requests (default: 0) */
  readonly maxRetries: number;

  /** Delay between retries in milliseconds (default: 1000) */
  readonly retryDelayMs: number;

  /** Request timeout in milliseconds (default: 30000) */
  readonly timeoutMs: number;

  /** User-Agent header */
  readonly userAgent: string;
}

export interface FetchOptions {
  readonly timeoutMs?: number;
  readonly retries?: number;
  readonly headers?: Record<string, string>;
}

// ============================================================================
// Error Types
// ============================================================================

export class HTTPError extends Error {
  readonly statusCode: number;
  readonly url: string;

  constructor(message: string, statusCode: number, url: string) {
    super(message);
    this.name = 'HTTPError';
    this.statusCode = statusCode;
    this.url = url;
  }
}

export class HTTPTimeoutError extends Error {
  readonly url: string;
  readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number) {
    super(`Request timeout after ${timeoutMs}ms: ${url}`);
    this.name = 'HTTPTimeoutError';
    this.url = url;
    this.timeoutMs = timeoutMs;
  }
}

export class HTTPNetworkError extends Error {
  readonly url: string;

  constructor(url: string, cause: Error) {
    super(`Network error: ${cause.message}`, { cause });
    this.name = 'HTTPNetworkError';
    this.url = url;
  }
}

export class HTTPJSONParseError extends Error {
  readonly url: string;
  readonly responseText: string;

  constructor(url: string, responseText: string, cause: Error) {
    super(`Failed to parse JSON response: ${cause.message}`, { cause });
    this.name = 'HTTPJSONParseError';
    this.url = url;
    this.responseText = responseText.slice(0, 500);
  }
}

// ============================================================================
// HTTP Client Implementation
// ============================================================================

export class HTTPClient {
  private readonly config: HTTPClientConfig;

  constructor(config?: Partial<HTTPClientConfig>) {
    this.config = {
      maxRetries: 0,
      retryDelayMs: 1000,
      timeoutMs: 30000,
      userAgent: 'location-audit/1.0',
      ...config,
    };
  }

  /**
   * Fetch and parse a JSON response
   *
   * @throws {HTTPError} For HTTP error responses (4xx, 5xx)
   * @throws {HTTPTimeoutError} If request exceeds timeout
   * @throws {HTTPNetworkError} For network failures
   * @throws {HTTPJSONParseError} If response is not valid JSON
   */
  async fetchJSON(url: string, options?: FetchOptions): Promise<unknown> {
    const maxRetries = options?.retries ?? this.config.maxRetries;

    for (let attempt = 1; ; attempt++) {
      try {
        const response = await this.fetchChecked(url, options);
        const text = await response.text();
        try {
          return JSON.parse(text);
        } catch (error) {
          throw new HTTPJSONParseError(url, text, error instanceof Error ? error : new Error(String(error)));
        }
      } catch (error) {
        if (attempt > maxRetries || !isRetryable(error)) {
          throw error;
        }
        logger.warn('HTTPClient attempt failed', {
          attempt,
          maxAttempts: maxRetries + 1,
          url,
          error: error instanceof Error ? error.message : String(error),
        });
        await sleep(this.config.retryDelayMs);
      }
    }
  }

  /**
   * Stream a response body into `destinationPath`
   *
   * Downloads are never retried.
   */
  async downloadToFile(url: string, destinationPath: string, options?: FetchOptions): Promise<void> {
    const response = await this.fetchChecked(url, options);
    if (!response.body) {
      throw new HTTPError(`Empty response body`, response.status, url);
    }

    await mkdir(dirname(destinationPath), { recursive: true });
    await pipeline(Readable.from(response.body), createWriteStream(destinationPath));
  }

  private async fetchChecked(url: string, options?: FetchOptions): Promise<Response> {
    const response = await this.fetchWithTimeout(url, options);
    if (!response.ok) {
      throw new HTTPError(`HTTP ${response.status}: ${response.statusText}`, response.status, url);
    }
    return response;
  }

  /**
   * Fetch with timeout using AbortController
   */
  private async fetchWithTimeout(url: string, options?: FetchOptions): Promise<Response> {
    const timeoutMs = options?.timeoutMs ?? this.config.timeoutMs;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      return await fetch(url, {
        headers: {
          'User-Agent': this.config.userAgent,
          ...options?.headers,
        },
        redirect: 'follow',
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new HTTPTimeoutError(url, timeoutMs);
      }
      throw new HTTPNetworkError(url, error instanceof Error ? error : new Error(String(error)));
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Timeouts, network failures and 408/429/5xx responses are retryable
 */
function isRetryable(error: unknown): boolean {
  if (error instanceof HTTPTimeoutError || error instanceof HTTPNetworkError) {
    return true;
  }
  if (error instanceof HTTPError) {
    return error.statusCode === 408 || error.statusCode === 429 || error.statusCode >= 500;
  }
  return false;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
