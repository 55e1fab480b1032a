/**
 * HTTP Client for the EO Gateway
 *
 * Every HTTP call of the gateway (STAC search, asset download, ESA website)
 * goes through this client:
 * - Configurable timeouts via AbortController
 * - Optional retry with exponential backoff and jitter for idempotent reads
 * - Typed errors (HTTPError, HTTPTimeoutError, HTTPNetworkError)
 * - JSON bodies validated with a zod schema
 * - Streaming downloads written with temp-then-rename
 *
 * Retries stay inside one provider attempt and its timeout. The gateway sets
 * `maxRetries` from EO_GATEWAY_HTTP_RETRIES; a provider still failing after
 * them is reported to the orchestrator, which moves to the next candidate.
 *
 * USAGE:
 * ```typescript
 * const client = new HTTPClient({ timeoutMs: 60_000 });
 * const page = await client.fetchJSON(searchUrl, itemCollectionSchema, {
 *   method: 'POST',
 *   body: JSON.stringify(query),
 *   headers: { 'Content-Type': 'application/json' },
 * });
 * const bytes = await client.downloadToFile(assetUrl, '/data/out/B04.tif');
 * ```
 */

import type { z } from 'zod';
import { atomicWriteStream } from './utils/atomic-write.js';
import { createLogger } from './utils/logger.js';

const log = createLogger({ module: 'http' });

// ============================================================================
// Configuration Types
// ============================================================================

export interface HTTPClientConfig {
  /** Maximum retry attempts (default: 0) */
  readonly maxRetries: number;

  /** Initial delay before first retry in milliseconds (default: 1000) */
  readonly initialDelayMs: number;

  /** Exponential backoff multiplier (default: 2) */
  readonly backoffMultiplier: number;

  /** Maximum delay between retries in milliseconds (default: 30000) */
  readonly maxDelayMs: number;

  /** Request timeout in milliseconds (default: 60000) */
  readonly timeoutMs: number;

  readonly userAgent: string;

  /** Jitter factor (0-1, default: 0.1) */
  readonly jitterFactor: number;
}

/**
 * Per-request options (override client defaults)
 */
export interface FetchOptions {
  readonly timeoutMs?: number;
  readonly headers?: Record<string, string>;
  readonly method?: 'GET' | 'POST' | 'HEAD';
  readonly body?: string;
  /** External cancellation */
  readonly signal?: AbortSignal;
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

/**
 * Request exceeded the client's own timeout
 */
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

/**
 * Connection failed, DNS resolution, TLS, ...
 */
export class HTTPNetworkError extends Error {
  readonly url: string;

  constructor(url: string, cause: Error) {
    super(`Network error: ${cause.message}`, { cause });
    this.name = 'HTTPNetworkError';
    this.url = url;
  }
}

/**
 * Body is not JSON or does not match the expected schema
 */
export class HTTPResponseFormatError extends Error {
  readonly url: string;
  readonly responseText: string;

  constructor(url: string, responseText: string, detail: string) {
    super(`Unexpected response from ${url}: ${detail}`);
    this.name = 'HTTPResponseFormatError';
    this.url = url;
    this.responseText = responseText.slice(0, 500);
  }
}

// ============================================================================
// Signals
// ============================================================================

/**
 * Signal that aborts when ANY of the inputs aborts
 */
export function mergeAbortSignals(signals: readonly (AbortSignal | undefined)[]): AbortSignal {
  const controller = new AbortController();

  for (const signal of signals) {
    if (!signal) continue;
    if (signal.aborted) {
      controller.abort(signal.reason);
      break;
    }
    signal.addEventListener('abort', () => controller.abort(signal.reason), { once: true });
  }

  return controller.signal;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

// ============================================================================
// HTTP Client Implementation
// ============================================================================

export class HTTPClient {
  private readonly config: HTTPClientConfig;

  constructor(config?: Partial<HTTPClientConfig>) {
    this.config = {
      maxRetries: 0,
      initialDelayMs: 1000,
      backoffMultiplier: 2,
      maxDelayMs: 30000,
      timeoutMs: 60000,
      userAgent: 'eo-gateway/0.1',
      jitterFactor: 0.1,
      ...config,
    };
  }

  /**
   * Fetch JSON and validate it
   *
   * @throws {HTTPError} For HTTP error responses (4xx, 5xx)
   * @throws {HTTPTimeoutError} If request exceeds timeout
   * @throws {HTTPNetworkError} For network failures
   * @throws {HTTPResponseFormatError} If the body is not JSON or fails the schema
   */
  async fetchJSON<T>(url: string, schema: z.ZodType<T>, options?: FetchOptions): Promise<T> {
    const response = await this.fetchWithRetry(url, options);
    const text = await response.text();

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      throw new HTTPResponseFormatError(url, text, error instanceof Error ? error.message : String(error));
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .slice(0, 3)
        .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        .join('; ');
      throw new HTTPResponseFormatError(url, text, detail);
    }
    return parsed.data;
  }

  /**
   * Stream a response body to a file through a temporary sibling
   *
   * @returns Bytes written
   */
  async downloadToFile(url: string, filePath: string, options?: FetchOptions): Promise<number> {
    const response = await this.fetchWithRetry(url, options);
    return atomicWriteStream(filePath, readBody(response), options?.signal);
  }

  /**
   * Raw response of a successful request
   */
  async fetchWithRetry(url: string, options?: FetchOptions): Promise<Response> {
    const maxRetries = this.config.maxRetries;

    for (let attempt = 1; ; attempt++) {
      const isLastAttempt = attempt > maxRetries;

      try {
        const response = await this.fetchWithTimeout(url, options);
        if (response.ok) {
          return response;
        }
        throw new HTTPError(`HTTP ${response.status}: ${response.statusText}`, response.status, url);
      } catch (error) {
        if (isLastAttempt || !this.isRetryableError(error) || options?.signal?.aborted) {
          throw error;
        }
        log.warn('HTTP attempt failed', {
          attempt,
          maxAttempts: maxRetries + 1,
          error: error instanceof Error ? error.message : String(error),
          url,
        });
      }

      await this.sleep(this.calculateBackoffDelay(attempt));
    }
  }

  private async fetchWithTimeout(url: string, options?: FetchOptions): Promise<Response> {
    const timeoutMs = options?.timeoutMs ?? this.config.timeoutMs;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      return await fetch(url, {
        method: options?.method ?? 'GET',
        headers: {
          'User-Agent': this.config.userAgent,
          ...options?.headers,
        },
        body: options?.body,
        redirect: 'follow',
        signal: mergeAbortSignals([controller.signal, options?.signal]),
      });
    } catch (error) {
      if (isAbortError(error)) {
        if (controller.signal.aborted) {
          throw new HTTPTimeoutError(url, timeoutMs);
        }
        // External signal aborted
        throw error;
      }
      throw new HTTPNetworkError(url, error instanceof Error ? error : new Error(String(error)));
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private calculateBackoffDelay(attempt: number): number {
    const exponentialDelay =
      this.config.initialDelayMs * Math.pow(this.config.backoffMultiplier, attempt - 1);
    const cappedDelay = Math.min(exponentialDelay, this.config.maxDelayMs);
    const jitterRange = cappedDelay * this.config.jitterFactor;
    const jitter = Math.random() * 2 * jitterRange - jitterRange;
    return Math.max(0, Math.floor(cappedDelay + jitter));
  }

  private isRetryableError(error: unknown): boolean {
    if (error instanceof HTTPTimeoutError || error instanceof HTTPNetworkError) {
      return true;
    }
    if (error instanceof HTTPError) {
      return [408, 429, 500, 502, 503, 504].includes(error.statusCode);
    }
    return false;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

/**
 * Body chunks of a response
 */
async function* readBody(response: Response): AsyncGenerator<Uint8Array> {
  if (!response.body) return;
  const reader = response.body.getReader();
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) return;
      yield value;
    }
  } finally {
    reader.releaseLock();
  }
}
