/**
 * Nominatim API Client
 *
 * Low-level HTTP client for the OpenStreetMap Nominatim search endpoint.
 * Handles request formatting, identification, timeouts, cancellation,
 * error classification and call counting.
 *
 * @module providers/nominatim/client
 */

import type { Logger } from '../../logging/index.js';
import { DEFAULT_NOMINATIM_URL, DEFAULT_USER_AGENT } from '../../config/index.js';
import { SearchProviderError, cancelledError, describeError, type SearchErrorCode } from '../errors.js';
import type { NominatimSearchRequest } from './request.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Fetch signature used by the client; injectable for tests.
 */
export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface NominatimClientOptions {
  /** Search endpoint (default: public OpenStreetMap instance) */
  baseUrl?: string;
  /** User-Agent sent with every request (required by the usage policy) */
  userAgent?: string;
  /** Request timeout in milliseconds (default: 10000) */
  timeoutMs?: number;
  fetchFn?: FetchFn;
  logger?: Logger;
}

/**
 * Nominatim transport error with HTTP context
 */
export class NominatimApiError extends SearchProviderError {
  constructor(
    message: string,
    code: SearchErrorCode,
    public readonly statusCode: number,
    isRetryable: boolean
  ) {
    super(message, code, isRetryable);
    this.name = 'NominatimApiError';
  }
}

/**
 * Type guard for NominatimApiError
 */
export function isNominatimApiError(error: unknown): error is NominatimApiError {
  return error instanceof NominatimApiError;
}

// ============================================================================
// Client Implementation
// ============================================================================

/**
 * Default configuration values
 */
export const CLIENT_DEFAULTS = {
  baseUrl: DEFAULT_NOMINATIM_URL,
  userAgent: DEFAULT_USER_AGENT,
  timeoutMs: 10000,
} as const;

/**
 * NominatimClient sends one search at a time. Starting a request aborts the
 * previous one.
 *
 * @example
 * ```typescript
 * const client = new NominatimClient({ userAgent: 'my-app/1.0' });
 * const body = await client.search(new NominatimSearchRequest('Lyon'));
 * ```
 */
export class NominatimClient {
  private readonly baseUrl: string;
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;
  private readonly logger?: Logger;
  private current: AbortController | null = null;
  private callCount = 0;

  constructor(options: NominatimClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? CLIENT_DEFAULTS.baseUrl;
    this.userAgent = options.userAgent ?? CLIENT_DEFAULTS.userAgent;
    this.timeoutMs = options.timeoutMs ?? CLIENT_DEFAULTS.timeoutMs;
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
    this.logger = options.logger;
  }

  /**
   * Send a search request and return the decoded JSON body.
   *
   * @throws SearchProviderError with code INVALID_REQUEST or PARSE_ERROR
   * @throws NominatimApiError on HTTP, network and timeout failures
   */
  async search(request: NominatimSearchRequest): Promise<unknown> {
    const validationError = request.validationError();
    if (validationError !== null) {
      throw new SearchProviderError(`Invalid request: ${validationError}`, 'INVALID_REQUEST');
    }

    this.cancel();

    const url = request.toUrl(this.baseUrl);
    this.logger?.debug(`[nominatim] Request URL: ${url}`);

    const controller = new AbortController();
    this.current = controller;
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);

    try {
      const response = await this.fetchFn(url, {
        method: 'GET',
        headers: { 'User-Agent': this.userAgent, Accept: 'application/json' },
        signal: controller.signal,
      });
      this.callCount++;

      if (!response.ok) {
        await this.handleHttpError(response);
      }

      const text = await response.text();
      this.logger?.debug(`[nominatim] Response size: ${text.length} bytes`);
      return this.parseBody(text);
    } catch (error) {
      if (error instanceof SearchProviderError) {
        throw error;
      }
      if (error instanceof Error && error.name === 'AbortError') {
        if (timedOut) {
          throw new NominatimApiError(
            `Request timed out after ${this.timeoutMs}ms`,
            'TIMEOUT',
            408,
            true
          );
        }
        throw cancelledError();
      }
      throw new NominatimApiError(`Network error: ${describeError(error)}`, 'NETWORK_ERROR', 0, true);
    } finally {
      clearTimeout(timeoutId);
      if (this.current === controller) {
        this.current = null;
      }
    }
  }

  /**
   * Abort the request in flight, if any.
   */
  cancel(): void {
    if (this.current) {
      this.current.abort();
      this.current = null;
    }
  }

  isRequestInProgress(): boolean {
    return this.current !== null;
  }

  /**
   * Number of HTTP responses received by this client.
   */
  getCallCount(): number {
    return this.callCount;
  }

  resetCallCount(): void {
    this.callCount = 0;
  }

  private parseBody(text: string): unknown {
    try {
      const body: unknown = JSON.parse(text);
      return body;
    } catch (error) {
      throw new SearchProviderError(`JSON parse error: ${describeError(error)}`, 'PARSE_ERROR');
    }
  }

  /**
   * Map a non-2xx response to a NominatimApiError.
   */
  private async handleHttpError(response: Response): Promise<never> {
    const text = await response.text().catch(() => 'Unknown error');

    const isRetryable = response.status === 429 || response.status >= 500;

    let message: string;
    if (response.status === 429) {
      message = `Rate limit exceeded: ${text}`;
    } else if (response.status >= 500) {
      message = `Server error (${response.status}): ${text}`;
    } else if (response.status === 403) {
      message = 'Access denied: check the User-Agent and usage policy';
    } else {
      message = `API error (${response.status}): ${text}`;
    }

    throw new NominatimApiError(message, 'HTTP_ERROR', response.status, isRetryable);
  }
}
