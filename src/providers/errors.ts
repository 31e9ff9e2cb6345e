/**
 * Search Provider Errors
 *
 * @module providers/errors
 */

/**
 * Failure categories reported by providers.
 */
export type SearchErrorCode =
  | 'EMPTY_QUERY'
  | 'INVALID_REQUEST'
  | 'NO_RESULTS'
  | 'HTTP_ERROR'
  | 'NETWORK_ERROR'
  | 'TIMEOUT'
  | 'PARSE_ERROR'
  | 'CANCELLED'
  | 'SIMULATED';

/**
 * Error raised when a search does not produce results.
 */
export class SearchProviderError extends Error {
  constructor(
    message: string,
    public readonly code: SearchErrorCode,
    public readonly isRetryable: boolean = false
  ) {
    super(message);
    this.name = 'SearchProviderError';
  }
}

/**
 * Type guard for SearchProviderError.
 */
export function isSearchProviderError(error: unknown): error is SearchProviderError {
  return error instanceof SearchProviderError;
}

/**
 * Whether retrying the same search may succeed.
 */
export function isRetryableError(error: unknown): boolean {
  return isSearchProviderError(error) && error.isRetryable;
}

/**
 * Whether the error only signals that a search was superseded or cancelled.
 */
export function isCancellation(error: unknown): boolean {
  return isSearchProviderError(error) && error.code === 'CANCELLED';
}

/**
 * Error raised for a search that was cancelled before completing.
 */
export function cancelledError(): SearchProviderError {
  return new SearchProviderError('Search cancelled', 'CANCELLED');
}

/**
 * Human-readable message for any thrown value.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
