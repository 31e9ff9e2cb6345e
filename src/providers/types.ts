/**
 * Search Provider Types
 *
 * Contract every city search backend implements, plus the metadata and
 * statistics it reports.
 *
 * @module providers/types
 */

import type { ProviderType } from '../schemas/common.js';
import type { PlaceRecord } from '../places/record.js';

// ============================================================================
// Metadata
// ============================================================================

/**
 * Static description of a provider.
 */
export interface ProviderInfo {
  /** Display name (e.g., "Nominatim") */
  name: string;
  version: string;
  description: string;
  /** Feature flags such as "basic_search" or "coordinates" */
  features: readonly string[];
  requiresApiKey: boolean;
  supportsAutocomplete: boolean;
  rateLimitPerMinute: number;
  /** ISO country codes; empty means worldwide */
  supportedCountries: readonly string[];
}

/**
 * Request counters kept by each provider instance.
 */
export interface ProviderStats {
  successfulRequests: number;
  failedRequests: number;
  /** Message of the most recent failure; cleared by a success */
  lastError: string | null;
}

// ============================================================================
// Provider Contract
// ============================================================================

/**
 * A city search backend.
 *
 * `search` resolves with a non-empty list of records or rejects with a
 * SearchProviderError. Starting a new search cancels the one in flight,
 * which then rejects with code CANCELLED.
 */
export interface SearchProvider {
  readonly type: ProviderType;
  readonly info: ProviderInfo;

  search(query: string): Promise<PlaceRecord[]>;
  cancel(): void;
  isSearching(): boolean;
  getStats(): ProviderStats;
}

/**
 * Factory for lazy provider instantiation.
 */
export type ProviderFactory = () => SearchProvider;
