/**
 * Search Provider Exports
 *
 * @module providers
 */

export type { SearchProvider, ProviderInfo, ProviderStats, ProviderFactory } from './types.js';

export {
  SearchProviderError,
  isSearchProviderError,
  isRetryableError,
  isCancellation,
  cancelledError,
  describeError,
  type SearchErrorCode,
} from './errors.js';

export { BaseSearchProvider, type BaseProviderOptions } from './base.js';

export {
  ProviderRegistry,
  availableProviders,
  defaultProviderType,
  providerTypeToString,
  providerTypeFromString,
  isKnownProviderName,
  isProviderAvailable,
  providerInfo,
  providerRequiresApiKey,
  describeProvider,
  createProvider,
  createDefaultRegistry,
} from './registry.js';

export * from './nominatim/index.js';
export * from './mock/index.js';
