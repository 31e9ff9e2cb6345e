/**
 * Provider Registry
 *
 * Central registry for search provider implementations, plus static
 * metadata about the provider types the tool knows how to build.
 *
 * @module providers/registry
 */

import type { Config } from '../config/index.js';
import type { Logger } from '../logging/index.js';
import { ProviderTypeSchema, type ProviderType } from '../schemas/common.js';
import { MOCK_INFO, MockProvider } from './mock/provider.js';
import { NOMINATIM_INFO, NominatimProvider } from './nominatim/provider.js';
import type { ProviderFactory, ProviderInfo, SearchProvider } from './types.js';

// ============================================================================
// Provider Registry Class
// ============================================================================

/**
 * ProviderRegistry holds one provider per type.
 *
 * Providers can be registered directly or through a factory that runs on
 * first access.
 *
 * @example
 * ```typescript
 * const registry = new ProviderRegistry();
 * registry.registerFactory('mock', () => new MockProvider());
 *
 * const provider = registry.get('mock');
 * ```
 */
export class ProviderRegistry {
  private readonly providers = new Map<ProviderType, SearchProvider>();
  private readonly factories = new Map<ProviderType, ProviderFactory>();

  /**
   * Register a provider instance directly.
   *
   * @throws Error if a provider of the same type is already registered
   */
  register(provider: SearchProvider): void {
    if (this.has(provider.type)) {
      throw new Error(`Provider '${provider.type}' is already registered`);
    }
    this.providers.set(provider.type, provider);
  }

  /**
   * Register a factory for lazy instantiation.
   *
   * @throws Error if a provider of the same type is already registered
   */
  registerFactory(type: ProviderType, factory: ProviderFactory): void {
    if (this.has(type)) {
      throw new Error(`Provider '${type}' is already registered`);
    }
    this.factories.set(type, factory);
  }

  /**
   * Get a provider by type, instantiating it on first access.
   */
  get(type: ProviderType): SearchProvider | undefined {
    const existing = this.providers.get(type);
    if (existing) {
      return existing;
    }

    const factory = this.factories.get(type);
    if (factory) {
      const provider = factory();
      this.providers.set(type, provider);
      this.factories.delete(type);
      return provider;
    }

    return undefined;
  }

  has(type: ProviderType): boolean {
    return this.providers.has(type) || this.factories.has(type);
  }

  /**
   * Registered provider types, sorted alphabetically.
   */
  getRegisteredTypes(): ProviderType[] {
    return [...new Set([...this.providers.keys(), ...this.factories.keys()])].sort();
  }

  unregister(type: ProviderType): boolean {
    const deletedDirect = this.providers.delete(type);
    const deletedFactory = this.factories.delete(type);
    return deletedDirect || deletedFactory;
  }

  clear(): void {
    this.providers.clear();
    this.factories.clear();
  }

  get size(): number {
    return this.getRegisteredTypes().length;
  }
}

// ============================================================================
// Static Provider Metadata
// ============================================================================

const DISPLAY_NAMES: Record<ProviderType, string> = {
  nominatim: 'Nominatim',
  mock: 'Mock',
};

const DESCRIPTIONS: Record<ProviderType, string> = {
  nominatim: 'OpenStreetMap Nominatim search service - free, no API key required',
  mock: 'Mock service for testing - returns predefined test data',
};

const PROVIDER_INFO: Record<ProviderType, ProviderInfo> = {
  nominatim: NOMINATIM_INFO,
  mock: MOCK_INFO,
};

/**
 * Display names of every provider type, default first.
 */
export function availableProviders(): string[] {
  return ProviderTypeSchema.options.map((type) => DISPLAY_NAMES[type]);
}

export function defaultProviderType(): ProviderType {
  return 'nominatim';
}

export function providerTypeToString(type: ProviderType): string {
  return DISPLAY_NAMES[type];
}

/**
 * Resolve a provider name case-insensitively. Unknown names fall back to
 * the default type with a warning.
 */
export function providerTypeFromString(name: string, logger?: Logger): ProviderType {
  const parsed = ProviderTypeSchema.safeParse(name.trim().toLowerCase());
  if (parsed.success) {
    return parsed.data;
  }

  const fallback = defaultProviderType();
  logger?.warn(`Unknown provider name: "${name}" - using ${providerTypeToString(fallback)}`);
  return fallback;
}

/**
 * Whether `name` names a known provider type, without falling back.
 */
export function isKnownProviderName(name: string): boolean {
  return ProviderTypeSchema.safeParse(name.trim().toLowerCase()).success;
}

export function isProviderAvailable(type: ProviderType): boolean {
  return ProviderTypeSchema.options.includes(type);
}

/**
 * Static metadata of a provider type, without building the provider.
 */
export function providerInfo(type: ProviderType): ProviderInfo {
  return PROVIDER_INFO[type];
}

export function providerRequiresApiKey(type: ProviderType): boolean {
  return providerInfo(type).requiresApiKey;
}

export function describeProvider(type: ProviderType): string {
  return DESCRIPTIONS[type];
}

// ============================================================================
// Construction
// ============================================================================

/**
 * Build a provider from configuration.
 */
export function createProvider(type: ProviderType, config: Config, logger?: Logger): SearchProvider {
  logger?.debug(`Creating provider: ${providerTypeToString(type)}`);

  switch (type) {
    case 'nominatim':
      return new NominatimProvider({
        logger,
        limit: config.nominatim.limit,
        client: {
          baseUrl: config.nominatim.baseUrl,
          userAgent: config.nominatim.userAgent,
          timeoutMs: config.nominatim.timeoutMs,
        },
      });
    case 'mock':
      return new MockProvider({
        logger,
        simulateDelay: config.mock.delayMs > 0,
        delayMs: config.mock.delayMs,
      });
  }
}

/**
 * Registry with a lazy factory for every provider type.
 */
export function createDefaultRegistry(config: Config, logger?: Logger): ProviderRegistry {
  const registry = new ProviderRegistry();
  for (const type of ProviderTypeSchema.options) {
    registry.registerFactory(type, () => createProvider(type, config, logger));
  }
  return registry;
}
