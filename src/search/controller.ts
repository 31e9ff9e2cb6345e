/**
 * City Search Controller
 *
 * Presentation-side owner of the result collection. Runs searches against
 * the active provider, feeds successful batches into the collection and
 * exposes busy state, the last error and request statistics to views.
 *
 * @module search/controller
 */

import { DeduplicatingCollection } from '../dedupe/collection.js';
import type { Logger } from '../logging/index.js';
import {
  describeError,
  isCancellation,
  isSearchProviderError,
  type SearchErrorCode,
} from '../providers/errors.js';
import {
  isKnownProviderName,
  providerTypeFromString,
  providerTypeToString,
  type ProviderRegistry,
} from '../providers/registry.js';
import type { SearchProvider } from '../providers/types.js';
import { openInBrowser } from './browser.js';
import { buildMapUrl, DEFAULT_MAP_ZOOM } from './map-url.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Events emitted while searching.
 */
export type ControllerEvent =
  | { type: 'searchStarted'; query: string }
  | { type: 'searchCompleted'; count: number }
  | { type: 'searchFailed'; message: string }
  | { type: 'searchFinished' }
  | { type: 'providerChanged'; name: string };

export type ControllerListener = (event: ControllerEvent) => void;

/**
 * Opens a URL; resolves false when it could not be handed off.
 */
export type UrlOpener = (url: string) => Promise<boolean>;

export interface CitySearchControllerOptions {
  provider: SearchProvider;
  /** Collection to fill; a new one is created when omitted */
  results?: DeduplicatingCollection;
  logger?: Logger;
  /** Defaults to the platform browser launcher */
  openUrl?: UrlOpener;
  /** Zoom level of map links (default 15) */
  mapZoom?: number;
}

// ============================================================================
// Controller
// ============================================================================

/**
 * CitySearchController coordinates one provider and one collection.
 *
 * A new search supersedes the previous one: results and events of a
 * superseded search are dropped.
 *
 * @example
 * ```typescript
 * const controller = new CitySearchController({ provider: new MockProvider() });
 * const count = await controller.search('Berlin');
 *
 * for (const place of controller.results) {
 *   console.log(place.displayLabel);
 * }
 * ```
 */
export class CitySearchController {
  readonly results: DeduplicatingCollection;

  private provider: SearchProvider;
  private readonly logger?: Logger;
  private readonly openUrl: UrlOpener;
  private readonly mapZoom: number;
  private readonly listeners = new Set<ControllerListener>();
  private searching = false;
  private error = '';
  private code: SearchErrorCode | null = null;
  private generation = 0;

  constructor(options: CitySearchControllerOptions) {
    this.provider = options.provider;
    this.results = options.results ?? new DeduplicatingCollection({ logger: options.logger });
    this.logger = options.logger;
    this.openUrl = options.openUrl ?? ((url) => openInBrowser(url));
    this.mapZoom = options.mapZoom ?? DEFAULT_MAP_ZOOM;
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  get isSearching(): boolean {
    return this.searching;
  }

  /**
   * Message of the last failure, or an empty string.
   */
  get errorMessage(): string {
    return this.error;
  }

  /**
   * Provider error code of the last failed search, when it had one.
   */
  get errorCode(): SearchErrorCode | null {
    return this.code;
  }

  get currentProviderName(): string {
    return this.provider.info.name;
  }

  get providerDescription(): string {
    return this.provider.info.description;
  }

  get successfulRequests(): number {
    return this.provider.getStats().successfulRequests;
  }

  get failedRequests(): number {
    return this.provider.getStats().failedRequests;
  }

  getProvider(): SearchProvider {
    return this.provider;
  }

  // ==========================================================================
  // Commands
  // ==========================================================================

  /**
   * Search for cities, replacing the current results.
   *
   * @returns Number of records the provider returned (before deduplication);
   *   0 when the search failed or was superseded
   */
  async search(query: string): Promise<number> {
    const generation = ++this.generation;

    this.results.clear();
    this.setErrorMessage('');
    if (this.provider.isSearching()) {
      this.provider.cancel();
    }

    this.setSearching(true);
    this.emit({ type: 'searchStarted', query });

    try {
      const records = await this.provider.search(query);
      if (generation !== this.generation) {
        return 0;
      }

      this.results.insertBatch(records);
      this.logger?.debug(
        `[controller] ${records.length} results, ${this.results.count()} after deduplication`
      );
      this.emit({ type: 'searchCompleted', count: records.length });
      return records.length;
    } catch (error) {
      if (generation !== this.generation || isCancellation(error)) {
        return 0;
      }

      const message = describeError(error);
      this.setErrorMessage(message, isSearchProviderError(error) ? error.code : null);
      this.emit({ type: 'searchFailed', message });
      return 0;
    } finally {
      if (generation === this.generation) {
        this.setSearching(false);
        this.emit({ type: 'searchFinished' });
      }
    }
  }

  /**
   * Drop results and the error message, and stop any search in flight.
   */
  clearResults(): void {
    this.generation++;
    this.results.clear();
    this.setErrorMessage('');
    this.provider.cancel();

    if (this.searching) {
      this.setSearching(false);
      this.emit({ type: 'searchFinished' });
    }
  }

  /**
   * Switch to another provider. A search in flight on the old one is
   * cancelled.
   */
  setProvider(provider: SearchProvider): void {
    if (provider === this.provider) {
      return;
    }

    this.clearResults();
    this.provider = provider;
    this.logger?.debug(`[controller] Switched to provider: ${provider.info.name}`);
    this.emit({ type: 'providerChanged', name: provider.info.name });
  }

  /**
   * Switch provider by name through a registry.
   *
   * @returns false (with errorMessage set) when the name is unknown or the
   *   registry has no such provider
   */
  setProviderType(name: string, registry: ProviderRegistry): boolean {
    if (!isKnownProviderName(name)) {
      this.setErrorMessage(`Provider '${name}' is not available`);
      return false;
    }

    const type = providerTypeFromString(name, this.logger);
    const provider = registry.get(type);
    if (!provider) {
      this.setErrorMessage(`Failed to create provider '${providerTypeToString(type)}'`);
      return false;
    }

    this.setProvider(provider);
    this.setErrorMessage('');
    return true;
  }

  /**
   * Open an OpenStreetMap view centred on a coordinate.
   */
  async openPlaceInBrowser(latitude: number, longitude: number, name = ''): Promise<boolean> {
    const url = buildMapUrl(latitude, longitude, this.mapZoom);
    this.logger?.debug(`[controller] Opening ${name || 'location'} at ${latitude}, ${longitude}: ${url}`);

    const opened = await this.openUrl(url);
    if (!opened) {
      this.logger?.warn(`Failed to open URL in browser: ${url}`);
      this.setErrorMessage('Failed to open location in browser');
    }
    return opened;
  }

  // ==========================================================================
  // Observers
  // ==========================================================================

  /**
   * Register an event listener.
   *
   * @returns Function that removes the listener
   */
  subscribe(listener: ControllerListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(event: ControllerEvent): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (error) {
        this.logger?.error(`[controller] Event listener failed: ${describeError(error)}`);
      }
    }
  }

  private setSearching(searching: boolean): void {
    this.searching = searching;
  }

  private setErrorMessage(message: string, code: SearchErrorCode | null = null): void {
    this.error = message;
    this.code = code;
  }
}
