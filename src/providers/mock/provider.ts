/**
 * Mock Search Provider
 *
 * Offline provider returning canned cities, with optional latency, random
 * failures and duplicate-heavy result sets. Used by tests and demos.
 *
 * @module providers/mock/provider
 */

import { PlaceRecord } from '../../places/record.js';
import { PlaceFieldsSchema, type PlaceFields } from '../../schemas/place.js';
import { BaseSearchProvider, type BaseProviderOptions } from '../base.js';
import { SearchProviderError, cancelledError } from '../errors.js';
import type { ProviderInfo } from '../types.js';
import { MOCK_CITIES, TEST_CITY_VARIANTS, type MockCity } from './cities.js';

export const MOCK_INFO: ProviderInfo = {
  name: 'Mock',
  version: '1.0-test',
  description:
    'Mock service for testing - returns predefined test data with configurable delays and errors',
  features: ['basic_search', 'autocomplete', 'custom_results', 'error_simulation', 'delay_simulation'],
  requiresApiKey: false,
  supportsAutocomplete: true,
  rateLimitPerMinute: 1000,
  supportedCountries: ['US', 'DE', 'FR', 'UK'],
};

export const MOCK_DEFAULTS = {
  simulateDelay: true,
  delayMs: 500,
  simulateErrors: false,
  errorRate: 0.1,
  includeDuplicates: true,
} as const;

/** Maximum number of generic records produced for an unmatched query */
const MAX_GENERIC_RESULTS = 3;

export interface MockProviderOptions extends BaseProviderOptions {
  simulateDelay?: boolean;
  delayMs?: number;
  simulateErrors?: boolean;
  /** Probability of a simulated failure, clamped to [0, 1] */
  errorRate?: number;
  includeDuplicates?: boolean;
  /** Fixed results; entries that are not valid place fields are dropped */
  customResults?: readonly unknown[];
  /** Source of uniform numbers in [0, 1); defaults to Math.random */
  random?: () => number;
}

function toRecord(city: MockCity): PlaceRecord {
  return new PlaceRecord(
    city.name,
    `${city.name}, ${city.country}`,
    city.country,
    city.latitude,
    city.longitude
  );
}

function clampRate(rate: number): number {
  if (Number.isNaN(rate)) return 0;
  return Math.min(1, Math.max(0, rate));
}

/**
 * Build the canned result set for a query.
 *
 * A city matches when its lower-cased name or country contains the
 * lower-cased query, or the query contains its name. With no match at all,
 * generic "Mock City" records are generated.
 */
export function createMockCities(query: string, includeDuplicates: boolean): PlaceRecord[] {
  const lowerQuery = query.toLowerCase();

  const cities = MOCK_CITIES.filter((city) => {
    const name = city.name.toLowerCase();
    return (
      name.includes(lowerQuery) ||
      city.country.toLowerCase().includes(lowerQuery) ||
      lowerQuery.includes(name)
    );
  }).map(toRecord);

  if (includeDuplicates && lowerQuery.includes('test')) {
    cities.push(...TEST_CITY_VARIANTS.map(toRecord));
  }

  if (cities.length === 0 && lowerQuery !== '') {
    const count = Math.min(MAX_GENERIC_RESULTS, lowerQuery.length);
    for (let i = 0; i < count; i++) {
      cities.push(
        toRecord({
          name: `Mock City ${i + 1} (${query})`,
          country: 'Mock Country',
          latitude: 50.0 + i * 0.1,
          longitude: 10.0 + i * 0.1,
        })
      );
    }
  }

  return cities;
}

interface PendingDelay {
  timer: ReturnType<typeof setTimeout>;
  reject: (error: Error) => void;
}

export class MockProvider extends BaseSearchProvider {
  readonly type = 'mock' as const;
  readonly info = MOCK_INFO;

  private simulateDelay: boolean;
  private delayMs: number;
  private simulateErrors: boolean;
  private errorRate: number;
  private includeDuplicates: boolean;
  private customResults: PlaceFields[];
  private readonly random: () => number;
  private pending: PendingDelay | null = null;

  constructor(options: MockProviderOptions = {}) {
    super(options);
    this.simulateDelay = options.simulateDelay ?? MOCK_DEFAULTS.simulateDelay;
    this.delayMs = options.delayMs ?? MOCK_DEFAULTS.delayMs;
    this.simulateErrors = options.simulateErrors ?? MOCK_DEFAULTS.simulateErrors;
    this.errorRate = clampRate(options.errorRate ?? MOCK_DEFAULTS.errorRate);
    this.includeDuplicates = options.includeDuplicates ?? MOCK_DEFAULTS.includeDuplicates;
    this.customResults = this.validateCustomResults(options.customResults ?? []);
    this.random = options.random ?? Math.random;
  }

  // ==========================================================================
  // Configuration
  // ==========================================================================

  setSimulateNetworkDelay(enabled: boolean, delayMs: number = MOCK_DEFAULTS.delayMs): void {
    this.simulateDelay = enabled;
    this.delayMs = delayMs;
    this.logger?.info(
      `[mock] Network delay simulation ${enabled ? 'enabled' : 'disabled'} with ${delayMs}ms delay`
    );
  }

  setSimulateErrors(enabled: boolean, errorRate: number = MOCK_DEFAULTS.errorRate): void {
    this.simulateErrors = enabled;
    this.errorRate = clampRate(errorRate);
    this.logger?.info(
      `[mock] Error simulation ${enabled ? 'enabled' : 'disabled'} with ${(this.errorRate * 100).toFixed(1)}% error rate`
    );
  }

  getErrorRate(): number {
    return this.errorRate;
  }

  setIncludeDuplicates(enabled: boolean): void {
    this.includeDuplicates = enabled;
  }

  /**
   * Replace the canned data with fixed results, returned for every query.
   */
  setCustomResults(results: readonly unknown[]): void {
    this.customResults = this.validateCustomResults(results);
    this.logger?.info(`[mock] Set ${this.customResults.length} custom mock results`);
  }

  clearCustomResults(): void {
    this.customResults = [];
    this.logger?.info('[mock] Cleared custom mock results');
  }

  // ==========================================================================
  // Search
  // ==========================================================================

  protected async performSearch(query: string): Promise<PlaceRecord[]> {
    this.logger?.debug(
      `[mock] Search configuration - delay: ${this.simulateDelay ? this.delayMs : 0}ms, ` +
        `error simulation: ${this.simulateErrors ? 'enabled' : 'disabled'}`
    );

    if (this.simulateDelay) {
      await this.delay(this.delayMs);
    }

    if (this.shouldSimulateError()) {
      this.logger?.warn('[mock] Simulating network error');
      throw new SearchProviderError(
        `Simulated network error for query: ${query}`,
        'SIMULATED',
        true
      );
    }

    const results =
      this.customResults.length > 0
        ? this.customResults.map((fields) => PlaceRecord.from(fields))
        : createMockCities(query, this.includeDuplicates);

    this.logger?.debug(`[mock] Generated ${results.length} mock cities for query: ${query}`);

    if (results.length === 0) {
      throw new SearchProviderError(`No mock cities found for query: ${query}`, 'NO_RESULTS');
    }
    return results;
  }

  protected abortSearch(): void {
    if (this.pending) {
      clearTimeout(this.pending.timer);
      this.pending.reject(cancelledError());
      this.pending = null;
    }
  }

  // Parsed copies, so later edits by the caller do not leak in
  private validateCustomResults(results: readonly unknown[]): PlaceFields[] {
    const valid: PlaceFields[] = [];
    results.forEach((entry, index) => {
      const parsed = PlaceFieldsSchema.safeParse(entry);
      if (parsed.success) {
        valid.push(parsed.data);
      } else {
        this.logger?.warn(`[mock] Ignoring invalid custom result at index ${index}`);
      }
    });
    return valid;
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = null;
        resolve();
      }, ms);
      this.pending = { timer, reject };
    });
  }

  private shouldSimulateError(): boolean {
    return this.simulateErrors && this.random() < this.errorRate;
  }
}
