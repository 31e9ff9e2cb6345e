/**
 * Nominatim Search Provider
 *
 * City search backed by OpenStreetMap Nominatim. Free worldwide coverage,
 * no API key.
 *
 * @module providers/nominatim/provider
 */

import type { PlaceRecord } from '../../places/record.js';
import { BaseSearchProvider, type BaseProviderOptions } from '../base.js';
import { SearchProviderError } from '../errors.js';
import type { ProviderInfo } from '../types.js';
import { NominatimClient, type NominatimClientOptions } from './client.js';
import { mapNominatimResponse } from './mapper.js';
import { NominatimSearchRequest, REQUEST_DEFAULTS } from './request.js';

export const NOMINATIM_INFO: ProviderInfo = {
  name: 'Nominatim',
  version: '1.0',
  description: 'OpenStreetMap Nominatim geocoding service - free worldwide city search',
  features: ['basic_search', 'address_details', 'coordinates', 'country_filter'],
  requiresApiKey: false,
  supportsAutocomplete: false,
  rateLimitPerMinute: 60,
  supportedCountries: [],
};

export interface NominatimProviderOptions extends BaseProviderOptions {
  /** Maximum results per request (1-100, default 50) */
  limit?: number;
  /** Client to use; built from `client` options when omitted */
  clientInstance?: NominatimClient;
  client?: Omit<NominatimClientOptions, 'logger'>;
}

export class NominatimProvider extends BaseSearchProvider {
  readonly type = 'nominatim' as const;
  readonly info = NOMINATIM_INFO;

  private readonly client: NominatimClient;
  private readonly limit: number;

  constructor(options: NominatimProviderOptions = {}) {
    super(options);
    this.limit = options.limit ?? REQUEST_DEFAULTS.limit;
    this.client =
      options.clientInstance ?? new NominatimClient({ ...options.client, logger: options.logger });
  }

  protected async performSearch(query: string): Promise<PlaceRecord[]> {
    const request = new NominatimSearchRequest(query);
    request.setLimit(this.limit);

    const body = await this.client.search(request);
    const records = mapNominatimResponse(body);
    this.logger?.debug(`[nominatim] Mapped ${records.length} results`);

    if (records.length === 0) {
      throw new SearchProviderError('No cities found for your search query', 'NO_RESULTS');
    }
    return records;
  }

  protected abortSearch(): void {
    this.client.cancel();
  }
}
