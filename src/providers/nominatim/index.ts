/**
 * Nominatim Provider Exports
 *
 * @module providers/nominatim
 */

export {
  NominatimSearchRequest,
  REQUEST_DEFAULTS,
  MIN_LIMIT,
  MAX_LIMIT,
} from './request.js';

export {
  NominatimClient,
  NominatimApiError,
  isNominatimApiError,
  CLIENT_DEFAULTS,
  type FetchFn,
  type NominatimClientOptions,
} from './client.js';

export {
  mapNominatimResponse,
  mapNominatimEntry,
  extractPlaceName,
  parseCoordinate,
} from './mapper.js';

export { NominatimProvider, NOMINATIM_INFO, type NominatimProviderOptions } from './provider.js';
