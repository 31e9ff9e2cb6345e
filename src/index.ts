/**
 * citysearch
 *
 * City search with duplicate merging: providers, the deduplicating result
 * collection and the search controller. The CLI lives in ./cli.
 *
 * @module citysearch
 */

export * from './places/index.js';
export * from './dedupe/index.js';
export * from './providers/index.js';
export * from './search/index.js';
export type { Logger } from './logging/index.js';
export { loadConfig, getConfig, resetConfig, ConfigError, type Config } from './config/index.js';
export {
  CoordinatesSchema,
  ProviderTypeSchema,
  OutputFormatSchema,
  PlaceFieldsSchema,
  type Coordinates,
  type ProviderType,
  type OutputFormat,
} from './schemas/index.js';
