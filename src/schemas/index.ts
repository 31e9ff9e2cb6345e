/**
 * Zod Schemas for All Data Types
 *
 * Central export point for schema definitions shared across modules.
 */

// ============================================================================
// Common Types
// ============================================================================

export {
  CoordinatesSchema,
  ProviderTypeSchema,
  OutputFormatSchema,
  type Coordinates,
  type ProviderType,
  type OutputFormat,
} from './common.js';

// ============================================================================
// Place Fields
// ============================================================================

export { PlaceFieldsSchema, type PlaceFields } from './place.js';
