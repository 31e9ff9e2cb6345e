/**
 * Common Zod Schemas - Shared types used across providers and the CLI
 */

import { z } from 'zod';

// ============================================
// Coordinates Schema
// ============================================

/**
 * Geographic coordinates in decimal degrees (WGS84).
 */
export const CoordinatesSchema = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
});

export type Coordinates = z.infer<typeof CoordinatesSchema>;

// ============================================
// Provider Type Schema
// ============================================

/**
 * Search providers the tool knows how to build.
 * - 'nominatim': OpenStreetMap Nominatim geocoder
 * - 'mock': offline provider with canned data
 */
export const ProviderTypeSchema = z.enum(['nominatim', 'mock']);

export type ProviderType = z.infer<typeof ProviderTypeSchema>;

// ============================================
// Output Format Schema
// ============================================

/**
 * Output formats supported by listing commands.
 */
export const OutputFormatSchema = z.enum(['table', 'json']);

export type OutputFormat = z.infer<typeof OutputFormatSchema>;
