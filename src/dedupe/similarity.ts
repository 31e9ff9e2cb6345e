/**
 * Duplicate Detection and Display Order for Places
 *
 * Provides the comparison primitives the result collection is built on:
 * - Coordinate proximity (per-axis degree threshold)
 * - The duplicate relation (label, name + country, or proximity)
 * - The display order used to sort results
 *
 * @module dedupe/similarity
 */

import type { PlaceFields } from '../schemas/place.js';
import { compareText, equalsIgnoreCase, foldCase } from './normalize.js';

// ============================================================================
// Constants
// ============================================================================

/**
 * Maximum per-axis difference, in degrees, for two coordinates to count as
 * the same place. Roughly 100 m of latitude; the longitude span shrinks
 * towards the poles and the check does not wrap at the antimeridian.
 */
export const COORDINATE_THRESHOLD = 0.001;

/**
 * Tolerance for treating two coordinates as exactly equal.
 */
export const COORDINATE_EPSILON = 0.000001;

/**
 * Display-order key: lower-cased label, country, latitude, longitude.
 */
export type PlaceOrderKey = readonly [label: string, country: string, latitude: number, longitude: number];

// ============================================================================
// Geographic Proximity
// ============================================================================

/**
 * Checks whether two coordinate pairs lie within the proximity threshold.
 *
 * Both axes must differ by strictly less than {@link COORDINATE_THRESHOLD}.
 * Any NaN coordinate makes the pair "not close".
 *
 * @example
 * ```typescript
 * areCoordinatesClose(50.0, 10.0, 50.0009, 10.0009); // true
 * areCoordinatesClose(50.0, 10.0, 50.0011, 10.0011); // false
 * ```
 */
export function areCoordinatesClose(
  lat1: number,
  lon1: number,
  lat2: number,
  lon2: number
): boolean {
  const latDiff = Math.abs(lat1 - lat2);
  const lonDiff = Math.abs(lon1 - lon2);

  return latDiff < COORDINATE_THRESHOLD && lonDiff < COORDINATE_THRESHOLD;
}

// ============================================================================
// Duplicate Relation
// ============================================================================

/**
 * Decides whether two places describe the same physical place.
 *
 * Two places are duplicates when any of these hold:
 * 1. Their display labels match case-insensitively
 * 2. Both their names and their countries match case-insensitively
 * 3. Their coordinates are close (see {@link areCoordinatesClose})
 *
 * The relation is symmetric. It is not transitive: A may duplicate B and B
 * duplicate C while A and C stay distinct.
 */
export function isDuplicatePlace(a: PlaceFields, b: PlaceFields): boolean {
  if (equalsIgnoreCase(a.displayLabel, b.displayLabel)) {
    return true;
  }

  if (equalsIgnoreCase(a.name, b.name) && equalsIgnoreCase(a.country, b.country)) {
    return true;
  }

  return areCoordinatesClose(a.latitude, a.longitude, b.latitude, b.longitude);
}

/**
 * Strict equality: identical text fields and coordinates within
 * {@link COORDINATE_EPSILON}.
 */
export function arePlacesEqual(a: PlaceFields, b: PlaceFields): boolean {
  return (
    a.displayLabel === b.displayLabel &&
    a.name === b.name &&
    a.country === b.country &&
    Math.abs(a.latitude - b.latitude) < COORDINATE_EPSILON &&
    Math.abs(a.longitude - b.longitude) < COORDINATE_EPSILON
  );
}

// ============================================================================
// Display Order
// ============================================================================

/**
 * Builds the display-order key for a place.
 */
export function placeOrderKey(place: PlaceFields): PlaceOrderKey {
  return [foldCase(place.displayLabel), place.country, place.latitude, place.longitude];
}

/**
 * Compares two numbers, ordering NaN after every other value.
 */
function compareNumber(a: number, b: number): number {
  if (Number.isNaN(a) || Number.isNaN(b)) {
    return Number(Number.isNaN(a)) - Number(Number.isNaN(b));
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Comparator for sorting places in display order.
 *
 * Orders by lower-cased display label, then country (case-sensitive), then
 * latitude, then longitude, all ascending.
 *
 * @example
 * ```typescript
 * places.sort(comparePlaces);
 * ```
 */
export function comparePlaces(a: PlaceFields, b: PlaceFields): number {
  const [labelA, countryA, latA, lonA] = placeOrderKey(a);
  const [labelB, countryB, latB, lonB] = placeOrderKey(b);

  return (
    compareText(labelA, labelB) ||
    compareText(countryA, countryB) ||
    compareNumber(latA, latB) ||
    compareNumber(lonA, lonB)
  );
}
