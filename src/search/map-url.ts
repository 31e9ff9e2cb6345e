/**
 * OpenStreetMap link building.
 *
 * @module search/map-url
 */

export const DEFAULT_MAP_ZOOM = 15;

const OPENSTREETMAP_BASE = 'https://www.openstreetmap.org/';

/**
 * Map view centred on a coordinate, with six decimal places per axis.
 *
 * @example
 * ```typescript
 * buildMapUrl(52.52, 13.405); // https://www.openstreetmap.org/#map=15/52.520000/13.405000
 * ```
 */
export function buildMapUrl(latitude: number, longitude: number, zoom: number = DEFAULT_MAP_ZOOM): string {
  return `${OPENSTREETMAP_BASE}#map=${zoom}/${latitude.toFixed(6)}/${longitude.toFixed(6)}`;
}
