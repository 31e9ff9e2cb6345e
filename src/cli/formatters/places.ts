/**
 * Place Formatters
 *
 * Table and JSON rendering of search results.
 *
 * @module cli/formatters/places
 */

import chalk from 'chalk';
import type { PlaceFields } from '../../schemas/place.js';

// Column widths: #, CITY, COUNTRY, LATITUDE (LONGITUDE is last, unpadded)
const COLUMNS = { index: 5, label: 42, country: 22, latitude: 12 } as const;
const TABLE_WIDTH = 93;

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Truncate a string to a maximum length.
 */
export function truncate(str: string, maxLen: number): string {
  if (str.length <= maxLen) return str;
  return str.slice(0, maxLen - 3) + '...';
}

/**
 * Pad a string to a fixed width.
 */
export function padRight(str: string, width: number): string {
  // Account for ANSI codes by calculating visible length
  const visibleLength = str.replace(/\x1b\[[0-9;]*m/g, '').length;
  const padding = Math.max(0, width - visibleLength);
  return str + ' '.repeat(padding);
}

/**
 * Format a coordinate with four decimals (about 11 m).
 */
export function formatCoordinate(value: number): string {
  return value.toFixed(4);
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}

// ============================================================================
// Table
// ============================================================================

export function formatPlacesHeader(): string {
  const header =
    padRight('#', COLUMNS.index) +
    padRight('CITY', COLUMNS.label) +
    padRight('COUNTRY', COLUMNS.country) +
    padRight('LATITUDE', COLUMNS.latitude) +
    'LONGITUDE';

  return chalk.bold(header);
}

export function formatPlacesDivider(): string {
  return chalk.dim('-'.repeat(TABLE_WIDTH));
}

/**
 * Format one result row.
 *
 * @param position - 1-based row number, as accepted by `search --open`
 */
export function formatPlaceRow(position: number, place: PlaceFields): string {
  const label = place.displayLabel || place.name;

  return (
    padRight(String(position), COLUMNS.index) +
    padRight(truncate(label, COLUMNS.label - 2), COLUMNS.label) +
    padRight(truncate(place.country || '-', COLUMNS.country - 2), COLUMNS.country) +
    padRight(formatCoordinate(place.latitude), COLUMNS.latitude) +
    formatCoordinate(place.longitude)
  );
}

/**
 * Format results as table lines: header, divider, rows, divider.
 */
export function formatPlacesTable(places: readonly PlaceFields[]): string[] {
  return [
    formatPlacesHeader(),
    formatPlacesDivider(),
    ...places.map((place, index) => formatPlaceRow(index + 1, place)),
    formatPlacesDivider(),
  ];
}

/**
 * One-line summary, e.g. "5 results (1 duplicate merged)".
 *
 * @param received - records the provider returned
 * @param unique - records left after deduplication
 * @param shown - rows printed, when fewer than `unique`
 */
export function formatSearchSummary(received: number, unique: number, shown = unique): string {
  const merged = Math.max(0, received - unique);
  const summary = `${plural(unique, 'result')} (${plural(merged, 'duplicate')} merged)`;
  return shown < unique ? `${summary}, showing first ${shown}` : summary;
}

// ============================================================================
// JSON
// ============================================================================

/**
 * JSON document printed by `search --format json`.
 */
export interface SearchResultDocument {
  query: string;
  provider: string;
  received: number;
  unique: number;
  duplicatesMerged: number;
  /** Rows after the --limit cap */
  results: PlaceFields[];
}

export function toSearchResultDocument(
  query: string,
  provider: string,
  received: number,
  unique: number,
  places: readonly PlaceFields[]
): SearchResultDocument {
  return {
    query,
    provider,
    received,
    unique,
    duplicatesMerged: Math.max(0, received - unique),
    results: places.map((place) => ({
      name: place.name,
      displayLabel: place.displayLabel,
      country: place.country,
      latitude: place.latitude,
      longitude: place.longitude,
    })),
  };
}
