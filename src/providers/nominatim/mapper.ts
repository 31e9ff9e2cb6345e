/**
 * Nominatim Response Mapper
 *
 * Transforms decoded Nominatim search responses into PlaceRecords.
 *
 * @module providers/nominatim/mapper
 */

import { PlaceRecord } from '../../places/record.js';
import { SearchProviderError } from '../errors.js';

/**
 * Address keys tried, in order, for the place's short name.
 */
const NAME_KEYS = ['city', 'town', 'village', 'municipality'] as const;

const DISPLAY_NAME_SEPARATOR = ', ';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(source: Record<string, unknown>, key: string): string {
  const value = source[key];
  return typeof value === 'string' ? value : '';
}

/**
 * Parse a decimal-degree string; anything unparseable becomes 0.
 */
export function parseCoordinate(value: unknown): number {
  if (typeof value !== 'string' || value.trim() === '') {
    return 0;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : 0;
}

/**
 * Short place name: the first address key present, else the first segment
 * of the display name.
 */
export function extractPlaceName(displayName: string, address: Record<string, unknown>): string {
  for (const key of NAME_KEYS) {
    if (key in address) {
      return stringField(address, key);
    }
  }
  return displayName.split(DISPLAY_NAME_SEPARATOR)[0];
}

/**
 * Map one result entry, or return null when it lacks a name or label.
 */
export function mapNominatimEntry(entry: Record<string, unknown>): PlaceRecord | null {
  const displayName = stringField(entry, 'display_name');
  const address = isRecord(entry.address) ? entry.address : {};

  const name = extractPlaceName(displayName, address);
  if (name === '' || displayName === '') {
    return null;
  }

  return new PlaceRecord(
    name,
    displayName,
    stringField(address, 'country'),
    parseCoordinate(entry.lat),
    parseCoordinate(entry.lon)
  );
}

/**
 * Map a decoded response body to records.
 *
 * @throws SearchProviderError (PARSE_ERROR) when the body is not an array
 */
export function mapNominatimResponse(body: unknown): PlaceRecord[] {
  if (!Array.isArray(body)) {
    throw new SearchProviderError('Invalid response format', 'PARSE_ERROR');
  }

  const records: PlaceRecord[] = [];
  for (const entry of body) {
    if (!isRecord(entry)) continue;

    const record = mapNominatimEntry(entry);
    if (record) {
      records.push(record);
    }
  }
  return records;
}
