/**
 * Place Record
 *
 * One candidate or confirmed place returned by a search provider. Records are
 * immutable: a changed place is a new record, so a collection holding a
 * record never sees it change underneath its sort order.
 *
 * @module places/record
 */

import type { PlaceFields } from '../schemas/place.js';
import {
  arePlacesEqual,
  comparePlaces,
  isDuplicatePlace,
  placeOrderKey,
  type PlaceOrderKey,
} from '../dedupe/similarity.js';

/**
 * A single place: short name, full label, country and coordinates.
 *
 * Construction performs no validation. Empty strings and out-of-range
 * coordinates are stored as given; checking them is the provider's job.
 *
 * @example
 * ```typescript
 * const berlin = new PlaceRecord('Berlin', 'Berlin, Germany', 'Germany', 52.52, 13.405);
 * const center = new PlaceRecord('Berlin Center', 'Berlin Center, Germany', 'Germany', 52.5201, 13.4051);
 *
 * berlin.isDuplicateOf(center); // true (coordinates within 0.001°)
 * ```
 */
export class PlaceRecord implements PlaceFields {
  constructor(
    readonly name: string,
    readonly displayLabel: string,
    readonly country: string,
    readonly latitude: number,
    readonly longitude: number
  ) {}

  /**
   * Build a record from a plain field object.
   */
  static from(fields: PlaceFields): PlaceRecord {
    return new PlaceRecord(
      fields.name,
      fields.displayLabel,
      fields.country,
      fields.latitude,
      fields.longitude
    );
  }

  /**
   * Key used to sort records for display:
   * (lower-cased label, country, latitude, longitude).
   */
  orderKey(): PlaceOrderKey {
    return placeOrderKey(this);
  }

  /**
   * Three-way display-order comparison with another record.
   */
  compareTo(other: PlaceFields): number {
    return comparePlaces(this, other);
  }

  /**
   * Whether this record describes the same place as `other`.
   * Symmetric: `a.isDuplicateOf(b) === b.isDuplicateOf(a)`.
   */
  isDuplicateOf(other: PlaceFields): boolean {
    return isDuplicatePlace(this, other);
  }

  /**
   * Strict field equality (coordinates within 1e-6 degrees).
   */
  equals(other: PlaceFields): boolean {
    return arePlacesEqual(this, other);
  }

  /**
   * Return a copy with some fields replaced.
   */
  withChanges(changes: Partial<PlaceFields>): PlaceRecord {
    return PlaceRecord.from({ ...this.toFields(), ...changes });
  }

  /**
   * Plain named-field view, as handed to the presentation layer.
   */
  toFields(): PlaceFields {
    return {
      name: this.name,
      displayLabel: this.displayLabel,
      country: this.country,
      latitude: this.latitude,
      longitude: this.longitude,
    };
  }

  toJSON(): PlaceFields {
    return this.toFields();
  }

  toString(): string {
    return `${this.displayLabel} (${this.latitude}, ${this.longitude})`;
  }
}
