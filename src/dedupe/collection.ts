/**
 * Deduplicating Place Collection
 *
 * Ordered, duplicate-free container for the places shown to the user.
 *
 * Insertion strategy:
 * - Absent entries (null/undefined) are dropped silently
 * - A candidate that duplicates a current member is discarded
 * - Within one batch the first of several mutual duplicates wins
 * - After any accepted insertion the whole list is re-sorted (stable)
 *
 * No operation throws. Every call either changes state (appended or reset)
 * or leaves it untouched.
 *
 * @module dedupe/collection
 */

import type { Logger } from '../logging/index.js';
import type { PlaceFields } from '../schemas/place.js';
import type { PlaceRecord } from '../places/record.js';

// ============================================================================
// Types
// ============================================================================

/**
 * A candidate as delivered by a provider; absent entries are tolerated.
 */
export type MaybePlace = PlaceRecord | null | undefined;

/**
 * Result of a single insertion.
 * - 'accepted': stored
 * - 'rejected': duplicate of an existing member, discarded
 * - 'ignored': no record given
 */
export type InsertOutcome = 'accepted' | 'rejected' | 'ignored';

/**
 * Change notification sent after a mutating operation.
 *
 * `appended` carries the newly stored records (in the order they were
 * accepted, not their final sorted position); `reset` means every row may
 * have changed and the view should redraw fully.
 */
export type CollectionChange =
  | { type: 'appended'; records: readonly PlaceRecord[]; version: number }
  | { type: 'reset'; version: number };

export type CollectionListener = (change: CollectionChange) => void;

/**
 * Options for constructing a collection.
 */
export interface CollectionOptions {
  /** Optional logger for diagnostics */
  logger?: Logger;
}

// ============================================================================
// Collection
// ============================================================================

/**
 * DeduplicatingCollection keeps the unique, sorted set of places visible to
 * the presentation layer.
 *
 * Mutation is synchronous and single-threaded: each call runs to completion
 * before the next begins.
 *
 * @example
 * ```typescript
 * const results = new DeduplicatingCollection();
 * results.subscribe((change) => render(change));
 *
 * results.insertBatch(candidates);
 * console.log(`${results.count()} unique places`);
 * ```
 */
export class DeduplicatingCollection implements Iterable<PlaceRecord> {
  private places: PlaceRecord[] = [];
  private readonly listeners = new Set<CollectionListener>();
  private readonly logger?: Logger;
  private changeVersion = 0;

  constructor(options: CollectionOptions = {}) {
    this.logger = options.logger;
  }

  // ==========================================================================
  // Read Accessors
  // ==========================================================================

  /**
   * Number of places currently held.
   */
  get size(): number {
    return this.places.length;
  }

  count(): number {
    return this.places.length;
  }

  /**
   * Change counter, incremented on every append or reset. A view can compare
   * it with the value it last rendered instead of subscribing.
   */
  get version(): number {
    return this.changeVersion;
  }

  /**
   * Record at a display position, or undefined when out of range.
   */
  at(index: number): PlaceRecord | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= this.places.length) {
      return undefined;
    }
    return this.places[index];
  }

  /**
   * Named fields of the row at a display position.
   */
  row(index: number): PlaceFields | undefined {
    return this.at(index)?.toFields();
  }

  /**
   * Snapshot of the current ordered contents.
   */
  toArray(): readonly PlaceRecord[] {
    return [...this.places];
  }

  [Symbol.iterator](): Iterator<PlaceRecord> {
    return this.toArray()[Symbol.iterator]();
  }

  // ==========================================================================
  // Mutations
  // ==========================================================================

  /**
   * Insert a single record unless it duplicates a current member.
   */
  insertOne(record: MaybePlace): InsertOutcome {
    if (!record) {
      return 'ignored';
    }

    const existing = this.places.find((place) => place.isDuplicateOf(record));
    if (existing) {
      this.logger?.debug(
        `[collection] Skipping duplicate place: ${record.displayLabel} (matches ${existing.displayLabel})`
      );
      return 'rejected';
    }

    this.places.push(record);
    this.sortPlaces();
    this.notify({ type: 'appended', records: [record], version: ++this.changeVersion });

    return 'accepted';
  }

  /**
   * Insert a batch of candidates.
   *
   * A candidate is accepted only if it duplicates neither a current member
   * nor a candidate accepted earlier in the same batch. Accepted candidates
   * are appended together and the list is sorted once.
   */
  insertBatch(records: Iterable<MaybePlace>): void {
    const accepted = this.filterDuplicates(records);

    if (accepted.length === 0) {
      return;
    }

    this.places.push(...accepted);
    this.sortPlaces();
    this.notify({ type: 'appended', records: accepted, version: ++this.changeVersion });
  }

  /**
   * Remove every place. Clearing an empty collection is a no-op.
   */
  clear(): void {
    if (this.places.length === 0) {
      return;
    }

    this.places = [];
    this.notify({ type: 'reset', version: ++this.changeVersion });
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  /**
   * Whether any of the given candidates duplicates a current member.
   * Absent entries are ignored. Has no side effects.
   */
  containsAnyDuplicateOf(records: Iterable<MaybePlace>): boolean {
    for (const candidate of records) {
      if (candidate && this.places.some((place) => place.isDuplicateOf(candidate))) {
        return true;
      }
    }
    return false;
  }

  // ==========================================================================
  // Observers
  // ==========================================================================

  /**
   * Register a change listener.
   *
   * @returns Function that removes the listener
   */
  subscribe(listener: CollectionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  /**
   * Two-level duplicate filter: against current members, then against the
   * candidates accepted so far in this batch.
   */
  private filterDuplicates(records: Iterable<MaybePlace>): PlaceRecord[] {
    const accepted: PlaceRecord[] = [];
    let duplicatesRemoved = 0;

    for (const candidate of records) {
      if (!candidate) continue;

      const isDuplicate =
        this.places.some((place) => place.isDuplicateOf(candidate)) ||
        accepted.some((other) => other.isDuplicateOf(candidate));

      if (isDuplicate) {
        duplicatesRemoved++;
      } else {
        accepted.push(candidate);
      }
    }

    if (duplicatesRemoved > 0) {
      this.logger?.debug(`[collection] Filtered out ${duplicatesRemoved} duplicate places`);
    }

    return accepted;
  }

  private sortPlaces(): void {
    this.places.sort((a, b) => a.compareTo(b));
  }

  private notify(change: CollectionChange): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(change);
      } catch (error) {
        this.logger?.error(
          `[collection] Change listener failed: ${error instanceof Error ? error.message : String(error)}`
        );
      }
    }
  }
}
