/**
 * Deduplication Module Exports
 *
 * Case folding, the duplicate relation, display ordering, and the
 * deduplicating result collection built on them.
 *
 * @module dedupe
 */

// Text normalization
export { foldCase, equalsIgnoreCase, compareText } from './normalize.js';

// Duplicate relation and display order
export {
  areCoordinatesClose,
  isDuplicatePlace,
  arePlacesEqual,
  placeOrderKey,
  comparePlaces,
  COORDINATE_THRESHOLD,
  COORDINATE_EPSILON,
  type PlaceOrderKey,
} from './similarity.js';

// Result collection
export {
  DeduplicatingCollection,
  type MaybePlace,
  type InsertOutcome,
  type CollectionChange,
  type CollectionListener,
  type CollectionOptions,
} from './collection.js';
