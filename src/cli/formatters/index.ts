/**
 * CLI Formatters
 *
 * Re-exports all CLI formatting utilities.
 *
 * @module cli/formatters
 */

// Progress display utilities
export {
  ProgressSpinner,
  createSpinner,
  formatDuration,
  type SpinnerOptions,
} from './progress.js';

// Result formatters
export {
  truncate,
  padRight,
  formatCoordinate,
  formatPlacesHeader,
  formatPlacesDivider,
  formatPlaceRow,
  formatPlacesTable,
  formatSearchSummary,
  toSearchResultDocument,
  type SearchResultDocument,
} from './places.js';
