/**
 * Text Normalization for Deduplication
 *
 * Case folding used by the duplicate relation and the display order.
 *
 * @module dedupe/normalize
 */

/**
 * Fold a string for case-insensitive comparison.
 *
 * Only case is folded: whitespace, punctuation and diacritics are kept, so
 * "Sao Paulo" and "São Paulo" remain different labels.
 *
 * @example
 * ```typescript
 * foldCase('BERLIN, Germany'); // 'berlin, germany'
 * ```
 */
export function foldCase(text: string): string {
  if (!text) {
    return '';
  }
  return text.toLowerCase();
}

/**
 * Case-insensitive string equality.
 */
export function equalsIgnoreCase(a: string, b: string): boolean {
  return foldCase(a) === foldCase(b);
}

/**
 * Three-way comparison of two strings by UTF-16 code units.
 *
 * Locale-independent: the same inputs sort the same way everywhere.
 *
 * @returns Negative if a < b, positive if a > b, 0 if equal
 */
export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
