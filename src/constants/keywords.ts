/**
 * Keyword derivation constants
 */

/**
 * Generic taxonomy words that never become search keywords.
 *
 * They appear across many subcategories ("object-other", "other-symbol")
 * and do not discriminate between emoji.
 */
export const GENERIC_TAXONOMY_WORDS: readonly string[] = [
  "object",
  "other",
  "symbol",
];

/**
 * Separator between taxonomy label tokens ("hand-fingers-closed")
 */
export const SUBCATEGORY_SEPARATOR = "-";

/**
 * Separator between the display name's leading term and derived keywords
 */
export const DISPLAY_NAME_SEPARATOR = ", ";
