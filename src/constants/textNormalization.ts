/**
 * Text normalization constants
 *
 * Patterns used to tokenize emoji names and to derive title-cased
 * and filesystem-safe forms of them.
 */

/** Splits an emoji name into words */
export const NAME_TOKEN_SEPARATOR_PATTERN = /\s+/;

/** Leading/trailing colons on a name word ("KEYCAP:" → "keycap") */
export const EDGE_COLONS_PATTERN = /^:+|:+$/g;

/**
 * First letter of each word, where words start the string or follow
 * whitespace or a hyphen ("man-to-man" → "Man-To-Man")
 */
export const TITLE_WORD_START_PATTERN = /(^|[\s-])(\p{L})/gu;

export const WHITESPACE_RUN_PATTERN = /\s+/g;
