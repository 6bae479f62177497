/**
 * Emoji name normalization utilities
 *
 * Deterministic transforms of an emoji's Unicode name:
 * - word tokens for keyword de-duplication
 * - title case for display names
 * - a filesystem-safe form shared by snippet uids and archive filenames
 */

import {
  EDGE_COLONS_PATTERN,
  FILENAME_RESERVED_PATTERN,
  NAME_TOKEN_SEPARATOR_PATTERN,
  TITLE_WORD_START_PATTERN,
  WHITESPACE_RUN_PATTERN,
} from "@/constants";

/**
 * Split an emoji name into lowercase word tokens.
 *
 * Steps:
 * 1. Lowercase
 * 2. Split on whitespace
 * 3. Strip leading/trailing colons from each word
 * 4. Drop empty tokens
 *
 * @example
 * tokenizeName("GRINNING FACE") // ["grinning", "face"]
 * tokenizeName("KEYCAP: *") // ["keycap", "*"]
 */
export function tokenizeName(name: string): string[] {
  return name
    .toLowerCase()
    .split(NAME_TOKEN_SEPARATOR_PATTERN)
    .map((token) => token.replace(EDGE_COLONS_PATTERN, ""))
    .filter((token) => token.length > 0);
}

/**
 * Title-case a name: first letter of each word upper, the rest lower.
 *
 * @example
 * titleCase("THUMBS UP SIGN") // "Thumbs Up Sign"
 * titleCase("FACE WITH OPEN-MOUTH") // "Face With Open-Mouth"
 */
export function titleCase(name: string): string {
  return name
    .toLowerCase()
    .replace(
      TITLE_WORD_START_PATTERN,
      (_match: string, lead: string, letter: string) =>
        lead + letter.toUpperCase(),
    );
}

/**
 * Remove characters that are reserved in filenames on common filesystems.
 */
export function stripReservedFilenameChars(text: string): string {
  return text.replace(FILENAME_RESERVED_PATTERN, "");
}

/**
 * Filesystem-safe form of an emoji name.
 *
 * Reserved characters are removed, the result is trimmed and whitespace
 * runs become a single underscore. Case is preserved.
 *
 * @example
 * sanitizeName("GRINNING FACE") // "GRINNING_FACE"
 * sanitizeName("KEYCAP: #") // "KEYCAP_#"
 */
export function sanitizeName(name: string): string {
  return stripReservedFilenameChars(name)
    .trim()
    .replace(WHITESPACE_RUN_PATTERN, "_");
}
