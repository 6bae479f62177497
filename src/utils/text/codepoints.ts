/**
 * Codepoint sequence decoding
 *
 * Turns a hyphen-delimited hex codepoint sequence into the string it denotes.
 * Decoding is codepoint-by-codepoint concatenation: no normalization and no
 * grapheme cluster validation.
 */

import {
  CODEPOINT_SEPARATOR,
  CODEPOINT_TOKEN_PATTERN,
  MAX_CODEPOINT,
  SURROGATE_MAX,
  SURROGATE_MIN,
} from "@/constants";
import { InvalidCodepointError } from "@/errors";

/**
 * Parse a single hex token into a Unicode scalar value.
 *
 * @throws {InvalidCodepointError} If the token is not hex or not a scalar value
 */
function parseCodepoint(token: string, input: string): number {
  if (!CODEPOINT_TOKEN_PATTERN.test(token)) {
    throw new InvalidCodepointError(token, input);
  }

  // Long tokens parse to a large number or Infinity, both above MAX_CODEPOINT
  const value = parseInt(token, 16);
  if (
    value > MAX_CODEPOINT ||
    (value >= SURROGATE_MIN && value <= SURROGATE_MAX)
  ) {
    throw new InvalidCodepointError(token, input);
  }

  return value;
}

/**
 * Decode a codepoint sequence into its character sequence.
 *
 * @param input - Hex codepoints joined by "-" (e.g. "1F468-200D-1F4BB")
 * @returns The concatenated characters
 * @throws {InvalidCodepointError} On empty input, an empty token, a non-hex
 *   token, or a value outside the Unicode scalar range
 *
 * @example
 * decodeCodepoints("1F600") // "😀"
 * decodeCodepoints("1F468-200D-1F4BB") // "👨‍💻" (man, ZWJ, laptop)
 */
export function decodeCodepoints(input: string): string {
  if (input.length === 0) {
    throw new InvalidCodepointError("", input);
  }

  const values = input
    .split(CODEPOINT_SEPARATOR)
    .map((token) => parseCodepoint(token, input));

  return String.fromCodePoint(...values);
}
