/**
 * Codepoint decoding constants
 */

/** Separator between codepoints in a sequence ("1F468-200D-1F4BB") */
export const CODEPOINT_SEPARATOR = "-";

/** One codepoint token: hex digits only, range checked after parsing */
export const CODEPOINT_TOKEN_PATTERN = /^[0-9A-Fa-f]+$/;

export const MAX_CODEPOINT = 0x10ffff;

/** UTF-16 surrogate range, not Unicode scalar values */
export const SURROGATE_MIN = 0xd800;
export const SURROGATE_MAX = 0xdfff;
