/**
 * Emoji dataset entry validation
 *
 * Validates raw dataset entries and converts them into EmojiRecords.
 * Required fields: unified, name, category, subcategory (non-empty strings)
 * and short_names (non-empty list of non-empty strings).
 */

import type { EmojiRecord, RawEmojiEntry } from "@/types";
import { MalformedRecordError } from "@/errors";

/**
 * Narrow an unknown value to a plain object
 */
export function isRawEmojiEntry(value: unknown): value is RawEmojiEntry {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validates that a value is a non-empty string.
 *
 * @throws {MalformedRecordError} If value is not a non-empty string
 */
function requireNonEmptyString(
  value: unknown,
  field: string,
  index?: number,
): string {
  if (typeof value !== "string") {
    throw new MalformedRecordError(
      field,
      `must be a string, got ${value === null ? "null" : typeof value}`,
      index,
    );
  }
  if (value.trim().length === 0) {
    throw new MalformedRecordError(
      field,
      "cannot be empty or whitespace-only",
      index,
    );
  }
  return value;
}

/**
 * Validates the shortcode list.
 *
 * @throws {MalformedRecordError} If value is not a non-empty list of non-empty strings
 */
function requireShortcodes(value: unknown, index?: number): string[] {
  if (!Array.isArray(value)) {
    throw new MalformedRecordError(
      "short_names",
      `must be an array, got ${value === null ? "null" : typeof value}`,
      index,
    );
  }
  if (value.length === 0) {
    throw new MalformedRecordError("short_names", "cannot be empty", index);
  }
  return value.map((shortcode: unknown, i: number) =>
    requireNonEmptyString(shortcode, `short_names[${i}]`, index),
  );
}

/**
 * Validate one raw dataset entry.
 *
 * @param entry - Raw entry from the dataset
 * @param index - Position in the dataset, used in error messages
 * @returns Validated EmojiRecord
 * @throws {MalformedRecordError} If a required field is missing or empty
 */
export function validateEmojiEntry(
  entry: unknown,
  index?: number,
): EmojiRecord {
  if (!isRawEmojiEntry(entry)) {
    throw new MalformedRecordError("entry", "must be an object", index);
  }

  return {
    codepoints: requireNonEmptyString(entry.unified, "unified", index),
    name: requireNonEmptyString(entry.name, "name", index),
    category: requireNonEmptyString(entry.category, "category", index),
    subcategory: requireNonEmptyString(entry.subcategory, "subcategory", index),
    shortcodes: requireShortcodes(entry.short_names, index),
  };
}
