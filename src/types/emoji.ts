/**
 * Emoji dataset type definitions
 */

import type { CompileWarning } from "./compiler";

/**
 * Unvalidated dataset entry as found in emoji.json (iamcal/emoji-data shape).
 *
 * Only the fields the compiler reads are named; any other key is kept as unknown.
 */
export type RawEmojiEntry = {
  unified?: unknown;
  name?: unknown;
  category?: unknown;
  subcategory?: unknown;
  short_names?: unknown;
  [key: string]: unknown;
};

/**
 * Validated emoji record, the compiler's input unit
 */
export type EmojiRecord = {
  /** Hyphen-joined hex codepoints, e.g. "1F468-200D-1F4BB" */
  readonly codepoints: string;
  /** Unicode name, uppercase by convention ("GRINNING FACE") */
  readonly name: string;
  readonly category: string;
  /** Hyphen-joined taxonomy label ("face-smiling") */
  readonly subcategory: string;
  /** Non-empty, unique within the dataset */
  readonly shortcodes: readonly string[];
};

/**
 * Result of validating a raw dataset
 */
export type ParsedEmojiDataset = {
  records: EmojiRecord[];
  /** Index-addressed warnings for entries that were skipped */
  warnings: CompileWarning[];
};

/**
 * Presence statistics for a single dataset key
 */
export type DatasetKeyStats = {
  key: string;
  count: number;
  /** Share of entries carrying the key, 0-100 */
  percentage: number;
  /** Observed value types, sorted ("string", "list[string]", "null", ...) */
  types: string[];
};

/**
 * Key presence report over a whole dataset
 */
export type DatasetKeyReport = {
  totalEntries: number;
  alwaysPresent: DatasetKeyStats[];
  sometimesPresent: DatasetKeyStats[];
};
