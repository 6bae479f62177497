/**
 * Environment variable names, defaults and exit codes
 */

export const DATASET_PATH_ENV = "EMOJI_DATASET_PATH";
export const OUTPUT_PATH_ENV = "PACK_OUTPUT_PATH";
export const KEYWORD_PREFIX_ENV = "PACK_KEYWORD_PREFIX";
export const KEYWORD_SUFFIX_ENV = "PACK_KEYWORD_SUFFIX";
export const MAX_RECORDS_ENV = "PACK_MAX_RECORDS";
export const ICON_PATH_ENV = "PACK_ICON_PATH";

export const DEFAULT_KEYWORD_PREFIX = ";";
export const DEFAULT_KEYWORD_SUFFIX = "";
export const DEFAULT_OUTPUT_PATH = "emoji-snippets.alfredsnippets";

/**
 * Process exit statuses used by the entry point
 */
export const EXIT_CODES = {
  ok: 0,
  unexpected: 1,
  config: 2,
  dataset: 3,
  duplicateFilename: 4,
} as const;
