/**
 * Pack configuration from environment variables
 *
 * Environment variables:
 *   - EMOJI_DATASET_PATH: emoji.json to compile (required)
 *   - PACK_OUTPUT_PATH: destination archive (defaults to emoji-snippets.alfredsnippets)
 *   - PACK_KEYWORD_PREFIX: keyword prefix (defaults to ";"; set but empty means no prefix)
 *   - PACK_KEYWORD_SUFFIX: keyword suffix (defaults to "")
 *   - PACK_MAX_RECORDS: positive integer cap on processed records (optional)
 *   - PACK_ICON_PATH: PNG bundled as icon.png (optional)
 */

import type { PackConfig } from "@/types";
import {
  DATASET_PATH_ENV,
  DEFAULT_KEYWORD_PREFIX,
  DEFAULT_KEYWORD_SUFFIX,
  DEFAULT_OUTPUT_PATH,
  ICON_PATH_ENV,
  KEYWORD_PREFIX_ENV,
  KEYWORD_SUFFIX_ENV,
  MAX_RECORDS_ENV,
  OUTPUT_PATH_ENV,
} from "@/constants";
import { PackConfigError } from "@/errors";

type Env = Record<string, string | undefined>;

/**
 * Parse the optional record cap.
 *
 * @throws {PackConfigError} If the value is not a positive integer
 */
function parseMaxRecords(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === "") return undefined;

  const value = Number(raw.trim());
  if (!Number.isInteger(value) || value <= 0) {
    throw new PackConfigError(
      `${MAX_RECORDS_ENV} must be a positive integer, got "${raw}"`,
    );
  }
  return value;
}

/**
 * Read a path-like variable, treating empty values as absent
 */
function optionalPath(raw: string | undefined): string | undefined {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Load pack configuration.
 *
 * Prefix and suffix are taken verbatim (no trimming): whitespace is a legal
 * keyword delimiter.
 *
 * @param env - Environment to read (defaults to process.env)
 * @throws {PackConfigError} If the dataset path is missing or a value is invalid
 */
export function loadPackConfig(env: Env = process.env): PackConfig {
  const datasetPath = optionalPath(env[DATASET_PATH_ENV]);
  if (!datasetPath) {
    throw new PackConfigError(`${DATASET_PATH_ENV} is required`);
  }

  const iconPath = optionalPath(env[ICON_PATH_ENV]);
  const maxRecords = parseMaxRecords(env[MAX_RECORDS_ENV]);

  return {
    datasetPath,
    outputPath: optionalPath(env[OUTPUT_PATH_ENV]) ?? DEFAULT_OUTPUT_PATH,
    keywordPrefix: env[KEYWORD_PREFIX_ENV] ?? DEFAULT_KEYWORD_PREFIX,
    keywordSuffix: env[KEYWORD_SUFFIX_ENV] ?? DEFAULT_KEYWORD_SUFFIX,
    ...(maxRecords !== undefined ? { maxRecords } : {}),
    ...(iconPath !== undefined ? { iconPath } : {}),
  };
}
