/**
 * Emoji dataset loading
 *
 * Reads the dataset JSON, validates every entry, and returns the records
 * the compiler accepts. Invalid entries are skipped with a warning; a file
 * that is not a JSON array is fatal.
 */

import * as fs from "fs";
import * as path from "path";
import type { CompileWarning, ParsedEmojiDataset } from "@/types";
import { DatasetFormatError, MalformedRecordError } from "@/errors";
import { isRawEmojiEntry, validateEmojiEntry } from "./emojiValidation";
import * as logger from "@/logger";

/**
 * Name of an entry, when it carries a usable one (for warnings)
 */
function entryName(entry: unknown): string | undefined {
  if (!isRawEmojiEntry(entry)) return undefined;
  const { name } = entry;
  return typeof name === "string" && name.length > 0 ? name : undefined;
}

/**
 * Validate a parsed dataset.
 *
 * @param raw - Parsed JSON value
 * @returns Valid records in dataset order, plus one warning per skipped entry
 * @throws {DatasetFormatError} If raw is not an array
 */
export function parseEmojiDataset(raw: unknown): ParsedEmojiDataset {
  if (!Array.isArray(raw)) {
    throw new DatasetFormatError(
      `expected an array of emoji entries, got ${raw === null ? "null" : typeof raw}`,
    );
  }

  const records: ParsedEmojiDataset["records"] = [];
  const warnings: CompileWarning[] = [];

  raw.forEach((entry: unknown, index: number) => {
    try {
      records.push(validateEmojiEntry(entry, index));
    } catch (err) {
      if (!(err instanceof MalformedRecordError)) throw err;

      const name = entryName(entry);
      warnings.push({
        reason: "malformed_record",
        index,
        ...(name !== undefined ? { name } : {}),
        message: err.message,
      });
      logger.warn("Skipping malformed dataset entry", {
        index,
        name,
        field: err.field,
      });
    }
  });

  return { records, warnings };
}

/**
 * Load and validate the dataset at the given path.
 *
 * @param datasetPath - JSON file, resolved against the working directory
 * @throws {Error} If the file cannot be read
 * @throws {DatasetFormatError} If the content is not a JSON array
 */
export function loadEmojiDataset(datasetPath: string): ParsedEmojiDataset {
  const resolved = path.resolve(process.cwd(), datasetPath);
  const jsonContent = fs.readFileSync(resolved, "utf-8");

  let raw: unknown;
  try {
    raw = JSON.parse(jsonContent);
  } catch (err) {
    throw new DatasetFormatError(
      `${resolved} is not valid JSON (${err instanceof Error ? err.message : String(err)})`,
    );
  }

  const parsed = parseEmojiDataset(raw);
  logger.info("Dataset loaded", {
    path: resolved,
    entries: parsed.records.length + parsed.warnings.length,
    valid: parsed.records.length,
    skipped: parsed.warnings.length,
  });
  return parsed;
}
