/**
 * Dataset key presence analysis
 *
 * Reports which keys every entry carries and which are optional, with the
 * value types observed for each. Used to decide which fields the compiler
 * can rely on.
 */

import type { DatasetKeyReport, DatasetKeyStats } from "@/types";
import { DatasetFormatError } from "@/errors";
import { isRawEmojiEntry } from "./emojiValidation";

/**
 * Type label of a single value
 *
 * Lists are labelled by their first item: "list[string]", "list[empty]".
 */
export function describeValueType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) {
    return value.length === 0
      ? "list[empty]"
      : `list[${describeValueType(value[0])}]`;
  }
  return typeof value;
}

/**
 * Analyze key presence across all object entries of a dataset.
 *
 * Percentages are rounded to two decimals. Keys are sorted alphabetically.
 *
 * @throws {DatasetFormatError} If raw is not an array
 */
export function analyzeDatasetKeys(raw: unknown): DatasetKeyReport {
  if (!Array.isArray(raw)) {
    throw new DatasetFormatError("expected an array of emoji entries");
  }

  const counts = new Map<string, number>();
  const types = new Map<string, Set<string>>();
  let totalEntries = 0;

  for (const entry of raw) {
    if (!isRawEmojiEntry(entry)) continue;
    totalEntries++;

    for (const [key, value] of Object.entries(entry)) {
      counts.set(key, (counts.get(key) ?? 0) + 1);
      const seen = types.get(key) ?? new Set<string>();
      seen.add(describeValueType(value));
      types.set(key, seen);
    }
  }

  const alwaysPresent: DatasetKeyStats[] = [];
  const sometimesPresent: DatasetKeyStats[] = [];

  for (const key of Array.from(counts.keys()).sort()) {
    const count = counts.get(key) ?? 0;
    const stats: DatasetKeyStats = {
      key,
      count,
      percentage: Math.round((count / totalEntries) * 10000) / 100,
      types: Array.from(types.get(key) ?? []).sort(),
    };

    if (count === totalEntries) {
      alwaysPresent.push(stats);
    } else {
      sometimesPresent.push(stats);
    }
  }

  return { totalEntries, alwaysPresent, sometimesPresent };
}
