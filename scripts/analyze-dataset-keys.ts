#!/usr/bin/env tsx
/**
 * Report which keys every dataset entry carries and which are optional
 *
 * Usage:
 *   npm run analyze:keys -- data/emoji.json
 *   EMOJI_DATASET_PATH=data/emoji.json npm run analyze:keys
 */

import "dotenv/config";
import * as fs from "fs";
import { DATASET_PATH_ENV } from "@/constants";
import { analyzeDatasetKeys } from "@/dataset";
import type { DatasetKeyStats } from "@/types";

function formatRow(stats: DatasetKeyStats): string {
  return `  ${stats.key.padEnd(24)} ${String(stats.count).padStart(6)}  ${stats.percentage.toFixed(2).padStart(6)}%  ${stats.types.join(", ")}`;
}

const datasetPath = process.argv[2] ?? process.env[DATASET_PATH_ENV];
if (!datasetPath) {
  console.error(`Usage: analyze-dataset-keys <emoji.json> (or set ${DATASET_PATH_ENV})`);
  process.exit(2);
}

const raw: unknown = JSON.parse(fs.readFileSync(datasetPath, "utf-8"));
const report = analyzeDatasetKeys(raw);

console.log(`Analyzed ${report.totalEntries} entries from ${datasetPath}\n`);
console.log(`Always present (${report.alwaysPresent.length}):`);
report.alwaysPresent.forEach((stats) => console.log(formatRow(stats)));
console.log(`\nSometimes present (${report.sometimesPresent.length}):`);
report.sometimesPresent.forEach((stats) => console.log(formatRow(stats)));
