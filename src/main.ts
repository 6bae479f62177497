/**
 * Entrypoint, builds the emoji snippet pack from a local dataset
 *
 * Usage:
 *   EMOJI_DATASET_PATH=data/emoji.json npm start
 *   EMOJI_DATASET_PATH=data/emoji.json PACK_MAX_RECORDS=100 npm start
 *
 * Configuration is read from the environment (and .env), see src/config.
 *
 * Exit codes:
 *   0 - pack written (records may have been skipped with warnings)
 *   1 - unexpected error (including archive I/O failures)
 *   2 - invalid configuration
 *   3 - unreadable dataset
 *   4 - duplicate archive filename
 */

import "dotenv/config";
import { EXIT_CODES } from "@/constants";
import { exitCodeFor } from "@/errors";
import { loadPackConfig } from "@/config";
import { loadEmojiDataset } from "@/dataset";
import { buildSnippetPack } from "@/compiler";
import * as logger from "@/logger";

async function main(): Promise<void> {
  const config = loadPackConfig();
  logger.info("Building emoji snippet pack", {
    datasetPath: config.datasetPath,
    outputPath: config.outputPath,
    keywordPrefix: config.keywordPrefix,
    keywordSuffix: config.keywordSuffix,
    maxRecords: config.maxRecords,
  });

  const dataset = loadEmojiDataset(config.datasetPath);
  const result = await buildSnippetPack(dataset.records, config);

  const skipped = dataset.warnings.length + result.recordsSkipped;
  if (skipped > 0) {
    logger.warn("Some emoji records were skipped", {
      datasetSkipped: dataset.warnings.length,
      compileSkipped: result.recordsSkipped,
    });
  }

  logger.info("Import the pack via Alfred Preferences > Features > Snippets", {
    outputPath: result.outputPath,
    snippets: result.snippetsGenerated,
  });
}

main().then(
  () => process.exit(EXIT_CODES.ok),
  (error: unknown) => {
    logger.error("Snippet pack build failed", {
      error: error instanceof Error ? error.message : String(error),
      kind: error instanceof Error ? error.name : typeof error,
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exit(exitCodeFor(error));
  },
);
