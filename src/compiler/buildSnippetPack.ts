/**
 * Snippet pack build: compile, render and write the archive
 */

import * as fs from "fs";
import type { BuildPackResult, EmojiRecord, PackConfig } from "@/types";
import { renderPackArchive, writeArchiveAtomic } from "@/pack";
import { compilePack } from "./compilePack";
import * as logger from "@/logger";

/**
 * Build the pack for the given records and write it to config.outputPath.
 *
 * Everything is serialized in memory before the archive is written, so a
 * failure at any step leaves no archive on disk.
 *
 * @param records - Validated emoji records in dataset order
 * @param config - Keyword settings, record cap, output and icon paths
 * @returns Run summary with the absolute archive path and size
 * @throws {DuplicateFilenameError} If two snippets map to the same filename
 * @throws {Error} If the icon cannot be read or the archive cannot be written
 */
export async function buildSnippetPack(
  records: readonly EmojiRecord[],
  config: Omit<PackConfig, "datasetPath">,
): Promise<BuildPackResult> {
  const log = logger.withContext({ outputPath: config.outputPath });

  const { pack, summary } = compilePack(records, {
    keywordPrefix: config.keywordPrefix,
    keywordSuffix: config.keywordSuffix,
    maxRecords: config.maxRecords,
  });
  log.debug("Pack compiled", {
    entries: pack.entries.length,
    warnings: summary.warnings.length,
  });

  const icon = config.iconPath
    ? await fs.promises.readFile(config.iconPath)
    : undefined;

  const archive = await renderPackArchive(pack, { icon });
  const outputPath = await writeArchiveAtomic(archive, config.outputPath);

  log.info("Snippet pack written", {
    recordsTotal: summary.recordsTotal,
    recordsCompiled: summary.recordsCompiled,
    recordsSkipped: summary.recordsSkipped,
    snippetsGenerated: summary.snippetsGenerated,
    archiveBytes: archive.length,
  });

  return { ...summary, outputPath, archiveBytes: archive.length };
}
