/**
 * Snippet pack archive rendering
 *
 * Builds the .alfredsnippets zip entirely in memory. Entry order, entry
 * timestamps and compression settings are fixed, so the same pack always
 * renders to the same bytes.
 */

import JSZip from "jszip";
import type { CompiledPack, RenderArchiveOptions } from "@/types";
import {
  ARCHIVE_COMPRESSION_LEVEL,
  ARCHIVE_ENTRY_DATE,
  ICON_FILENAME,
  MANIFEST_FILENAME,
} from "@/constants";
import { renderManifest } from "./manifest";
import { serializeSnippet } from "./snippetFile";

/**
 * Render a compiled pack to zip bytes.
 *
 * Layout: one JSON file per entry (pack order), info.plist, then icon.png
 * when an icon is given.
 */
export async function renderPackArchive(
  pack: CompiledPack,
  options: RenderArchiveOptions = {},
): Promise<Buffer> {
  const zip = new JSZip();
  const entryOptions = { date: ARCHIVE_ENTRY_DATE, createFolders: false };

  for (const entry of pack.entries) {
    zip.file(entry.filename, serializeSnippet(entry.snippet), entryOptions);
  }
  zip.file(MANIFEST_FILENAME, renderManifest(pack.manifest), entryOptions);

  if (options.icon) {
    zip.file(ICON_FILENAME, options.icon, { ...entryOptions, binary: true });
  }

  return zip.generateAsync({
    type: "nodebuffer",
    compression: "DEFLATE",
    compressionOptions: { level: ARCHIVE_COMPRESSION_LEVEL },
    platform: "DOS",
  });
}
