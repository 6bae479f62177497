/**
 * Archive entry planning
 */

import type { PackEntry, SnippetRecord } from "@/types";
import { DuplicateFilenameError } from "@/errors";
import { snippetFilename } from "./snippetFile";

/**
 * Assign each snippet its archive filename, preserving order.
 *
 * Two snippets with the same filename would overwrite each other in the
 * archive and silently drop a keyword, so a collision is fatal. It means two
 * emoji share a shortcode and name, which a well-formed dataset never has.
 *
 * @throws {DuplicateFilenameError} With both colliding snippets
 */
export function planPackEntries(
  snippets: readonly SnippetRecord[],
): PackEntry[] {
  const byFilename = new Map<string, SnippetRecord>();
  const entries: PackEntry[] = [];

  for (const snippet of snippets) {
    const filename = snippetFilename(snippet);
    const existing = byFilename.get(filename);
    if (existing) {
      throw new DuplicateFilenameError(filename, existing, snippet);
    }
    byFilename.set(filename, snippet);
    entries.push({ filename, snippet });
  }

  return entries;
}
