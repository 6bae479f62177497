/**
 * Snippet file naming and serialization
 */

import type { SnippetFileContent, SnippetRecord } from "@/types";
import { SNIPPET_FILE_EXTENSION } from "@/constants";
import { stripReservedFilenameChars } from "@/utils/text/textNormalization";

/**
 * Archive filename of a snippet: <keyword>-<sanitizedName>.json
 *
 * @example
 * snippetFilename(grinning) // "grinning-GRINNING_FACE.json"
 */
export function snippetFilename(snippet: SnippetRecord): string {
  return `${stripReservedFilenameChars(snippet.keyword)}-${snippet.sanitizedName}${SNIPPET_FILE_EXTENSION}`;
}

/**
 * Map a snippet to the importer's field names
 */
export function toSnippetFileContent(
  snippet: SnippetRecord,
): SnippetFileContent {
  return {
    alfredsnippet: {
      snippet: snippet.character,
      uid: snippet.uid,
      name: snippet.displayName,
      keyword: snippet.keyword,
      dontautoexpand: snippet.autoExpandDisabled,
    },
  };
}

/**
 * Serialize a snippet file: 2-space indented JSON, raw UTF-8, trailing newline
 */
export function serializeSnippet(snippet: SnippetRecord): string {
  return JSON.stringify(toSnippetFileContent(snippet), null, 2) + "\n";
}
