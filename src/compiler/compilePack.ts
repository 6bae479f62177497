/**
 * Pure pipeline from emoji records to a compiled pack
 */

import type { CompileOptions, CompileResult, EmojiRecord } from "@/types";
import { compileSnippets } from "@/snippets";
import { planPackEntries } from "@/pack";

/**
 * Compile emoji records into a pack.
 *
 * Steps:
 * 1. Assemble snippets (per-record failures become warnings)
 * 2. Plan archive entries (filename collisions are fatal)
 * 3. Attach the manifest
 *
 * Holds no state between calls: the same records and options always yield
 * the same pack.
 *
 * @throws {DuplicateFilenameError} If two snippets map to the same filename
 */
export function compilePack(
  records: readonly EmojiRecord[],
  options: CompileOptions,
): CompileResult {
  const assembled = compileSnippets(records, {
    maxRecords: options.maxRecords,
  });
  const entries = planPackEntries(assembled.snippets);

  return {
    pack: {
      entries,
      manifest: {
        keywordPrefix: options.keywordPrefix,
        keywordSuffix: options.keywordSuffix,
      },
    },
    summary: {
      recordsTotal: assembled.recordsTotal,
      recordsCompiled: assembled.recordsCompiled,
      recordsSkipped: assembled.recordsTotal - assembled.recordsCompiled,
      snippetsGenerated: entries.length,
      warnings: assembled.warnings,
    },
  };
}
