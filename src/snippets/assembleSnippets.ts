/**
 * Snippet assembly
 *
 * Fans each emoji record out into one snippet per shortcode. Identifiers
 * are derived from the shortcode and the emoji name, never random, so a
 * rebuilt pack re-imports over the previous one instead of duplicating it.
 */

import type {
  CompileSnippetsResult,
  CompileWarning,
  EmojiRecord,
  SnippetRecord,
} from "@/types";
import {
  DISPLAY_NAME_SEPARATOR,
  SNIPPET_AUTO_EXPAND_DISABLED,
  SNIPPET_UID_NAMESPACE,
} from "@/constants";
import { InvalidCodepointError, MalformedRecordError } from "@/errors";
import { deriveKeywords } from "@/keywords";
import { decodeCodepoints } from "@/utils/text/codepoints";
import { sanitizeName, titleCase } from "@/utils/text/textNormalization";
import * as logger from "@/logger";

/**
 * Deterministic snippet uid: emojipack-<shortcode>-<sanitizedName>
 */
export function snippetUid(shortcode: string, sanitizedName: string): string {
  return `${SNIPPET_UID_NAMESPACE}-${shortcode}-${sanitizedName}`;
}

/**
 * Display name: glyph and title-cased name, then the derived keywords.
 *
 * @example
 * composeDisplayName("😀", "GRINNING FACE", ["smiling"]) // "😀 Grinning Face, smiling"
 */
export function composeDisplayName(
  character: string,
  name: string,
  keywords: readonly string[],
): string {
  return [`${character} ${titleCase(name)}`, ...keywords].join(
    DISPLAY_NAME_SEPARATOR,
  );
}

/**
 * Build the snippet for one shortcode of an emoji.
 */
export function buildSnippet(
  character: string,
  shortcode: string,
  name: string,
  keywords: readonly string[],
): SnippetRecord {
  const sanitizedName = sanitizeName(name);

  return {
    character,
    keyword: shortcode,
    displayName: composeDisplayName(character, name, keywords),
    uid: snippetUid(shortcode, sanitizedName),
    autoExpandDisabled: SNIPPET_AUTO_EXPAND_DISABLED,
    sanitizedName,
  };
}

/**
 * Check the fields assembly depends on.
 *
 * @throws {MalformedRecordError} If name, subcategory or shortcodes are empty
 */
function assertCompilable(record: EmojiRecord, index?: number): void {
  if (record.name.trim().length === 0) {
    throw new MalformedRecordError("name", "cannot be empty", index);
  }
  if (record.subcategory.trim().length === 0) {
    throw new MalformedRecordError("subcategory", "cannot be empty", index);
  }
  if (record.shortcodes.length === 0) {
    throw new MalformedRecordError("shortcodes", "cannot be empty", index);
  }
  record.shortcodes.forEach((shortcode, i) => {
    if (shortcode.trim().length === 0) {
      throw new MalformedRecordError(`shortcodes[${i}]`, "cannot be empty", index);
    }
  });
}

/**
 * Assemble all snippets of one emoji record, in shortcode order.
 *
 * @param record - Emoji record
 * @param index - Position of the record in its batch, used in error messages
 * @throws {MalformedRecordError} If a required field is empty
 * @throws {InvalidCodepointError} If the codepoint sequence cannot be decoded
 */
export function assembleSnippets(
  record: EmojiRecord,
  index?: number,
): SnippetRecord[] {
  assertCompilable(record, index);

  const character = decodeCodepoints(record.codepoints);
  const keywords = deriveKeywords(record.name, record.subcategory);

  return record.shortcodes.map((shortcode) =>
    buildSnippet(character, shortcode, record.name, keywords),
  );
}

/**
 * Map a per-record error to a warning, or null when the error is not per-record
 */
function toWarning(
  err: unknown,
  record: EmojiRecord,
  index: number,
): CompileWarning | null {
  if (err instanceof InvalidCodepointError) {
    return {
      reason: "invalid_codepoint",
      index,
      name: record.name,
      message: err.message,
    };
  }
  if (err instanceof MalformedRecordError) {
    return {
      reason: "malformed_record",
      index,
      ...(record.name ? { name: record.name } : {}),
      message: err.message,
    };
  }
  return null;
}

/**
 * Assemble snippets for a batch of records.
 *
 * Records are processed in input order, capped at maxRecords. A record that
 * fails with InvalidCodepointError or MalformedRecordError is skipped and
 * reported as a warning; the batch continues. Any other error propagates.
 *
 * @param records - Emoji records in dataset order
 * @param options - Optional cap on the number of records processed
 * @returns Snippets in (record, shortcode) order, counters and warnings
 */
export function compileSnippets(
  records: readonly EmojiRecord[],
  options: { maxRecords?: number } = {},
): CompileSnippetsResult {
  const selected =
    options.maxRecords === undefined
      ? records
      : records.slice(0, options.maxRecords);

  const snippets: SnippetRecord[] = [];
  const warnings: CompileWarning[] = [];
  let recordsCompiled = 0;

  selected.forEach((record, index) => {
    try {
      snippets.push(...assembleSnippets(record, index));
      recordsCompiled++;
    } catch (err) {
      const warning = toWarning(err, record, index);
      if (!warning) throw err;

      warnings.push(warning);
      logger.warn("Skipping emoji record", {
        index,
        reason: warning.reason,
        name: warning.name,
        message: warning.message,
      });
    }
  });

  return {
    snippets,
    recordsTotal: selected.length,
    recordsCompiled,
    warnings,
  };
}
