/**
 * Compiler type definitions
 */

import type { CompiledPack, SnippetRecord } from "./snippet";

/**
 * Why a record was skipped
 *
 * - invalid_codepoint: codepoint sequence empty or malformed
 * - malformed_record: a required field is missing or empty
 */
export type CompileWarningReason = "invalid_codepoint" | "malformed_record";

/**
 * A skipped record, reported alongside the compiled pack
 */
export type CompileWarning = {
  reason: CompileWarningReason;
  /** Position of the record in the input list */
  index: number;
  /** Emoji name, when the record carried one */
  name?: string;
  message: string;
};

/**
 * Options for the pure compilation step
 */
export type CompileOptions = {
  keywordPrefix: string;
  keywordSuffix: string;
  /** Cap on the number of input records processed */
  maxRecords?: number;
};

/**
 * Output of snippet assembly over a batch of records
 */
export type CompileSnippetsResult = {
  snippets: SnippetRecord[];
  recordsTotal: number;
  recordsCompiled: number;
  warnings: CompileWarning[];
};

/**
 * Run counters and warnings
 */
export type CompileSummary = {
  /** Records considered (after maxRecords is applied) */
  recordsTotal: number;
  recordsCompiled: number;
  recordsSkipped: number;
  snippetsGenerated: number;
  warnings: CompileWarning[];
};

export type CompileResult = {
  pack: CompiledPack;
  summary: CompileSummary;
};

/**
 * Result of a full build (compile, render, write)
 */
export type BuildPackResult = CompileSummary & {
  outputPath: string;
  archiveBytes: number;
};
