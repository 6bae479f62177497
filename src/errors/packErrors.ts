/**
 * Compiler error classes
 *
 * Per-record errors (InvalidCodepointError, MalformedRecordError) are turned
 * into warnings by the compiler; the others abort the run.
 */

import type { SnippetRecord } from "@/types";

/**
 * Codepoint sequence is empty or contains a token that is not a Unicode scalar value
 */
export class InvalidCodepointError extends Error {
  /** Offending token ("" for empty input or an empty token) */
  public readonly token: string;
  /** The whole codepoint sequence */
  public readonly input: string;

  constructor(token: string, input: string) {
    super(
      input.length === 0
        ? "Invalid codepoint: empty codepoint sequence"
        : `Invalid codepoint "${token}" in sequence "${input}"`,
    );
    this.name = "InvalidCodepointError";
    this.token = token;
    this.input = input;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InvalidCodepointError);
    }
  }
}

/**
 * Emoji record is missing a required field
 */
export class MalformedRecordError extends Error {
  public readonly field: string;
  public readonly index?: number;

  constructor(field: string, detail: string, index?: number) {
    super(
      `Malformed record${index === undefined ? "" : ` at index ${index}`}: ${field} ${detail}`,
    );
    this.name = "MalformedRecordError";
    this.field = field;
    this.index = index;
  }
}

/**
 * Two snippets map to the same archive filename
 */
export class DuplicateFilenameError extends Error {
  public readonly filename: string;
  public readonly first: SnippetRecord;
  public readonly second: SnippetRecord;

  constructor(filename: string, first: SnippetRecord, second: SnippetRecord) {
    super(
      `Duplicate filename "${filename}": uid "${first.uid}" (${first.displayName}) ` +
        `collides with uid "${second.uid}" (${second.displayName})`,
    );
    this.name = "DuplicateFilenameError";
    this.filename = filename;
    this.first = first;
    this.second = second;
  }
}

/**
 * Dataset file is unreadable as JSON or is not a list of entries
 */
export class DatasetFormatError extends Error {
  constructor(message: string) {
    super(`Dataset format invalid: ${message}`);
    this.name = "DatasetFormatError";
  }
}

/**
 * Environment configuration is missing or invalid
 */
export class PackConfigError extends Error {
  constructor(message: string) {
    super(`Configuration invalid: ${message}`);
    this.name = "PackConfigError";
  }
}

/**
 * Manifest document cannot be read back
 */
export class ManifestFormatError extends Error {
  constructor(message: string) {
    super(`Manifest format invalid: ${message}`);
    this.name = "ManifestFormatError";
  }
}
