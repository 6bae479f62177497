/**
 * Unit tests for the entry point's exit status mapping
 */

import { describe, it, expect } from "vitest";
import {
  DatasetFormatError,
  DuplicateFilenameError,
  InvalidCodepointError,
  PackConfigError,
  exitCodeFor,
} from "@/errors";
import { buildSnippet } from "@/snippets";

describe("exitCodeFor", () => {
  it("should map each fatal error kind to its own status", () => {
    const snippet = buildSnippet("\u{1F600}", "grinning", "GRINNING FACE", []);

    expect(exitCodeFor(new PackConfigError("missing"))).toBe(2);
    expect(exitCodeFor(new DatasetFormatError("not json"))).toBe(3);
    expect(
      exitCodeFor(
        new DuplicateFilenameError("grinning-GRINNING_FACE.json", snippet, snippet),
      ),
    ).toBe(4);
  });

  it("should map anything else to 1", () => {
    expect(exitCodeFor(new Error("EACCES: permission denied"))).toBe(1);
    expect(exitCodeFor(new InvalidCodepointError("ZZZ", "ZZZ"))).toBe(1);
    expect(exitCodeFor("thrown string")).toBe(1);
  });
});
