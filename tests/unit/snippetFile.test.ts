/**
 * Unit tests for snippet file naming, serialization and entry planning
 *
 * No filesystem, no network, no side effects
 */

import { describe, it, expect } from "vitest";
import {
  planPackEntries,
  serializeSnippet,
  snippetFilename,
  toSnippetFileContent,
} from "@/pack";
import { buildSnippet } from "@/snippets";
import { DuplicateFilenameError } from "@/errors";

const GRINNING = "\u{1F600}";

const grinning = buildSnippet(GRINNING, "grinning", "GRINNING FACE", [
  "smiling",
]);

describe("snippetFilename", () => {
  it("should join keyword and sanitized name", () => {
    expect(snippetFilename(grinning)).toBe("grinning-GRINNING_FACE.json");
  });

  it("should strip reserved characters from the keyword part", () => {
    const snippet = buildSnippet(GRINNING, "a/b:c", "GRINNING FACE", []);

    expect(snippetFilename(snippet)).toBe("abc-GRINNING_FACE.json");
  });
});

describe("toSnippetFileContent", () => {
  it("should map fields to the importer's names", () => {
    expect(toSnippetFileContent(grinning)).toEqual({
      alfredsnippet: {
        snippet: GRINNING,
        uid: "emojipack-grinning-GRINNING_FACE",
        name: `${GRINNING} Grinning Face, smiling`,
        keyword: "grinning",
        dontautoexpand: false,
      },
    });
  });
});

describe("serializeSnippet", () => {
  it("should write indented JSON with raw UTF-8 and a trailing newline", () => {
    expect(serializeSnippet(grinning)).toBe(
      [
        "{",
        '  "alfredsnippet": {',
        `    "snippet": "${GRINNING}",`,
        '    "uid": "emojipack-grinning-GRINNING_FACE",',
        `    "name": "${GRINNING} Grinning Face, smiling",`,
        '    "keyword": "grinning",',
        '    "dontautoexpand": false',
        "  }",
        "}",
        "",
      ].join("\n"),
    );
  });
});

describe("planPackEntries", () => {
  it("should assign filenames in snippet order", () => {
    const grinningFace = buildSnippet(
      GRINNING,
      "grinning_face",
      "GRINNING FACE",
      ["smiling"],
    );

    expect(
      planPackEntries([grinning, grinningFace]).map((e) => e.filename),
    ).toEqual(["grinning-GRINNING_FACE.json", "grinning_face-GRINNING_FACE.json"]);
  });

  it("should reject two snippets with the same filename, naming both", () => {
    const duplicate = buildSnippet("\u{1F601}", "grinning", "GRINNING FACE", []);

    let caught: unknown;
    try {
      planPackEntries([grinning, duplicate]);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(DuplicateFilenameError);
    if (!(caught instanceof DuplicateFilenameError)) return;
    expect(caught.filename).toBe("grinning-GRINNING_FACE.json");
    expect(caught.first).toBe(grinning);
    expect(caught.second).toBe(duplicate);
  });

  it("should detect collisions created by filename sanitizing", () => {
    const plain = buildSnippet(GRINNING, "ab", "GRINNING FACE", []);
    const slashed = buildSnippet(GRINNING, "a/b", "GRINNING FACE", []);

    expect(() => planPackEntries([plain, slashed])).toThrow(
      DuplicateFilenameError,
    );
  });
});
