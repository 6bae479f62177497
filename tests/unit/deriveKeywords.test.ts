/**
 * Unit tests for taxonomy keyword derivation
 *
 * No filesystem, no network, no side effects
 */

import { describe, it, expect } from "vitest";
import { deriveKeywords } from "@/keywords";

describe("deriveKeywords", () => {
  describe("name overlap removal", () => {
    it("should drop subcategory words that occur in the name", () => {
      expect(deriveKeywords("GRINNING FACE", "face-smiling")).toEqual([
        "smiling",
      ]);
    });

    it("should match name words after stripping colons", () => {
      expect(deriveKeywords("KEYCAP: *", "keycap")).toEqual([]);
    });

    it("should compare subcategory words case-insensitively", () => {
      expect(deriveKeywords("GRINNING FACE", "Face-smiling")).toEqual([
        "smiling",
      ]);
    });
  });

  describe("no overlap", () => {
    it("should keep every subcategory word in original order", () => {
      expect(deriveKeywords("THUMBS UP SIGN", "hand-fingers-closed")).toEqual([
        "hand",
        "fingers",
        "closed",
      ]);
    });
  });

  describe("generic word filtering", () => {
    it("should drop object, other and symbol", () => {
      expect(
        deriveKeywords("SAMPLE ITEM", "test-object-other-symbol-valid"),
      ).toEqual(["test", "valid"]);
    });

    it("should return an empty list when only generic words remain", () => {
      expect(deriveKeywords("WARNING SIGN", "other-symbol")).toEqual([]);
    });
  });

  describe("ordering and duplicates", () => {
    it("should emit repeated subcategory words once, at first position", () => {
      expect(deriveKeywords("WAVING", "hand-wave-hand")).toEqual([
        "hand",
        "wave",
      ]);
    });

    it("should treat case variants of a word as repeats", () => {
      expect(deriveKeywords("X", "Hand-hand")).toEqual(["Hand"]);
      expect(deriveKeywords("X", "wave-HAND-Wave-hand")).toEqual([
        "wave",
        "HAND",
      ]);
    });

    it("should skip empty tokens from doubled separators", () => {
      expect(deriveKeywords("WAVING", "hand--wave")).toEqual(["hand", "wave"]);
    });

    it("should return identical output for identical input", () => {
      const first = deriveKeywords("MAN TECHNOLOGIST", "person-role");
      const second = deriveKeywords("MAN TECHNOLOGIST", "person-role");

      expect(first).toEqual(["person", "role"]);
      expect(second).toEqual(first);
    });
  });
});
