/**
 * Unit tests for environment configuration
 *
 * Reads an explicit env object, never process.env
 */

import { describe, it, expect } from "vitest";
import { loadPackConfig } from "@/config";
import { PackConfigError } from "@/errors";

describe("loadPackConfig", () => {
  it("should apply defaults when only the dataset path is set", () => {
    expect(loadPackConfig({ EMOJI_DATASET_PATH: "data/emoji.json" })).toEqual({
      datasetPath: "data/emoji.json",
      outputPath: "emoji-snippets.alfredsnippets",
      keywordPrefix: ";",
      keywordSuffix: "",
    });
  });

  it("should read every variable", () => {
    expect(
      loadPackConfig({
        EMOJI_DATASET_PATH: "data/emoji.json",
        PACK_OUTPUT_PATH: "dist/slack.alfredsnippets",
        PACK_KEYWORD_PREFIX: ":",
        PACK_KEYWORD_SUFFIX: ":",
        PACK_MAX_RECORDS: "100",
        PACK_ICON_PATH: "assets/icon.png",
      }),
    ).toEqual({
      datasetPath: "data/emoji.json",
      outputPath: "dist/slack.alfredsnippets",
      keywordPrefix: ":",
      keywordSuffix: ":",
      maxRecords: 100,
      iconPath: "assets/icon.png",
    });
  });

  it("should keep an empty prefix instead of falling back to the default", () => {
    const config = loadPackConfig({
      EMOJI_DATASET_PATH: "data/emoji.json",
      PACK_KEYWORD_PREFIX: "",
    });

    expect(config.keywordPrefix).toBe("");
  });

  it("should not trim prefix or suffix", () => {
    const config = loadPackConfig({
      EMOJI_DATASET_PATH: "data/emoji.json",
      PACK_KEYWORD_SUFFIX: " ",
    });

    expect(config.keywordSuffix).toBe(" ");
  });

  it("should treat blank optional paths as absent", () => {
    const config = loadPackConfig({
      EMOJI_DATASET_PATH: "data/emoji.json",
      PACK_ICON_PATH: "  ",
      PACK_OUTPUT_PATH: "",
      PACK_MAX_RECORDS: "",
    });

    expect(config.iconPath).toBeUndefined();
    expect(config.maxRecords).toBeUndefined();
    expect(config.outputPath).toBe("emoji-snippets.alfredsnippets");
  });

  it("should require the dataset path", () => {
    expect(() => loadPackConfig({})).toThrow(
      "Configuration invalid: EMOJI_DATASET_PATH is required",
    );
  });

  it("should reject a record cap that is not a positive integer", () => {
    for (const value of ["0", "-3", "1.5", "abc"]) {
      expect(() =>
        loadPackConfig({
          EMOJI_DATASET_PATH: "data/emoji.json",
          PACK_MAX_RECORDS: value,
        }),
      ).toThrow(PackConfigError);
    }
  });
});
