/**
 * Unit tests for the info.plist manifest
 *
 * No filesystem, no network, no side effects
 */

import { describe, it, expect } from "vitest";
import {
  escapeXml,
  parseManifest,
  parsePlistStrings,
  renderManifest,
  unescapeXml,
} from "@/pack";
import { ManifestFormatError } from "@/errors";

describe("renderManifest", () => {
  it("should render prefix and suffix as plist string values", () => {
    expect(renderManifest({ keywordPrefix: ";", keywordSuffix: "" })).toBe(
      [
        '<?xml version="1.0" encoding="UTF-8"?>',
        '<!DOCTYPE plist PUBLIC "-//Apple//DTD PLIST 1.0//EN" "http://www.apple.com/DTDs/PropertyList-1.0.dtd">',
        '<plist version="1.0">',
        "<dict>",
        "\t<key>snippetkeywordprefix</key>",
        "\t<string>;</string>",
        "\t<key>snippetkeywordsuffix</key>",
        "\t<string></string>",
        "</dict>",
        "</plist>",
        "",
      ].join("\n"),
    );
  });

  it("should escape markup-significant characters", () => {
    const xml = renderManifest({ keywordPrefix: "<&", keywordSuffix: ">&" });

    expect(xml).toContain("\t<string>&lt;&amp;</string>\n");
    expect(xml).toContain("\t<string>&gt;&amp;</string>\n");
  });
});

describe("escapeXml / unescapeXml", () => {
  it("should escape the five XML special characters", () => {
    expect(escapeXml(`<a href="x">&'`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;&amp;&apos;",
    );
  });

  it("should resolve named and numeric entities in one pass", () => {
    expect(unescapeXml("&amp;lt;")).toBe("&lt;");
    expect(unescapeXml("&#65;&#x1F600;")).toBe("A\u{1F600}");
  });

  it("should reject unknown named entities", () => {
    expect(() => unescapeXml("&nbsp;")).toThrow(ManifestFormatError);
  });

  it("should reject character references above U+10FFFF", () => {
    expect(() => unescapeXml("&#x110000;")).toThrow(ManifestFormatError);
    expect(() => unescapeXml("&#1114112;")).toThrow(
      "Manifest format invalid: character reference out of range &#1114112;",
    );
  });
});

describe("parseManifest", () => {
  const roundTrip = (keywordPrefix: string, keywordSuffix: string) =>
    parseManifest(renderManifest({ keywordPrefix, keywordSuffix }));

  it("should round-trip default settings", () => {
    expect(roundTrip(";", "")).toEqual({ keywordPrefix: ";", keywordSuffix: "" });
  });

  it("should round-trip custom settings", () => {
    expect(roundTrip(",", ".")).toEqual({ keywordPrefix: ",", keywordSuffix: "." });
  });

  it("should round-trip values with markup characters", () => {
    expect(roundTrip("<&", ">&")).toEqual({
      keywordPrefix: "<&",
      keywordSuffix: ">&",
    });
  });

  it("should round-trip quotes and apostrophes", () => {
    expect(roundTrip('"test"', "'end'")).toEqual({
      keywordPrefix: '"test"',
      keywordSuffix: "'end'",
    });
  });

  it("should round-trip text that already looks like an entity", () => {
    expect(roundTrip("&amp;", "&#59;")).toEqual({
      keywordPrefix: "&amp;",
      keywordSuffix: "&#59;",
    });
  });

  it("should read self-closing empty strings", () => {
    const xml = [
      "<plist><dict>",
      "<key>snippetkeywordprefix</key><string/>",
      "<key>snippetkeywordsuffix</key><string>:</string>",
      "</dict></plist>",
    ].join("\n");

    expect(parseManifest(xml)).toEqual({ keywordPrefix: "", keywordSuffix: ":" });
  });

  it("should throw when a key is missing", () => {
    const xml =
      "<plist><dict><key>snippetkeywordprefix</key><string>;</string></dict></plist>";

    expect(() => parseManifest(xml)).toThrow(
      "Manifest format invalid: missing key snippetkeywordsuffix",
    );
  });
});

describe("parsePlistStrings", () => {
  it("should return every key/string pair in document order", () => {
    const pairs = parsePlistStrings(
      renderManifest({ keywordPrefix: "[", keywordSuffix: "]" }),
    );

    expect(Array.from(pairs.entries())).toEqual([
      ["snippetkeywordprefix", "["],
      ["snippetkeywordsuffix", "]"],
    ]);
  });
});
