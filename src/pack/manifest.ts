/**
 * Pack manifest (info.plist) rendering and parsing
 *
 * The manifest is an XML property list holding the keyword prefix and
 * suffix as string values. Values are XML-escaped on write and unescaped
 * on read, so any prefix/suffix survives a round trip.
 */

import type { PackManifest } from "@/types";
import {
  MANIFEST_PREFIX_KEY,
  MANIFEST_SUFFIX_KEY,
  MAX_CODEPOINT,
} from "@/constants";
import { ManifestFormatError } from "@/errors";

const XML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&apos;",
};

const XML_UNESCAPES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
};

const XML_SPECIAL_CHARS_PATTERN = /[&<>"']/g;

const XML_ENTITY_PATTERN = /&(#x[0-9a-fA-F]+|#[0-9]+|[a-z]+);/g;

/**
 * <key>k</key> followed by <string>v</string> or an empty <string/>
 */
const PLIST_STRING_PAIR_PATTERN =
  /<key>([^<]*)<\/key>\s*(?:<string>([^<]*)<\/string>|<string\s*\/>)/g;

export function escapeXml(text: string): string {
  return text.replace(XML_SPECIAL_CHARS_PATTERN, (ch) => XML_ESCAPES[ch] ?? ch);
}

function resolveCharReference(entity: string, value: number): string {
  if (value > MAX_CODEPOINT) {
    throw new ManifestFormatError(`character reference out of range ${entity}`);
  }
  return String.fromCodePoint(value);
}

/**
 * Resolve entities in a single pass, so "&amp;lt;" yields "&lt;" and not "<"
 *
 * @throws {ManifestFormatError} On an unknown named entity or a character
 *   reference above U+10FFFF
 */
export function unescapeXml(text: string): string {
  return text.replace(XML_ENTITY_PATTERN, (entity: string, body: string) => {
    if (body.startsWith("#x")) {
      return resolveCharReference(entity, parseInt(body.slice(2), 16));
    }
    if (body.startsWith("#")) {
      return resolveCharReference(entity, parseInt(body.slice(1), 10));
    }
    const resolved = XML_UNESCAPES[body];
    if (resolved === undefined) {
      throw new ManifestFormatError(`unknown entity ${entity}`);
    }
    return resolved;
  });
}

/**
 * Render the manifest as an XML property list
 */
export function renderManifest(manifest: PackManifest): string {
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<!DOCTYPE plist PUBLIC "-//Apple//DTD PLIST 1.0//EN" "http://www.apple.com/DTDs/PropertyList-1.0.dtd">',
    '<plist version="1.0">',
    "<dict>",
    `\t<key>${MANIFEST_PREFIX_KEY}</key>`,
    `\t<string>${escapeXml(manifest.keywordPrefix)}</string>`,
    `\t<key>${MANIFEST_SUFFIX_KEY}</key>`,
    `\t<string>${escapeXml(manifest.keywordSuffix)}</string>`,
    "</dict>",
    "</plist>",
    "",
  ].join("\n");
}

/**
 * Read every key → string pair of a property list dict, in document order
 */
export function parsePlistStrings(xml: string): Map<string, string> {
  const pairs = new Map<string, string>();
  for (const match of xml.matchAll(PLIST_STRING_PAIR_PATTERN)) {
    pairs.set(unescapeXml(match[1]), unescapeXml(match[2] ?? ""));
  }
  return pairs;
}

/**
 * Parse a manifest rendered by renderManifest (or written by the importer).
 *
 * @throws {ManifestFormatError} If the prefix or suffix key is missing
 */
export function parseManifest(xml: string): PackManifest {
  const pairs = parsePlistStrings(xml);
  const keywordPrefix = pairs.get(MANIFEST_PREFIX_KEY);
  const keywordSuffix = pairs.get(MANIFEST_SUFFIX_KEY);

  if (keywordPrefix === undefined) {
    throw new ManifestFormatError(`missing key ${MANIFEST_PREFIX_KEY}`);
  }
  if (keywordSuffix === undefined) {
    throw new ManifestFormatError(`missing key ${MANIFEST_SUFFIX_KEY}`);
  }

  return { keywordPrefix, keywordSuffix };
}
