/**
 * Search keyword derivation from the emoji taxonomy
 *
 * Subcategory labels ("hand-fingers-closed") carry useful search terms, but
 * most of them repeat words already in the emoji's name. Only the terms the
 * name does not already contain are kept.
 */

import { GENERIC_TAXONOMY_WORDS, SUBCATEGORY_SEPARATOR } from "@/constants";
import { tokenizeName } from "@/utils/text/textNormalization";

/**
 * Derive supplementary keywords for an emoji.
 *
 * Algorithm:
 * 1. Split the subcategory on "-" (order preserved, empty tokens dropped)
 * 2. Tokenize the name (lowercase words, edge colons stripped)
 * 3. Exclude name tokens and GENERIC_TAXONOMY_WORDS
 * 4. Emit the remaining candidates in their original order, once each
 *    (case-insensitively, first spelling wins)
 *
 * Returns an empty array when every candidate is excluded.
 *
 * @example
 * deriveKeywords("GRINNING FACE", "face-smiling") // ["smiling"]
 * deriveKeywords("THUMBS UP SIGN", "hand-fingers-closed") // ["hand", "fingers", "closed"]
 */
export function deriveKeywords(name: string, subcategory: string): string[] {
  const excluded = new Set<string>([
    ...tokenizeName(name),
    ...GENERIC_TAXONOMY_WORDS,
  ]);

  const emitted = new Set<string>();
  const keywords: string[] = [];
  for (const candidate of subcategory.split(SUBCATEGORY_SEPARATOR)) {
    if (candidate.length === 0) continue;
    const key = candidate.toLowerCase();
    if (excluded.has(key) || emitted.has(key)) continue;
    emitted.add(key);
    keywords.push(candidate);
  }

  return keywords;
}
