/**
 * Text preparation for legal-power detection
 *
 * @module services/legalization/text-chunks
 */

import { foldText } from '../dates/date-extractor.js';

/** Abbreviations notaries use for banking terms */
const ABBREVIATIONS: ReadonlyArray<[RegExp, string]> = [
  [/\bctas\.\s*ctes\./gi, 'cuentas corrientes'],
  [/\bcts\.\s*ctes\./gi, 'cuentas corrientes'],
  [/\bcta\.\s*cte\./gi, 'cuenta corriente'],
  [/\bc\/c\b/gi, 'cuenta corriente'],
];

/**
 * Collapse whitespace (including non-breaking spaces) and expand abbreviations
 */
export function normalizeLegalText(text: string): string {
  let out = text.replace(/[ \t]/g, ' ').replace(/\s+/g, ' ').trim();
  for (const [pattern, replacement] of ABBREVIATIONS) {
    out = out.replace(pattern, replacement);
  }
  return out;
}

/**
 * Fixed-size windows over the normalised text; consecutive windows share
 * `overlap` characters. A text no longer than `size` is one chunk.
 */
export function splitChunks(text: string, size: number, overlap: number): string[] {
  const normalized = normalizeLegalText(text);
  if (normalized.length === 0) return [];
  if (normalized.length <= size) return [normalized];

  const step = Math.max(1, size - overlap);
  const chunks: string[] = [];
  for (let start = 0; start < normalized.length; start += step) {
    chunks.push(normalized.slice(start, start + size));
    if (start + size >= normalized.length) break;
  }
  return chunks;
}

/**
 * Every anchor must match; an anchor matches when any of its `|` alternatives
 * occurs in the text (accent- and case-insensitive substring)
 */
export function containsAllAnchors(text: string, anchors: readonly string[]): boolean {
  const folded = foldText(text);
  return anchors.every((anchor) =>
    anchor
      .split('|')
      .map((variant) => foldText(variant.trim()))
      .filter((variant) => variant.length > 0)
      .some((variant) => folded.includes(variant))
  );
}

/**
 * True when any keyword occurs in the text; an empty keyword list matches
 */
export function containsAnyKeyword(text: string, keywords: readonly string[]): boolean {
  if (keywords.length === 0) return true;
  const folded = foldText(text);
  return keywords.some((keyword) => folded.includes(foldText(keyword)));
}
