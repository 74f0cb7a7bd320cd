/**
 * Raw-text diff between two versions
 *
 * Line-level diff with jsdiff. The similarity ratio is the share of characters
 * that sit in unchanged lines, counted on both sides.
 *
 * @module services/comparison/diff-service
 */

import { diffLines } from 'diff';
import type { TextDiffStats } from '../../models/comparison.js';

/**
 * Compare two texts line by line
 *
 * @returns counts of inserted, deleted and unchanged hunks plus the similarity ratio
 */
export function compareText(text1: string, text2: string): TextDiffStats {
  let insertions = 0;
  let deletions = 0;
  let unchanged = 0;
  let unchangedChars = 0;

  for (const change of diffLines(text1, text2)) {
    if (change.added) {
      insertions++;
    } else if (change.removed) {
      deletions++;
    } else {
      unchanged++;
      unchangedChars += change.value.length;
    }
  }

  const totalChars = text1.length + text2.length;
  const similarityRatio = totalChars === 0 ? 1.0 : (2 * unchangedChars) / totalChars;

  return {
    insertions,
    deletions,
    unchanged,
    similarityRatio: Math.round(similarityRatio * 10000) / 10000,
  };
}
