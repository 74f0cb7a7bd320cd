/**
 * Comparison interfaces
 *
 * Types for field-level deltas between consecutive versions and the
 * line diff of their raw text. Pure types - no logic.
 *
 * @module models/comparison
 */

import type { Classification, IsoDate } from './document.js';

/**
 * Change categories in descending significance. The summary sentence names the
 * highest-ranked categories first.
 */
export const CHANGE_CATEGORIES = [
  'ownership',
  'capital',
  'administration',
  'identity',
  'constitution',
  'legalization',
  'address',
  'other',
] as const;

export type ChangeCategory = (typeof CHANGE_CATEGORIES)[number];

export interface FieldChange {
  field: string;
  oldValue: string | null;
  newValue: string | null;
  category: ChangeCategory;
}

/**
 * Line-diff statistics between two raw texts
 */
export interface TextDiffStats {
  insertions: number;
  deletions: number;
  unchanged: number;
  /** 2 * unchanged chars / total chars, rounded to 4 decimals */
  similarityRatio: number;
}

export interface Comparison {
  classificationGroup: Classification;
  fromVersion: number;
  toVersion: number;
  /** Arena indexes of the two documents */
  sourceDocA: number;
  sourceDocB: number;
  fileA: string;
  fileB: string;
  dateA: IsoDate;
  dateB: IsoDate;
  changes: FieldChange[];
  /** One short statement per change, in change order */
  narrative: string[];
  summary: string;
  textSimilarity: TextDiffStats;
}

export type ComparisonSet = Record<Classification, Comparison[]>;
