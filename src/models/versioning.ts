/**
 * Versioning interfaces
 *
 * Pure types - no logic.
 *
 * @module models/versioning
 */

import type { Classification, IsoDate } from './document.js';

/**
 * A classified document placed in its group's lineage.
 * Refers back to the arena entry by index.
 */
export interface VersionedDocument {
  docIndex: number;
  filename: string;
  classificationGroup: Classification;
  /** Dense 1..n within the group, ascending by primary date */
  versionNumber: number;
  primaryDate: IsoDate;
  /** True only for version 1 */
  isBase: boolean;
}

/** Every classification is present; groups without documents are empty lists */
export type VersioningResult = Record<Classification, VersionedDocument[]>;
