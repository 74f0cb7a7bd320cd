/**
 * Versioning engine
 *
 * Partitions classified documents by classification and ranks each partition
 * by primary date, filename breaking ties. Rank is the version number; version
 * 1 is the group's base document.
 *
 * @module services/versioning/engine
 */

import {
  byClassification,
  isClassification,
  type Classification,
  type DocumentEntry,
} from '../../models/document.js';
import type { VersionedDocument, VersioningResult } from '../../models/versioning.js';
import { VersioningError } from '../../pipeline/errors.js';

/**
 * Code-unit order, so the result does not depend on the host locale
 */
function compareCodeUnits(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Assign versions to every classified document.
 *
 * Documents labelled `otros` or not yet classified are not versioned.
 *
 * @throws VersioningError naming the first versionable document without a primary date
 */
export function assignVersions(documents: readonly DocumentEntry[]): VersioningResult {
  const groups = byClassification<Array<DocumentEntry & { primaryDate: string }>>(() => []);

  for (const doc of documents) {
    if (doc.classification === null || !isClassification(doc.classification)) continue;
    if (doc.primaryDate === null) {
      throw new VersioningError(
        `Document "${doc.filename}" (${doc.classification}) has no usable date`,
        { document: doc.filename, classification: doc.classification }
      );
    }
    groups[doc.classification].push({ ...doc, primaryDate: doc.primaryDate });
  }

  return byClassification((group) => rankGroup(group, groups[group]));
}

function rankGroup(
  group: Classification,
  docs: ReadonlyArray<DocumentEntry & { primaryDate: string }>
): VersionedDocument[] {
  const ordered = [...docs].sort(
    (a, b) => compareCodeUnits(a.primaryDate, b.primaryDate) || compareCodeUnits(a.filename, b.filename)
  );
  return ordered.map((doc, i) => ({
    docIndex: doc.index,
    filename: doc.filename,
    classificationGroup: group,
    versionNumber: i + 1,
    primaryDate: doc.primaryDate,
    isBase: i === 0,
  }));
}

/**
 * Version 1 of a group, or null for an empty group
 */
export function baseDocument(result: VersioningResult, group: Classification): VersionedDocument | null {
  return result[group][0] ?? null;
}

/**
 * Highest version of a group, or null for an empty group
 */
export function latestDocument(result: VersioningResult, group: Classification): VersionedDocument | null {
  const versions = result[group];
  return versions.length > 0 ? versions[versions.length - 1] : null;
}
