/**
 * Comparison engine
 *
 * Diffs the structured fields of every consecutive version pair (v, v+1)
 * within each classification group. Pairs where either side has no structured
 * fields are skipped with a ComparisonError; the other pairs still run.
 *
 * @module services/comparison/engine
 */

import {
  CLASSIFICATIONS,
  byClassification,
  type Classification,
  type DocumentEntry,
  type DocumentLookup,
  type StructuredFields,
} from '../../models/document.js';
import type { Comparison, ComparisonSet, FieldChange } from '../../models/comparison.js';
import type { VersionedDocument, VersioningResult } from '../../models/versioning.js';
import { ComparisonError, PipelineError } from '../../pipeline/errors.js';
import { compareFieldOrder, getFieldDefinition } from '../extraction/field-catalog.js';
import { compareText } from './diff-service.js';
import { changeStatement, summarizeChanges } from './narrative.js';
import { presentValue, valuesEqual } from './normalize.js';

export interface CompareAllResult {
  comparisons: ComparisonSet;
  failures: ComparisonError[];
}

/**
 * Field-level changes from `before` to `after`. A key missing on one side is
 * treated as null.
 */
export function diffFields(before: StructuredFields, after: StructuredFields): FieldChange[] {
  const keys = [...new Set([...Object.keys(before), ...Object.keys(after)])].sort(compareFieldOrder);
  const changes: FieldChange[] = [];

  for (const key of keys) {
    const definition = getFieldDefinition(key);
    const oldValue = presentValue(before[key]);
    const newValue = presentValue(after[key]);
    if (!valuesEqual(definition.kind, oldValue, newValue)) {
      changes.push({ field: key, oldValue, newValue, category: definition.category });
    }
  }
  return changes;
}

/**
 * Compare two consecutive versions of one group
 *
 * @throws ComparisonError when either document has no structured fields
 */
export function comparePair(
  from: VersionedDocument,
  to: VersionedDocument,
  docA: DocumentEntry,
  docB: DocumentEntry
): Comparison {
  const group = from.classificationGroup;
  if (to.classificationGroup !== group || to.versionNumber !== from.versionNumber + 1) {
    throw new PipelineError(
      'INTERNAL_ERROR',
      `Comparison requires consecutive versions of one group, got ${from.classificationGroup} v${from.versionNumber} and ${to.classificationGroup} v${to.versionNumber}`
    );
  }

  const missing = [docA, docB].filter((doc) => doc.structuredFields === null);
  if (docA.structuredFields === null || docB.structuredFields === null) {
    throw new ComparisonError(
      `Cannot compare ${group} v${from.versionNumber} -> v${to.versionNumber}: no structured fields for ${missing.map((d) => d.filename).join(', ')}`,
      {
        document: missing[0]?.filename,
        group,
        fromVersion: from.versionNumber,
        toVersion: to.versionNumber,
      }
    );
  }

  const changes = diffFields(docA.structuredFields, docB.structuredFields);

  return {
    classificationGroup: group,
    fromVersion: from.versionNumber,
    toVersion: to.versionNumber,
    sourceDocA: from.docIndex,
    sourceDocB: to.docIndex,
    fileA: from.filename,
    fileB: to.filename,
    dateA: from.primaryDate,
    dateB: to.primaryDate,
    changes,
    narrative: changes.map(changeStatement),
    summary: summarizeChanges(changes, from.versionNumber, to.versionNumber),
    textSimilarity: compareText(docA.rawText, docB.rawText),
  };
}

function compareGroup(
  group: Classification,
  versions: readonly VersionedDocument[],
  documents: DocumentLookup
): { comparisons: Comparison[]; failures: ComparisonError[] } {
  const comparisons: Comparison[] = [];
  const failures: ComparisonError[] = [];

  for (let i = 0; i + 1 < versions.length; i++) {
    const from = versions[i];
    const to = versions[i + 1];
    try {
      comparisons.push(comparePair(from, to, documents.get(from.docIndex), documents.get(to.docIndex)));
    } catch (error) {
      if (error instanceof ComparisonError) {
        console.error(`[Comparison] ${group}: ${error.message}`);
        failures.push(error);
      } else {
        throw error;
      }
    }
  }
  return { comparisons, failures };
}

/**
 * Compare every group. Groups with fewer than two versions yield no comparisons.
 */
export function compareAll(versioning: VersioningResult, documents: DocumentLookup): CompareAllResult {
  const comparisons: ComparisonSet = byClassification(() => []);
  const failures: ComparisonError[] = [];

  for (const group of CLASSIFICATIONS) {
    const result = compareGroup(group, versioning[group], documents);
    comparisons[group] = result.comparisons;
    failures.push(...result.failures);
  }
  return { comparisons, failures };
}
