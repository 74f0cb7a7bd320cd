/**
 * Document Models
 *
 * A document is one PDF from a company's data folder. It is filled in stage by
 * stage (text, dates, label, structured fields) and frozen once classification
 * has run.
 *
 * @module models/document
 */

// ═══════════════════════════════════════════════════════════════════════════════
// CLASSIFICATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Legal document types that take part in versioning, in resolution priority order
 * (earlier entries win cross-group conflicts in the report).
 */
export const CLASSIFICATIONS = [
  'escritura_publica',
  'inscripcion_cbr',
  'publicacion_diario_oficial',
] as const;

export type Classification = (typeof CLASSIFICATIONS)[number];

/**
 * Label assigned by the classifier. `otros` documents stay in the classification
 * output but never enter a version group.
 */
export type DocumentLabel = Classification | 'otros';

const CLASSIFICATION_SET: ReadonlySet<string> = new Set(CLASSIFICATIONS);

export function isClassification(label: string): label is Classification {
  return CLASSIFICATION_SET.has(label);
}

/**
 * Rank of a classification in the resolution priority (0 = highest).
 */
export function classificationRank(classification: Classification): number {
  return CLASSIFICATIONS.indexOf(classification);
}

/**
 * Build a record with one entry per classification.
 */
export function byClassification<T>(init: (classification: Classification) => T): Record<Classification, T> {
  return {
    escritura_publica: init('escritura_publica'),
    inscripcion_cbr: init('inscripcion_cbr'),
    publicacion_diario_oficial: init('publicacion_diario_oficial'),
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// DOCUMENT
// ═══════════════════════════════════════════════════════════════════════════════

/** Field name -> extracted value; null when the document does not state it */
export type StructuredFields = Record<string, string | null>;

/**
 * ISO calendar date, YYYY-MM-DD
 */
export type IsoDate = string;

/**
 * Facts about the PDF file itself, recorded by the OCR stage
 */
export interface SourceMetadata {
  /** `sha256:` hash of the file bytes; also the OCR cache key */
  contentHash: string;
  byteSize: number;
  pageCount: number;
  /** True when the text came from the OCR cache */
  fromCache: boolean;
}

export interface DocumentEntry {
  /** Stable position in the run's document arena */
  index: number;
  filename: string;
  sourcePath: string;
  rawText: string;
  /** null for documents that were not read from a file */
  metadata: SourceMetadata | null;
  /** Dates in reading order, duplicates removed */
  extractedDates: IsoDate[];
  primaryDate: IsoDate | null;
  classification: DocumentLabel | null;
  /** True when the classifier saw amendment wording */
  isModification: boolean;
  /** null until extraction runs, or when extraction could not produce a valid record */
  structuredFields: StructuredFields | null;
}

/**
 * Read access to a run's documents by arena index
 */
export interface DocumentLookup {
  get(index: number): DocumentEntry;
}
