/**
 * Pipeline run interfaces
 *
 * Stage names, typed stage outputs, run status and the persisted run manifest.
 *
 * @module models/pipeline
 */

import type { DocumentLabel } from './document.js';
import type { VersioningResult } from './versioning.js';
import type { ComparisonSet } from './comparison.js';
import type { LegalizationResult } from './legalization.js';
import type { Report } from './report.js';
import type { ErrorCategory } from '../pipeline/errors.js';

// ═══════════════════════════════════════════════════════════════════════════════
// MODE
// ═══════════════════════════════════════════════════════════════════════════════

export const PIPELINE_MODES = ['ocr_direct', 'no_vectorization', 'vectorized'] as const;

export type PipelineMode = (typeof PIPELINE_MODES)[number];

/** Label written to the vectorization snapshot's `modo` key */
export const MODE_LABELS: Record<PipelineMode, string> = {
  ocr_direct: 'OCR_DIRECTO',
  no_vectorization: 'SIN_VECTORIZACION',
  vectorized: 'VECTORIZADO',
};

// ═══════════════════════════════════════════════════════════════════════════════
// STAGES
// ═══════════════════════════════════════════════════════════════════════════════

export const STAGE_NAMES = [
  'ocr',
  'dates',
  'classification',
  'vectorization',
  'versioning',
  'comparison',
  'legalization',
  'report',
] as const;

export type StageName = (typeof STAGE_NAMES)[number];

export interface OcrOutput {
  /** Arena indexes in folder order */
  documents: number[];
  totalCharacters: number;
  /** Arena indexes whose text came from the OCR cache */
  cachedDocuments: number[];
}

export interface DatesOutput {
  datedDocuments: number;
  /** Arena indexes of documents where no date was recognised */
  undatedDocuments: number[];
}

export interface ClassificationLabel {
  docIndex: number;
  label: DocumentLabel;
  isModification: boolean;
  /** `keywords` when a rule matched, `model` when the extraction backend decided */
  method: 'keywords' | 'model';
}

export interface ClassificationOutput {
  labels: ClassificationLabel[];
  /** Arena indexes whose structured-field extraction failed after retries */
  extractionFailures: number[];
}

export interface VectorizationOutput {
  collection: string;
  documentsProcessed: number;
  totalChunks: number;
  mode: PipelineMode;
  message: string;
  skipped: boolean;
}

export interface ComparisonFailure {
  group: string;
  fromVersion: number;
  toVersion: number;
  message: string;
}

export interface ComparisonOutput {
  comparisons: ComparisonSet;
  failures: ComparisonFailure[];
}

export interface ReportOutput {
  report: Report;
  /** `section.field` of every required field left unresolved */
  missingFields: string[];
}

/**
 * Output payload of every stage, keyed by stage name
 */
export interface StageOutputs {
  ocr: OcrOutput;
  dates: DatesOutput;
  classification: ClassificationOutput;
  vectorization: VectorizationOutput;
  versioning: VersioningResult;
  comparison: ComparisonOutput;
  legalization: LegalizationResult;
  report: ReportOutput;
}

/**
 * Tagged stage result: the stage name selects the payload type
 */
export type StageResult = {
  [K in StageName]: { stage: K; output: StageOutputs[K] };
}[StageName];

export type StageOutputMap = Partial<StageOutputs>;

// ═══════════════════════════════════════════════════════════════════════════════
// RUN STATUS
// ═══════════════════════════════════════════════════════════════════════════════

export type RunStatus =
  | { state: 'pending' }
  | { state: 'running'; stage: StageName }
  | { state: 'completed' }
  | { state: 'failed'; stage: StageName; reason: string };

export interface StageRecord {
  stage: StageName;
  outcome: 'completed' | 'skipped' | 'failed';
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  /** Snapshot filename written for this stage, null when none was written */
  snapshot: string | null;
}

export interface PipelineWarning {
  stage: StageName;
  category: ErrorCategory;
  message: string;
  document?: string;
  field?: string;
}

export interface StageFailure {
  stage: StageName;
  category: ErrorCategory;
  message: string;
  document: string | null;
  hint: string;
}

/**
 * Persisted as `{company}_pipeline_status.json`
 */
export interface RunManifest {
  run_id: string;
  company: string;
  mode: PipelineMode;
  status: RunStatus;
  stages: StageRecord[];
  warnings: PipelineWarning[];
  failure: StageFailure | null;
}
