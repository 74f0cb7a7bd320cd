/**
 * Stage contract
 *
 * A stage reads the immutable ProcessingState and returns its typed output,
 * optionally a new document arena and local warnings. The controller folds the
 * outcome into the next state; stages never mutate state themselves.
 *
 * @module pipeline/stages/types
 */

import type { FacultadDefinition } from '../../models/legalization.js';
import type { PipelineWarning, StageName, StageOutputs } from '../../models/pipeline.js';
import type { ClassificationRules } from '../../services/classification/keyword-classifier.js';
import type { OcrCache } from '../../services/ocr/ocr-cache.js';
import type { DocumentArena } from '../arena.js';
import type { Capabilities } from '../capabilities.js';
import type { PipelineConfig } from '../config.js';
import type { CallPolicy } from '../external-call.js';
import type { ProcessingState } from '../state.js';

export interface StageContext {
  config: PipelineConfig;
  capabilities: Capabilities;
  classificationRules: ClassificationRules;
  catalog: readonly FacultadDefinition[];
  policy: CallPolicy;
  /** null when OCR caching is disabled */
  ocrCache: OcrCache | null;
}

export interface StageOutcome<K extends StageName> {
  output: StageOutputs[K];
  /** Replaces the run's arena when present */
  documents?: DocumentArena;
  warnings?: PipelineWarning[];
}

export interface StageDefinition<K extends StageName> {
  readonly name: K;
  /**
   * Placeholder output when the stage does not apply to this run, null to run it
   */
  skip?(state: ProcessingState, context: StageContext): StageOutputs[K] | null;
  run(state: ProcessingState, context: StageContext): Promise<StageOutcome<K>>;
}

export type StageRegistry = { readonly [K in StageName]: StageDefinition<K> };
