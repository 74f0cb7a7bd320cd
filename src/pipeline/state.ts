/**
 * ProcessingState and stage-output access
 *
 * @module pipeline/state
 */

import type {
  PipelineMode,
  PipelineWarning,
  RunStatus,
  StageName,
  StageOutputMap,
  StageOutputs,
  StageRecord,
  StageResult,
} from '../models/pipeline.js';
import { DocumentArena } from './arena.js';
import { PipelineError } from './errors.js';
import { INITIAL_STATUS } from './status.js';

export interface ProcessingState {
  readonly runId: string;
  readonly companyId: string;
  readonly folderPath: string;
  readonly mode: PipelineMode;
  readonly documents: DocumentArena;
  readonly results: StageOutputMap;
  readonly stageRecords: readonly StageRecord[];
  readonly warnings: readonly PipelineWarning[];
  readonly status: RunStatus;
}

export function createState(params: {
  runId: string;
  companyId: string;
  folderPath: string;
  mode: PipelineMode;
}): ProcessingState {
  return {
    ...params,
    documents: DocumentArena.empty(),
    results: {},
    stageRecords: [],
    warnings: [],
    status: INITIAL_STATUS,
  };
}

/**
 * Output of a finished stage.
 *
 * @throws PipelineError when the stage has not produced output; a downstream
 * stage reading a missing predecessor is a wiring bug, not a soft condition
 */
export function requireStageOutput<K extends StageName>(
  state: ProcessingState,
  stage: K
): StageOutputs[K] {
  const output = state.results[stage];
  if (output === undefined) {
    throw new PipelineError('INTERNAL_ERROR', `Stage "${stage}" has no output in this run`, {
      company: state.companyId,
      stage,
    });
  }
  return output;
}

export function withStageOutput<K extends StageName>(
  results: StageOutputMap,
  stage: K,
  output: StageOutputs[K]
): StageOutputMap {
  const next: StageOutputMap = { ...results };
  next[stage] = output;
  return next;
}

/**
 * Tagged result of a finished stage, null when it has not run
 */
export function toStageResult(results: StageOutputMap, stage: StageName): StageResult | null {
  switch (stage) {
    case 'ocr':
      return results.ocr ? { stage, output: results.ocr } : null;
    case 'dates':
      return results.dates ? { stage, output: results.dates } : null;
    case 'classification':
      return results.classification ? { stage, output: results.classification } : null;
    case 'vectorization':
      return results.vectorization ? { stage, output: results.vectorization } : null;
    case 'versioning':
      return results.versioning ? { stage, output: results.versioning } : null;
    case 'comparison':
      return results.comparison ? { stage, output: results.comparison } : null;
    case 'legalization':
      return results.legalization ? { stage, output: results.legalization } : null;
    case 'report':
      return results.report ? { stage, output: results.report } : null;
  }
}
