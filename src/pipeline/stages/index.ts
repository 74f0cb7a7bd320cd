/**
 * Stage registry
 *
 * @module pipeline/stages
 */

import { classificationStage } from './classification.js';
import { comparisonStage } from './comparison.js';
import { datesStage } from './dates.js';
import { legalizationStage } from './legalization.js';
import { ocrStage } from './ocr.js';
import { reportStage } from './report.js';
import type { StageRegistry } from './types.js';
import { vectorizationStage } from './vectorization.js';
import { versioningStage } from './versioning.js';

export const STAGES: StageRegistry = {
  ocr: ocrStage,
  dates: datesStage,
  classification: classificationStage,
  vectorization: vectorizationStage,
  versioning: versioningStage,
  comparison: comparisonStage,
  legalization: legalizationStage,
  report: reportStage,
};

export type { StageContext, StageDefinition, StageOutcome, StageRegistry } from './types.js';
export { collectionName, SKIPPED_VECTORIZATION_MESSAGE } from './vectorization.js';
