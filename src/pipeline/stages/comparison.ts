/**
 * Comparison stage: consecutive versions of every group
 *
 * @module pipeline/stages/comparison
 */

import type { ComparisonFailure, PipelineWarning } from '../../models/pipeline.js';
import { compareAll } from '../../services/comparison/engine.js';
import { requireStageOutput } from '../state.js';
import type { StageDefinition } from './types.js';

function detailNumber(details: Record<string, unknown>, key: string): number {
  const value = details[key];
  return typeof value === 'number' ? value : 0;
}

export const comparisonStage: StageDefinition<'comparison'> = {
  name: 'comparison',

  async run(state) {
    const versioning = requireStageOutput(state, 'versioning');
    const { comparisons, failures } = compareAll(versioning, state.documents);

    const recorded: ComparisonFailure[] = failures.map((error) => ({
      group: String(error.details.group ?? ''),
      fromVersion: detailNumber(error.details, 'fromVersion'),
      toVersion: detailNumber(error.details, 'toVersion'),
      message: error.message,
    }));
    const warnings: PipelineWarning[] = failures.map((error) => ({
      stage: 'comparison',
      category: error.category,
      message: error.message,
      document: error.document,
    }));

    return { warnings, output: { comparisons, failures: recorded } };
  },
};
