/**
 * Report stage
 *
 * @module pipeline/stages/report
 */

import type { PipelineWarning } from '../../models/pipeline.js';
import { aggregateReport } from '../../services/report/aggregator.js';
import { requireStageOutput } from '../state.js';
import type { StageDefinition } from './types.js';

export const reportStage: StageDefinition<'report'> = {
  name: 'report',

  async run(state) {
    const { report, errors } = aggregateReport({
      documents: state.documents,
      versioning: requireStageOutput(state, 'versioning'),
      comparisons: requireStageOutput(state, 'comparison').comparisons,
      legalization: requireStageOutput(state, 'legalization'),
    });

    const missingFields: string[] = [];
    const warnings: PipelineWarning[] = [];
    for (const error of errors) {
      const section = String(error.details.section ?? '');
      const field = String(error.details.field ?? '');
      missingFields.push(`${section}.${field}`);
      warnings.push({ stage: 'report', category: error.category, message: error.message, field });
    }
    if (missingFields.length > 0) {
      console.error(`[Report] ${missingFields.length} required field(s) unresolved: ${missingFields.join(', ')}`);
    }

    return { warnings, output: { report, missingFields } };
  },
};
