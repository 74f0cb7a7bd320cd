/**
 * Date stage: every recognised date per document plus its primary date
 *
 * @module pipeline/stages/dates
 */

import type { PipelineWarning } from '../../models/pipeline.js';
import { extractDates, selectPrimaryDate } from '../../services/dates/date-extractor.js';
import type { StageDefinition } from './types.js';

export const datesStage: StageDefinition<'dates'> = {
  name: 'dates',

  async run(state) {
    const documents = state.documents.map((entry) => {
      const extractedDates = extractDates(entry.rawText);
      return { extractedDates, primaryDate: selectPrimaryDate(extractedDates) };
    });

    const undated = documents.all().filter((entry) => entry.primaryDate === null);
    // Undated documents only fail versioning if they turn out to be classified
    const warnings: PipelineWarning[] = undated.map((entry) => ({
      stage: 'dates',
      category: 'VERSIONING_ERROR',
      message: `No date recognised in ${entry.filename}`,
      document: entry.filename,
    }));

    return {
      documents,
      warnings,
      output: {
        datedDocuments: documents.size - undated.length,
        undatedDocuments: undated.map((entry) => entry.index),
      },
    };
  },
};
