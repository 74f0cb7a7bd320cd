/**
 * Versioning stage
 *
 * @module pipeline/stages/versioning
 */

import { CLASSIFICATIONS } from '../../models/document.js';
import { assignVersions, latestDocument } from '../../services/versioning/engine.js';
import type { StageDefinition } from './types.js';

export const versioningStage: StageDefinition<'versioning'> = {
  name: 'versioning',

  async run(state) {
    const versioning = assignVersions(state.documents.all());
    for (const group of CLASSIFICATIONS) {
      const latest = latestDocument(versioning, group);
      if (latest !== null) {
        console.error(`[Versioning] ${group}: ${versioning[group].length} version(s), latest ${latest.filename}`);
      }
    }
    return { output: versioning };
  },
};
