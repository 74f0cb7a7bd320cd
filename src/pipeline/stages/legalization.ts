/**
 * Legalization stage: legal powers and restrictions across every version
 *
 * Fragments come from the vector store when the run vectorized its documents,
 * and from plain chunks otherwise (or when the store has no match above the
 * similarity threshold).
 *
 * @module pipeline/stages/legalization
 */

import { CLASSIFICATIONS } from '../../models/document.js';
import type { FacultadDefinition } from '../../models/legalization.js';
import type { PipelineWarning } from '../../models/pipeline.js';
import { catalogQuery } from '../../services/legalization/catalog.js';
import {
  detectFacultades,
  verificationSpec,
  type LegalDetectionHooks,
  type LegalSource,
  type VerificationAnswer,
} from '../../services/legalization/legal-extractor.js';
import { splitChunks } from '../../services/legalization/text-chunks.js';
import { PipelineError } from '../errors.js';
import { callExternal } from '../external-call.js';
import { requireStageOutput, type ProcessingState } from '../state.js';
import type { StageContext, StageDefinition } from './types.js';

function legalSources(state: ProcessingState, maxChars: number): LegalSource[] {
  const versioning = requireStageOutput(state, 'versioning');
  return CLASSIFICATIONS.flatMap((group) =>
    versioning[group].map((versioned) => ({
      versioned,
      text: state.documents.get(versioned.docIndex).rawText.slice(0, maxChars),
    }))
  );
}

function buildHooks(
  state: ProcessingState,
  { capabilities, config, policy }: StageContext,
  warnings: PipelineWarning[]
): LegalDetectionHooks {
  const { chunkSize, chunkOverlap, topK, minSimilarity } = config.legalization;
  const vectorization = requireStageOutput(state, 'vectorization');
  const { embedder, vectorStore } = capabilities;

  const chunkCache = new Map<string, string[]>();
  const plainChunks = (source: LegalSource): string[] => {
    let chunks = chunkCache.get(source.versioned.filename);
    if (chunks === undefined) {
      chunks = splitChunks(source.text, chunkSize, chunkOverlap);
      chunkCache.set(source.versioned.filename, chunks);
    }
    return chunks;
  };

  const queryCache = new Map<string, number[]>();
  const queryEmbedding = async (definition: FacultadDefinition): Promise<number[] | null> => {
    if (!embedder) return null;
    const cached = queryCache.get(definition.codigo);
    if (cached !== undefined) return cached;
    const [embedding] = await callExternal(
      'embedding',
      (signal) => embedder.embed([catalogQuery(definition)], signal),
      policy,
      { facultad: definition.codigo }
    );
    if (embedding === undefined) return null;
    queryCache.set(definition.codigo, embedding);
    return embedding;
  };

  return {
    async retrieve(definition, source) {
      if (vectorization.skipped || !vectorStore) return plainChunks(source);

      const embedding = await queryEmbedding(definition);
      if (embedding === null) return plainChunks(source);

      const matches = vectorStore.query({
        collection: vectorization.collection,
        embedding,
        topK,
        minSimilarity,
        filename: source.versioned.filename,
      });
      return matches.length > 0 ? matches.map((match) => match.text) : plainChunks(source);
    },

    async verify(definition, fragment, source): Promise<VerificationAnswer | null> {
      try {
        return await callExternal(
          'legal_verification',
          (signal) => capabilities.extractor.extractStructured(fragment, verificationSpec(definition), signal),
          policy,
          { document: source.versioned.filename, facultad: definition.codigo }
        );
      } catch (error) {
        if (!(error instanceof PipelineError) || error.category !== 'PARSE_ERROR') throw error;
        warnings.push({
          stage: 'legalization',
          category: 'PARSE_ERROR',
          message: `Verification of ${definition.codigo} failed for ${source.versioned.filename}: ${error.message}`,
          document: source.versioned.filename,
        });
        return null;
      }
    },
  };
}

export const legalizationStage: StageDefinition<'legalization'> = {
  name: 'legalization',

  async run(state, context) {
    const warnings: PipelineWarning[] = [];
    const output = await detectFacultades(
      legalSources(state, context.config.maxCharsPerDocument),
      context.catalog,
      buildHooks(state, context, warnings)
    );
    return { warnings, output };
  },
};
