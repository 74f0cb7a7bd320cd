/**
 * Vectorization stage (vectorized mode only)
 *
 * Chunks every versionable document, embeds the chunks and stores them in the
 * company's collection. Other modes get a placeholder output.
 *
 * @module pipeline/stages/vectorization
 */

import { isClassification } from '../../models/document.js';
import { MODE_LABELS } from '../../models/pipeline.js';
import { splitChunks } from '../../services/legalization/text-chunks.js';
import { chunkId } from '../../utils/hash.js';
import type { EmbeddingChunk } from '../capabilities.js';
import { ConfigurationError } from '../errors.js';
import { callExternal } from '../external-call.js';
import type { StageDefinition } from './types.js';

export const SKIPPED_VECTORIZATION_MESSAGE =
  'Vectorización omitida - usando extracción directa desde OCR';

export function collectionName(companyId: string): string {
  return `legal_${companyId}`;
}

export const vectorizationStage: StageDefinition<'vectorization'> = {
  name: 'vectorization',

  skip(state) {
    if (state.mode === 'vectorized') return null;
    return {
      collection: collectionName(state.companyId),
      documentsProcessed: 0,
      totalChunks: 0,
      mode: state.mode,
      message: SKIPPED_VECTORIZATION_MESSAGE,
      skipped: true,
    };
  },

  async run(state, { capabilities, config, policy }) {
    const { embedder, vectorStore } = capabilities;
    if (!embedder || !vectorStore) {
      throw new ConfigurationError('Vectorized mode needs an embedder and a vector store', {
        mode: state.mode,
      });
    }

    const collection = collectionName(state.companyId);
    const { chunkSize, chunkOverlap } = config.legalization;
    let documentsProcessed = 0;
    let totalChunks = 0;
    let inserted = 0;

    for (const entry of state.documents.all()) {
      const classification = entry.classification;
      if (classification === null || !isClassification(classification)) continue;

      const texts = splitChunks(entry.rawText, chunkSize, chunkOverlap);
      if (texts.length === 0) continue;

      const embeddings = await callExternal(
        'embedding',
        (signal) => embedder.embed(texts, signal),
        policy,
        { document: entry.filename }
      );
      const chunks: EmbeddingChunk[] = texts.map((text, chunkIndex) => ({
        collection,
        chunkId: chunkId(entry.filename, chunkIndex, text),
        filename: entry.filename,
        classification,
        chunkIndex,
        text,
        embedding: embeddings[chunkIndex],
      }));

      inserted += vectorStore.upsertEmbeddings(chunks);
      documentsProcessed++;
      totalChunks += chunks.length;
    }

    console.error(
      `[Vectorization] ${collection}: ${totalChunks} chunk(s) from ${documentsProcessed} document(s), ` +
        `${inserted} new, ${vectorStore.count(collection)} stored (${embedder.model})`
    );

    return {
      output: {
        collection,
        documentsProcessed,
        totalChunks,
        mode: state.mode,
        message: `${inserted} fragmento(s) nuevo(s) almacenado(s) en ${collection} (${MODE_LABELS[state.mode]})`,
        skipped: false,
      },
    };
  },
};
