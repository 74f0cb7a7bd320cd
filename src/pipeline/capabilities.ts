/**
 * External capabilities consumed by the pipeline
 *
 * The stages depend only on these interfaces. Concrete backends live under
 * services/ (pdf-parse OCR, Ollama extraction and embeddings, SQLite vectors)
 * and tests pass in-process fakes.
 *
 * @module pipeline/capabilities
 */

import type { z } from 'zod';
import type { Classification } from '../models/document.js';

export interface OcrText {
  /** Plain text of the whole document */
  text: string;
  pageCount: number;
}

export interface OcrCapability {
  /** Also recorded in the OCR cache; a cached text is reused only by the same backend */
  readonly name: string;
  /**
   * @throws InputError when the file is missing, unreadable or has no text
   */
  extractText(filePath: string, signal: AbortSignal): Promise<OcrText>;
}

/**
 * What to extract and how to validate the answer
 */
export interface ExtractionSpec<T> {
  /** Short identifier used in logs, e.g. `structured_fields` */
  name: string;
  instructions: string;
  /** Shape shown to the model */
  example: unknown;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

export interface StructuredExtractor {
  /**
   * @throws ParseError when the backend's answer is not valid JSON for the schema
   */
  extractStructured<T>(text: string, spec: ExtractionSpec<T>, signal: AbortSignal): Promise<T>;
}

export interface Embedder {
  readonly model: string;
  embed(texts: readonly string[], signal: AbortSignal): Promise<number[][]>;
}

export interface EmbeddingChunk {
  collection: string;
  /** Stable id; re-upserting the same chunk is a no-op */
  chunkId: string;
  filename: string;
  classification: Classification;
  chunkIndex: number;
  text: string;
  embedding: number[];
}

export interface VectorQuery {
  collection: string;
  embedding: number[];
  topK: number;
  minSimilarity: number;
  /** Restrict matches to one document */
  filename?: string;
}

export interface VectorMatch {
  chunkId: string;
  filename: string;
  chunkIndex: number;
  text: string;
  similarity: number;
}

export interface VectorStore {
  /** @returns number of chunks actually inserted (duplicates are skipped) */
  upsertEmbeddings(chunks: readonly EmbeddingChunk[]): number;
  query(query: VectorQuery): VectorMatch[];
  /** Chunks stored in a collection */
  count(collection: string): number;
}

export interface Capabilities {
  ocr: OcrCapability;
  extractor: StructuredExtractor;
  /** Required only in vectorized mode */
  embedder?: Embedder;
  /** Required only in vectorized mode */
  vectorStore?: VectorStore;
}
