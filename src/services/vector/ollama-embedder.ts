/**
 * Embedder backed by the Ollama /api/embed endpoint
 *
 * @module services/vector/ollama-embedder
 */

import type { Embedder } from '../../pipeline/capabilities.js';
import type { OllamaClient } from '../llm/client.js';

/** Texts per /api/embed request */
const BATCH_SIZE = 32;

export class OllamaEmbedder implements Embedder {
  constructor(private readonly client: OllamaClient) {}

  get model(): string {
    return this.client.embedModel;
  }

  async embed(texts: readonly string[], signal: AbortSignal): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let start = 0; start < texts.length; start += BATCH_SIZE) {
      vectors.push(...(await this.client.embed(texts.slice(start, start + BATCH_SIZE), signal)));
    }
    return vectors;
  }
}
