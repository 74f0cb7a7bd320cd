/**
 * Process entry: environment, real backends and the CLI
 *
 * @module main
 */

import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { runCli } from './cli.js';
import type { Capabilities } from './pipeline/capabilities.js';
import { loadConfig, type PipelineConfig } from './pipeline/config.js';
import { PipelineController } from './pipeline/controller.js';
import { OllamaStructuredExtractor } from './services/extraction/ollama-extractor.js';
import { OllamaClient } from './services/llm/client.js';
import { PdfTextOcr } from './services/ocr/pdf-text.js';
import { OllamaEmbedder } from './services/vector/ollama-embedder.js';
import { SqliteVectorStore } from './services/vector/sqlite-store.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * Load .env from the first candidate that exists:
 * LEGAL_LINEAGE_ENV_FILE, then CWD/.env, then the package root
 */
export function loadEnvironment(): void {
  const envCandidates = [
    process.env.LEGAL_LINEAGE_ENV_FILE,
    path.resolve(process.cwd(), '.env'),
    path.resolve(__dirname, '..', '.env'),
  ].filter((p): p is string => typeof p === 'string');

  for (const envPath of envCandidates) {
    if (fs.existsSync(envPath)) {
      dotenv.config({ path: envPath, quiet: true });
      break;
    }
  }
}

/**
 * Production backends. The vector store is opened only in vectorized mode.
 */
export function createCapabilities(config: PipelineConfig): {
  capabilities: Capabilities;
  close: () => void;
} {
  const client = new OllamaClient({ ...config.ollama, circuitBreaker: config.circuitBreaker });
  const capabilities: Capabilities = {
    ocr: new PdfTextOcr(),
    extractor: new OllamaStructuredExtractor(client, config.maxCharsPerDocument),
  };

  if (config.mode !== 'vectorized') {
    return { capabilities, close: () => undefined };
  }

  const store = SqliteVectorStore.open(config.vectorStorePath ?? path.join(config.outputDir, 'vector-store.db'));
  capabilities.embedder = new OllamaEmbedder(client);
  capabilities.vectorStore = store;
  return { capabilities, close: () => store.close() };
}

export async function main(argv: readonly string[]): Promise<number> {
  loadEnvironment();
  const config = loadConfig();
  let close: () => void = () => undefined;

  try {
    return await runCli(argv, () => {
      const backends = createCapabilities(config);
      close = backends.close;
      return new PipelineController({ config, capabilities: backends.capabilities });
    });
  } finally {
    close();
  }
}
