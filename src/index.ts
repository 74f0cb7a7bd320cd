/**
 * legal-lineage
 *
 * Turns a company's folder of legal PDFs into versioned document lineages,
 * version-to-version change reports and one consolidated legal report with
 * per-field provenance.
 *
 * @module index
 */

export * from './models/index.js';

export { PipelineController, formatRunSummary } from './pipeline/controller.js';
export type { RunOutcome, PipelineControllerOptions } from './pipeline/controller.js';
export { loadConfig, resolveMode, PipelineConfigSchema } from './pipeline/config.js';
export type { PipelineConfig, PipelineConfigOverrides } from './pipeline/config.js';
export type {
  Capabilities,
  Embedder,
  EmbeddingChunk,
  ExtractionSpec,
  OcrCapability,
  OcrText,
  StructuredExtractor,
  VectorMatch,
  VectorQuery,
  VectorStore,
} from './pipeline/capabilities.js';
export * from './pipeline/errors.js';
export { callExternal, DEFAULT_CALL_POLICY } from './pipeline/external-call.js';
export type { CallPolicy } from './pipeline/external-call.js';
export { StageGraph, PIPELINE_GRAPH } from './pipeline/graph.js';
export { JsonResultsStore, RunManifestSchema } from './pipeline/results-store.js';
export type { ResultsStore } from './pipeline/results-store.js';
export { OcrCache } from './services/ocr/ocr-cache.js';

export { assignVersions, baseDocument, latestDocument } from './services/versioning/engine.js';
export { compareAll, comparePair, diffFields } from './services/comparison/engine.js';
export { aggregateReport } from './services/report/aggregator.js';
export type { AggregationInput, AggregationResult } from './services/report/aggregator.js';

export { createCapabilities, main } from './main.js';
