/**
 * Pipeline configuration
 *
 * Environment variables are read once into a zod-validated object. Every value
 * has a default so a bare checkout runs against a local Ollama.
 *
 * Environment variables:
 *   DATA_DIR                input root, one folder per company (default: data)
 *   OUTPUT_DIR              stage snapshots (default: results)
 *   EXTRACT_FROM_OCR        true -> ocr_direct, false -> no_vectorization (default: true)
 *   PIPELINE_MODE           ocr_direct | no_vectorization | vectorized; wins over EXTRACT_FROM_OCR
 *   OLLAMA_BASE_URL         default http://localhost:11434
 *   OLLAMA_MODEL            text model for classification and extraction
 *   OLLAMA_EMBED_MODEL      embedding model (vectorized mode only)
 *   OLLAMA_TEMPERATURE      default 0.1
 *   EXTERNAL_MAX_ATTEMPTS   attempts per external call (default: 3)
 *   EXTERNAL_TIMEOUT_MS     per-attempt timeout (default: 120000)
 *   VECTOR_STORE_PATH       SQLite file (default: {OUTPUT_DIR}/vector-store.db)
 *   FACULTADES_CATALOG_PATH legal powers catalog (default: bundled resources file)
 *   MAX_CHARS_DOC           text sent to extraction per document (default: 16000)
 *   OCR_CACHE               reuse OCR text of unchanged PDFs (default: true)
 *   OCR_CACHE_DIR           cache location (default: {OUTPUT_DIR}/ocr-cache)
 *
 * @module pipeline/config
 */

import { z } from 'zod';
import { PIPELINE_MODES, type PipelineMode } from '../models/pipeline.js';
import { ConfigurationError } from './errors.js';

export const PipelineConfigSchema = z.object({
  dataDir: z.string().min(1).default('data'),
  outputDir: z.string().min(1).default('results'),
  mode: z.enum(PIPELINE_MODES).default('ocr_direct'),

  ollama: z
    .object({
      baseUrl: z.string().url().default('http://localhost:11434'),
      model: z.string().min(1).default('llama3.1'),
      embedModel: z.string().min(1).default('nomic-embed-text'),
      temperature: z.number().min(0).max(2).default(0.1),
      maxOutputTokens: z.number().int().positive().default(4096),
    })
    .default({}),

  external: z
    .object({
      maxAttempts: z.number().int().min(1).max(10).default(3),
      timeoutMs: z.number().int().positive().default(120_000),
      baseDelayMs: z.number().int().min(0).default(500),
      maxDelayMs: z.number().int().min(0).default(10_000),
    })
    .default({}),

  circuitBreaker: z
    .object({
      failureThreshold: z.number().int().positive().default(5),
      recoveryTimeMs: z.number().int().positive().default(60_000),
    })
    .default({}),

  legalization: z
    .object({
      catalogPath: z.string().optional(),
      chunkSize: z.number().int().positive().default(1000),
      chunkOverlap: z.number().int().min(0).default(120),
      minSimilarity: z.number().min(0).max(1).default(0.7),
      topK: z.number().int().positive().default(6),
    })
    .default({}),

  vectorStorePath: z.string().optional(),
  ocrCache: z
    .object({
      enabled: z.boolean().default(true),
      directory: z.string().optional(),
    })
    .default({}),
  maxCharsPerDocument: z.number().int().positive().default(16_000),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

/** Shallow-per-group overrides, as passed by tests and the CLI */
export type PipelineConfigOverrides = Partial<
  Omit<PipelineConfig, 'ollama' | 'external' | 'circuitBreaker' | 'legalization' | 'ocrCache'>
> & {
  ollama?: Partial<PipelineConfig['ollama']>;
  external?: Partial<PipelineConfig['external']>;
  circuitBreaker?: Partial<PipelineConfig['circuitBreaker']>;
  legalization?: Partial<PipelineConfig['legalization']>;
  ocrCache?: Partial<PipelineConfig['ocrCache']>;
};

type Env = Record<string, string | undefined>;

function parseIntEnv(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === '') return undefined;
  const parsed = Number.parseInt(raw, 10);
  if (Number.isNaN(parsed)) {
    throw new ConfigurationError(`Invalid numeric env var ${name}: "${raw}"`, { variable: name });
  }
  return parsed;
}

function parseFloatEnv(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === '') return undefined;
  const parsed = Number.parseFloat(raw);
  if (Number.isNaN(parsed)) {
    throw new ConfigurationError(`Invalid numeric env var ${name}: "${raw}"`, { variable: name });
  }
  return parsed;
}

function parseBoolEnv(env: Env, name: string): boolean | undefined {
  const raw = env[name]?.trim().toLowerCase();
  if (raw === undefined || raw === '') return undefined;
  if (['true', '1', 'yes', 'si', 'sí'].includes(raw)) return true;
  if (['false', '0', 'no'].includes(raw)) return false;
  throw new ConfigurationError(`Invalid boolean env var ${name}: "${env[name]}"`, { variable: name });
}

/**
 * Resolve the operating mode. PIPELINE_MODE names a mode directly; otherwise the
 * EXTRACT_FROM_OCR toggle selects between the two modes that skip vectorization.
 */
export function resolveMode(env: Env): PipelineMode {
  const explicit = env.PIPELINE_MODE?.trim();
  if (explicit) {
    const parsed = z.enum(PIPELINE_MODES).safeParse(explicit);
    if (!parsed.success) {
      throw new ConfigurationError(
        `Invalid PIPELINE_MODE "${explicit}". Expected one of: ${PIPELINE_MODES.join(', ')}`,
        { variable: 'PIPELINE_MODE' }
      );
    }
    return parsed.data;
  }
  return parseBoolEnv(env, 'EXTRACT_FROM_OCR') === false ? 'no_vectorization' : 'ocr_direct';
}

function envString(env: Env, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

/**
 * Load configuration from environment variables, then apply overrides.
 * Undefined values fall through to the schema defaults.
 *
 * @throws ConfigurationError when a variable is malformed
 */
export function loadConfig(
  overrides: PipelineConfigOverrides = {},
  env: Env = process.env
): PipelineConfig {
  const ollama = overrides.ollama ?? {};
  const external = overrides.external ?? {};
  const legalization = overrides.legalization ?? {};
  const ocrCache = overrides.ocrCache ?? {};

  const merged = {
    dataDir: overrides.dataDir ?? envString(env, 'DATA_DIR'),
    outputDir: overrides.outputDir ?? envString(env, 'OUTPUT_DIR'),
    mode: overrides.mode ?? resolveMode(env),
    ollama: {
      ...ollama,
      baseUrl: ollama.baseUrl ?? envString(env, 'OLLAMA_BASE_URL'),
      model: ollama.model ?? envString(env, 'OLLAMA_MODEL'),
      embedModel: ollama.embedModel ?? envString(env, 'OLLAMA_EMBED_MODEL'),
      temperature: ollama.temperature ?? parseFloatEnv(env, 'OLLAMA_TEMPERATURE'),
    },
    external: {
      ...external,
      maxAttempts: external.maxAttempts ?? parseIntEnv(env, 'EXTERNAL_MAX_ATTEMPTS'),
      timeoutMs: external.timeoutMs ?? parseIntEnv(env, 'EXTERNAL_TIMEOUT_MS'),
    },
    circuitBreaker: overrides.circuitBreaker ?? {},
    legalization: {
      ...legalization,
      catalogPath: legalization.catalogPath ?? envString(env, 'FACULTADES_CATALOG_PATH'),
    },
    vectorStorePath: overrides.vectorStorePath ?? envString(env, 'VECTOR_STORE_PATH'),
    ocrCache: {
      enabled: ocrCache.enabled ?? parseBoolEnv(env, 'OCR_CACHE'),
      directory: ocrCache.directory ?? envString(env, 'OCR_CACHE_DIR'),
    },
    maxCharsPerDocument: overrides.maxCharsPerDocument ?? parseIntEnv(env, 'MAX_CHARS_DOC'),
  };

  const result = PipelineConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`);
  }
  return result.data;
}
