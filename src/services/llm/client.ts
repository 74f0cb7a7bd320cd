/**
 * Ollama HTTP client
 *
 * Text generation (/api/generate) and embeddings (/api/embed) against a local
 * Ollama server. Every request runs through a circuit breaker shared by all
 * clients in the process, so concurrent company runs stop hammering a server
 * that is down.
 *
 * The client does not retry: callers own the attempt budget and pass an
 * AbortSignal per attempt (see pipeline/external-call).
 *
 * @module services/llm/client
 */

import { z } from 'zod';
import { CircuitBreaker, HttpStatusError, type CircuitBreakerConfig } from './circuit-breaker.js';

export interface OllamaClientConfig {
  baseUrl: string;
  model: string;
  embedModel: string;
  temperature: number;
  maxOutputTokens: number;
  circuitBreaker?: Partial<CircuitBreakerConfig>;
}

export interface GenerateOptions {
  signal?: AbortSignal;
  /** Ask Ollama to constrain output to JSON */
  json?: boolean;
  system?: string;
  temperature?: number;
}

export interface GenerateResponse {
  text: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
  processingTimeMs: number;
}

const GenerateBodySchema = z.object({
  model: z.string().optional(),
  response: z.string().default(''),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

const EmbedBodySchema = z.object({
  embeddings: z.array(z.array(z.number())).default([]),
});

let sharedCircuitBreaker: CircuitBreaker | null = null;

function getSharedCircuitBreaker(config?: Partial<CircuitBreakerConfig>): CircuitBreaker {
  if (!sharedCircuitBreaker) {
    sharedCircuitBreaker = new CircuitBreaker(config);
  }
  return sharedCircuitBreaker;
}

/** Reset shared state (for testing) */
export function resetSharedCircuitBreaker(): void {
  sharedCircuitBreaker = null;
}

export class OllamaClient {
  private readonly circuitBreaker: CircuitBreaker;

  constructor(
    private readonly config: OllamaClientConfig,
    circuitBreaker?: CircuitBreaker
  ) {
    this.circuitBreaker = circuitBreaker ?? getSharedCircuitBreaker(config.circuitBreaker);
  }

  get model(): string {
    return this.config.model;
  }

  get embedModel(): string {
    return this.config.embedModel;
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<GenerateResponse> {
    const startTime = Date.now();
    const body = await this.circuitBreaker.execute(() =>
      this.postJson(
        GenerateBodySchema,
        '/api/generate',
        {
          model: this.config.model,
          prompt,
          system: options.system,
          stream: false,
          format: options.json ? 'json' : undefined,
          options: {
            temperature: options.temperature ?? this.config.temperature,
            num_predict: this.config.maxOutputTokens,
          },
        },
        options.signal
      )
    );

    return {
      text: body.response,
      model: body.model ?? this.config.model,
      inputTokens: body.prompt_eval_count ?? 0,
      outputTokens: body.eval_count ?? 0,
      processingTimeMs: Date.now() - startTime,
    };
  }

  async embed(texts: readonly string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return [];
    const body = await this.circuitBreaker.execute(() =>
      this.postJson(
        EmbedBodySchema,
        '/api/embed',
        { model: this.config.embedModel, input: texts },
        signal
      )
    );
    const embeddings = body.embeddings;
    if (embeddings.length !== texts.length) {
      throw new Error(
        `Ollama returned ${embeddings.length} embeddings for ${texts.length} inputs (model ${this.config.embedModel})`
      );
    }
    return embeddings;
  }

  private async postJson<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    path: string,
    payload: unknown,
    signal?: AbortSignal
  ): Promise<T> {
    const response = await fetch(`${this.config.baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
      signal,
    });

    if (!response.ok) {
      const detail = await response.text().catch(() => '');
      throw new HttpStatusError(
        `Ollama API error ${response.status}: ${response.statusText}. ${detail.slice(0, 200)}`,
        response.status
      );
    }

    const parsed = schema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Unexpected Ollama response from ${path}: ${parsed.error.message}`);
    }
    return parsed.data;
  }
}
