/**
 * Structured extraction through an Ollama text model
 *
 * The prompt carries the instructions, the expected JSON shape and the
 * document text. The answer is parsed as JSON (fences and surrounding prose
 * tolerated) and validated with the request's zod schema. Anything else is a
 * ParseError, which the call policy retries.
 *
 * @module services/extraction/ollama-extractor
 */

import type { ExtractionSpec, StructuredExtractor } from '../../pipeline/capabilities.js';
import { ParseError } from '../../pipeline/errors.js';
import type { OllamaClient } from '../llm/client.js';

const SYSTEM_PROMPT =
  'Eres un asistente que extrae datos de documentos legales chilenos. ' +
  'Respondes únicamente con JSON válido, sin explicaciones ni bloques de código.';

/**
 * Pull the JSON value out of a model answer
 *
 * @throws ParseError when no JSON object or array can be parsed
 */
export function parseJsonResponse(raw: string): unknown {
  const unfenced = raw.replace(/```(?:json)?/gi, '').trim();
  const candidates = [unfenced];

  const objectStart = unfenced.indexOf('{');
  const objectEnd = unfenced.lastIndexOf('}');
  if (objectStart !== -1 && objectEnd > objectStart) {
    candidates.push(unfenced.slice(objectStart, objectEnd + 1));
  }
  const arrayStart = unfenced.indexOf('[');
  const arrayEnd = unfenced.lastIndexOf(']');
  if (arrayStart !== -1 && arrayEnd > arrayStart) {
    candidates.push(unfenced.slice(arrayStart, arrayEnd + 1));
  }

  for (const candidate of candidates) {
    try {
      return JSON.parse(candidate);
    } catch {
      // next candidate
    }
  }
  throw new ParseError(`Model answer is not JSON: ${raw.slice(0, 120)}`);
}

export function buildPrompt<T>(text: string, spec: ExtractionSpec<T>, maxChars: number): string {
  return [
    spec.instructions,
    '',
    'Formato de respuesta (JSON):',
    JSON.stringify(spec.example, null, 2),
    '',
    'Documento:',
    '"""',
    text.slice(0, maxChars),
    '"""',
  ].join('\n');
}

export class OllamaStructuredExtractor implements StructuredExtractor {
  constructor(
    private readonly client: OllamaClient,
    private readonly maxChars: number
  ) {}

  async extractStructured<T>(text: string, spec: ExtractionSpec<T>, signal: AbortSignal): Promise<T> {
    const response = await this.client.generate(buildPrompt(text, spec, this.maxChars), {
      signal,
      json: true,
      system: SYSTEM_PROMPT,
    });

    const result = spec.schema.safeParse(parseJsonResponse(response.text));
    if (!result.success) {
      const issues = result.error.errors
        .slice(0, 5)
        .map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`);
      throw new ParseError(`${spec.name}: answer does not match schema (${issues.join('; ')})`);
    }
    return result.data;
  }
}
