/**
 * Ollama client and structured extractor tests
 *
 * fetch is stubbed per test; nothing leaves the process.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { ParseError } from '../../../../src/pipeline/errors.js';
import { CLASSIFICATION_SPEC } from '../../../../src/services/classification/keyword-classifier.js';
import {
  OllamaStructuredExtractor,
  buildPrompt,
  parseJsonResponse,
} from '../../../../src/services/extraction/ollama-extractor.js';
import { verificationSpec } from '../../../../src/services/legalization/legal-extractor.js';
import {
  CircuitBreaker,
  CircuitBreakerOpenError,
  HttpStatusError,
} from '../../../../src/services/llm/circuit-breaker.js';
import {
  OllamaClient,
  resetSharedCircuitBreaker,
  type OllamaClientConfig,
} from '../../../../src/services/llm/client.js';
import { OllamaEmbedder } from '../../../../src/services/vector/ollama-embedder.js';

const CONFIG: OllamaClientConfig = {
  baseUrl: 'http://ollama.test',
  model: 'test-model',
  embedModel: 'test-embed',
  temperature: 0.1,
  maxOutputTokens: 512,
};

function stubFetch(respond: (body: unknown) => Response) {
  const fetchMock = vi.fn(async (_url: string, init?: RequestInit) => {
    const body: unknown = JSON.parse(String(init?.body ?? '{}'));
    return respond(body);
  });
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function inputsOf(body: unknown): unknown[] {
  if (typeof body === 'object' && body !== null && 'input' in body && Array.isArray(body.input)) {
    return body.input;
  }
  return [];
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function client(): OllamaClient {
  return new OllamaClient(CONFIG, new CircuitBreaker());
}

afterEach(() => {
  vi.unstubAllGlobals();
  resetSharedCircuitBreaker();
});

// ═══════════════════════════════════════════════════════════════════════════════
// CLIENT
// ═══════════════════════════════════════════════════════════════════════════════

describe('OllamaClient', () => {
  it('posts a non-streaming JSON generate request', async () => {
    const fetchMock = stubFetch(() => json({ model: 'test-model', response: '{"ok":true}', prompt_eval_count: 12, eval_count: 3 }));
    const response = await client().generate('hola', { json: true, system: 'sys' });

    expect(response).toMatchObject({ text: '{"ok":true}', model: 'test-model', inputTokens: 12, outputTokens: 3 });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0][0]).toBe('http://ollama.test/api/generate');
    const sent: unknown = JSON.parse(String(fetchMock.mock.calls[0][1]?.body));
    expect(sent).toEqual({
      model: 'test-model',
      prompt: 'hola',
      system: 'sys',
      stream: false,
      format: 'json',
      options: { temperature: 0.1, num_predict: 512 },
    });
  });

  it('raises HttpStatusError on a non-2xx answer', async () => {
    stubFetch(() => new Response('model not found', { status: 404, statusText: 'Not Found' }));
    const request = client().generate('hola');
    await expect(request).rejects.toBeInstanceOf(HttpStatusError);
    await expect(request).rejects.toThrow('Ollama API error 404: Not Found. model not found');
  });

  it('embeds a batch and checks the count', async () => {
    stubFetch((body) => json({ embeddings: inputsOf(body).map((_, i) => [i, 1]) }));
    expect(await client().embed(['a', 'b'])).toEqual([
      [0, 1],
      [1, 1],
    ]);
  });

  it('rejects a short embedding answer', async () => {
    stubFetch(() => json({ embeddings: [[1, 0]] }));
    await expect(client().embed(['a', 'b'])).rejects.toThrow('Ollama returned 1 embeddings for 2 inputs');
  });

  it('skips the request for no texts', async () => {
    const fetchMock = stubFetch(() => json({}));
    expect(await client().embed([])).toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe('shared circuit breaker', () => {
  it('is shared by clients built without their own breaker', async () => {
    stubFetch(() => new Response('down', { status: 503, statusText: 'Service Unavailable' }));
    const config: OllamaClientConfig = { ...CONFIG, circuitBreaker: { failureThreshold: 1 } };

    await expect(new OllamaClient(config).generate('hola')).rejects.toBeInstanceOf(HttpStatusError);
    await expect(new OllamaClient(config).generate('hola')).rejects.toBeInstanceOf(CircuitBreakerOpenError);
  });
});

describe('OllamaEmbedder', () => {
  it('splits large inputs into batches of 32', async () => {
    const fetchMock = stubFetch((body) => json({ embeddings: inputsOf(body).map(() => [1]) }));
    const embedder = new OllamaEmbedder(client());
    const texts = Array.from({ length: 40 }, (_, i) => `t${i}`);

    expect(await embedder.embed(texts, new AbortController().signal)).toHaveLength(40);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(embedder.model).toBe('test-embed');
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// STRUCTURED EXTRACTION
// ═══════════════════════════════════════════════════════════════════════════════

describe('parseJsonResponse', () => {
  it('reads fenced and embedded JSON', () => {
    expect(parseJsonResponse('```json\n{"a": 1}\n```')).toEqual({ a: 1 });
    expect(parseJsonResponse('Respuesta: {"a": 1} fin')).toEqual({ a: 1 });
    expect(parseJsonResponse('[1, 2]')).toEqual([1, 2]);
  });

  it('throws ParseError when nothing parses', () => {
    expect(() => parseJsonResponse('no hay datos')).toThrow(ParseError);
  });
});

describe('buildPrompt', () => {
  it('truncates the document text', () => {
    const prompt = buildPrompt('abcdef', CLASSIFICATION_SPEC, 3);
    expect(prompt.startsWith(CLASSIFICATION_SPEC.instructions)).toBe(true);
    expect(prompt.endsWith('"""\nabc\n"""')).toBe(true);
  });
});

describe('OllamaStructuredExtractor', () => {
  const signal = new AbortController().signal;

  it('validates the answer against the request schema', async () => {
    stubFetch(() => json({ response: '{"clasificacion": "Inscripcion_CBR"}' }));
    const extractor = new OllamaStructuredExtractor(client(), 1000);
    expect(await extractor.extractStructured('texto', CLASSIFICATION_SPEC, signal)).toEqual({
      clasificacion: 'inscripcion_cbr',
    });
  });

  it('throws ParseError for an answer of the wrong shape', async () => {
    stubFetch(() => json({ response: '{"otorgado": "tal vez"}' }));
    const extractor = new OllamaStructuredExtractor(client(), 1000);
    const spec = verificationSpec({
      codigo: 'F02',
      nombre: 'Girar cheques',
      descripcion: '',
      grupo: 'General',
      palabras_claves: [],
      anclas_obligatorias: ['cheque'],
    });

    const request = extractor.extractStructured('texto', spec, signal);
    await expect(request).rejects.toBeInstanceOf(ParseError);
    await expect(request).rejects.toThrow(/^facultad_F02: answer does not match schema/);
  });
});
