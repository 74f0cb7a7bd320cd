/**
 * Document arena and ProcessingState tests
 */

import { describe, it, expect } from 'vitest';
import { DocumentArena } from '../../../src/pipeline/arena.js';
import { PipelineError } from '../../../src/pipeline/errors.js';
import {
  createState,
  requireStageOutput,
  toStageResult,
  withStageOutput,
} from '../../../src/pipeline/state.js';

const SOURCES = [
  { filename: 'a.pdf', sourcePath: '/data/acme/a.pdf', rawText: 'uno' },
  { filename: 'b.pdf', sourcePath: '/data/acme/b.pdf', rawText: 'dos' },
];

describe('DocumentArena', () => {
  it('indexes sources in order with empty derived fields', () => {
    const arena = DocumentArena.fromSources(SOURCES);
    expect(arena.size).toBe(2);
    expect(arena.get(1)).toEqual({
      index: 1,
      filename: 'b.pdf',
      sourcePath: '/data/acme/b.pdf',
      rawText: 'dos',
      metadata: null,
      extractedDates: [],
      primaryDate: null,
      classification: null,
      isModification: false,
      structuredFields: null,
    });
  });

  it('returns a new arena on update and leaves the old one untouched', () => {
    const before = DocumentArena.fromSources(SOURCES);
    const after = before.update(0, { primaryDate: '2020-01-15' });

    expect(after.get(0).primaryDate).toBe('2020-01-15');
    expect(before.get(0).primaryDate).toBeNull();
    expect(after.get(1)).toBe(before.get(1));
  });

  it('applies one patch per entry with map', () => {
    const arena = DocumentArena.fromSources(SOURCES).map((entry) => ({ rawText: entry.rawText.toUpperCase() }));
    expect(arena.all().map((entry) => entry.rawText)).toEqual(['UNO', 'DOS']);
  });

  it('throws on an unknown index', () => {
    expect(() => DocumentArena.empty().get(0)).toThrow('No document at arena index 0');
  });
});

describe('ProcessingState', () => {
  const state = createState({ runId: 'r1', companyId: 'acme', folderPath: '/data/acme', mode: 'ocr_direct' });

  it('starts pending with no results', () => {
    expect(state.status).toEqual({ state: 'pending' });
    expect(state.results).toEqual({});
    expect(state.documents.size).toBe(0);
  });

  it('fails loudly when a predecessor output is missing', () => {
    expect(() => requireStageOutput(state, 'versioning')).toThrow(PipelineError);
    expect(() => requireStageOutput(state, 'versioning')).toThrow('Stage "versioning" has no output in this run');
  });

  it('folds outputs without mutating the previous map', () => {
    const output = { documents: [0], totalCharacters: 3, cachedDocuments: [] };
    const results = withStageOutput(state.results, 'ocr', output);

    expect(results.ocr).toBe(output);
    expect(state.results.ocr).toBeUndefined();
    expect(requireStageOutput({ ...state, results }, 'ocr')).toBe(output);
  });

  it('tags stage results by name', () => {
    const results = withStageOutput({}, 'dates', { datedDocuments: 1, undatedDocuments: [] });
    expect(toStageResult(results, 'dates')).toEqual({
      stage: 'dates',
      output: { datedDocuments: 1, undatedDocuments: [] },
    });
    expect(toStageResult(results, 'ocr')).toBeNull();
  });
});
