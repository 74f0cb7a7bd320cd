/**
 * Legal text preparation tests
 */

import { describe, it, expect } from 'vitest';
import {
  containsAllAnchors,
  containsAnyKeyword,
  normalizeLegalText,
  splitChunks,
} from '../../../../src/services/legalization/text-chunks.js';

describe('normalizeLegalText', () => {
  it('collapses whitespace and expands banking abbreviations', () => {
    expect(normalizeLegalText('Abrir  ctas. ctes.\n y girar sobre cta. cte. y c/c')).toBe(
      'Abrir cuentas corrientes y girar sobre cuenta corriente y cuenta corriente'
    );
  });
});

describe('splitChunks', () => {
  it('keeps a short text as one chunk', () => {
    expect(splitChunks('  corto  ', 10, 2)).toEqual(['corto']);
  });

  it('returns no chunks for blank text', () => {
    expect(splitChunks(' \n ', 10, 2)).toEqual([]);
  });

  it('slides a window that shares the overlap', () => {
    expect(splitChunks('abcdefghijklmnopqrstuvwxy', 10, 2)).toEqual(['abcdefghij', 'ijklmnopqr', 'qrstuvwxy']);
  });

  it('stops once a window reaches the end', () => {
    expect(splitChunks('abcdefghijklmnopqr', 10, 2)).toEqual(['abcdefghij', 'ijklmnopqr']);
  });
});

describe('containsAllAnchors', () => {
  const anchors = ['cuenta corriente|cuentas corrientes', 'abrir|cerrar'];

  it('needs one alternative of every anchor', () => {
    expect(containsAllAnchors('Podrá ABRIR cuentas corrientes bancarias', anchors)).toBe(true);
    expect(containsAllAnchors('Podrá operar cuentas corrientes', anchors)).toBe(false);
  });

  it('ignores accents', () => {
    expect(containsAllAnchors('otorgar préstamos', ['prestamo'])).toBe(true);
  });
});

describe('containsAnyKeyword', () => {
  it('matches any keyword and accepts an empty list', () => {
    expect(containsAnyKeyword('Girar CHEQUES', ['pagaré', 'cheque'])).toBe(true);
    expect(containsAnyKeyword('Girar letras', ['cheque'])).toBe(false);
    expect(containsAnyKeyword('cualquier texto', [])).toBe(true);
  });
});
