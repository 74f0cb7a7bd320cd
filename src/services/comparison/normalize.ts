/**
 * Value normalisation for field comparison
 *
 * Two values are equal when they normalise to the same thing for the field's
 * kind. Values that cannot be parsed for their kind fall back to text equality.
 *
 * @module services/comparison/normalize
 */

import type { FieldKind } from '../extraction/field-catalog.js';
import { parseDateValue } from '../dates/date-extractor.js';

/** Absolute tolerance for monetary amounts, in pesos */
export const MONETARY_TOLERANCE = 0.5;

/**
 * NFC, trimmed, internal whitespace collapsed, lower-cased
 */
export function normalizeText(value: string): string {
  return value.normalize('NFC').trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Parse a Chilean-formatted amount: `$ 1.000.000`, `1.000.000,50 pesos`,
 * `CLP 2500000`, `$1.000.000.-`, `$10.000.000 (diez millones de pesos)`.
 * Dots group thousands and the comma is the decimal mark. A single dot
 * followed by one or two digits is read as a decimal point.
 */
export function parseChileanAmount(value: string): number | null {
  const cleaned = value
    .replace(/\([^)]*\)/g, '')
    .replace(/clp|pesos?|\bde\b|\$/gi, '')
    .replace(/\s+/g, '')
    .replace(/\.?-$/, '');
  if (!/^-?[\d.,]+$/.test(cleaned) || !/\d/.test(cleaned)) return null;

  let canonical: string;
  if (cleaned.includes(',')) {
    const parts = cleaned.split(',');
    if (parts.length !== 2) return null;
    canonical = `${parts[0].replace(/\./g, '')}.${parts[1]}`;
  } else if (/^-?\d{1,3}(\.\d{3})+$/.test(cleaned)) {
    canonical = cleaned.replace(/\./g, '');
  } else if (/^-?\d+(\.\d{1,2})?$/.test(cleaned)) {
    canonical = cleaned;
  } else {
    return null;
  }

  const parsed = Number(canonical);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Leading integer of a count value ("3 firmas", "10.000 acciones")
 */
export function parseCount(value: string): number | null {
  const match = /^\s*(\d{1,3}(?:\.\d{3})+|\d+)\b/.exec(value);
  return match ? Number(match[1].replace(/\./g, '')) : null;
}

function kindEqual(kind: FieldKind, a: string, b: string): boolean | null {
  switch (kind) {
    case 'monetary': {
      const x = parseChileanAmount(a);
      const y = parseChileanAmount(b);
      return x !== null && y !== null ? Math.abs(x - y) <= MONETARY_TOLERANCE : null;
    }
    case 'count': {
      const x = parseCount(a);
      const y = parseCount(b);
      return x !== null && y !== null ? x === y : null;
    }
    case 'date': {
      const x = parseDateValue(a);
      const y = parseDateValue(b);
      return x !== null && y !== null ? x === y : null;
    }
    case 'text':
      return null;
  }
}

/**
 * Normalised equality of two field values; null only equals null
 */
export function valuesEqual(kind: FieldKind, a: string | null, b: string | null): boolean {
  if (a === null || b === null) return a === b;
  return kindEqual(kind, a, b) ?? normalizeText(a) === normalizeText(b);
}

/**
 * Treat blank strings as absent
 */
export function presentValue(value: string | null | undefined): string | null {
  if (value === undefined || value === null) return null;
  return value.trim() === '' ? null : value;
}
