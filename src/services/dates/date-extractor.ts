/**
 * Date extraction from OCR text
 *
 * Recognises the forms Chilean legal documents use:
 *   15-01-2020, 15/01/2020, 15.01.2020, 2020-01-15
 *   15 de enero de 2020, 1° de marzo del 2021
 *   quince de enero del año dos mil veinte
 *
 * Results are ISO dates (YYYY-MM-DD) in reading order, first occurrence kept.
 * Calendar-invalid dates (31-02-2020) are dropped.
 *
 * @module services/dates/date-extractor
 */

import type { IsoDate } from '../../models/document.js';

const MONTHS: Record<string, number> = {
  enero: 1,
  febrero: 2,
  marzo: 3,
  abril: 4,
  mayo: 5,
  junio: 6,
  julio: 7,
  agosto: 8,
  septiembre: 9,
  setiembre: 9,
  octubre: 10,
  noviembre: 11,
  diciembre: 12,
};

const ONES = ['uno', 'dos', 'tres', 'cuatro', 'cinco', 'seis', 'siete', 'ocho', 'nueve'];

const NUMBER_WORDS = new Map<string, number>([
  ['un', 1],
  ['primero', 1],
  ['diez', 10],
  ['once', 11],
  ['doce', 12],
  ['trece', 13],
  ['catorce', 14],
  ['quince', 15],
  ['dieciseis', 16],
  ['diecisiete', 17],
  ['dieciocho', 18],
  ['diecinueve', 19],
  ['veinte', 20],
  ['veintiun', 21],
  ['treinta', 30],
  ['cuarenta', 40],
  ['cincuenta', 50],
  ['sesenta', 60],
  ['setenta', 70],
  ['ochenta', 80],
  ['noventa', 90],
  ['novecientos', 900],
  ...ONES.map((word, i): [string, number] => [word, i + 1]),
  ...ONES.map((word, i): [string, number] => [`veinti${word}`, 21 + i]),
]);

const MONTH_PATTERN = Object.keys(MONTHS).join('|');

const NUMERIC_DMY = /\b(\d{1,2})[-/.](\d{1,2})[-/.](\d{4})\b/g;
const NUMERIC_YMD = /\b(\d{4})-(\d{1,2})-(\d{1,2})\b/g;
const LONG_FORM = new RegExp(
  `(?:\\b(\\d{1,2})\\s*[°º]?|\\b([a-z]+(?: y [a-z]+)?))\\s+de\\s+(${MONTH_PATTERN})\\s+(?:del?\\s+)?(?:ano\\s+)?(\\d{4}\\b|(?:dos mil|mil novecientos)(?:\\s+[a-z]+){0,4})`,
  'g'
);

/**
 * Lowercase and strip diacritics. All patterns run on the folded copy, so
 * their match positions share one coordinate system.
 */
export function foldText(text: string): string {
  return text
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase();
}

/**
 * Parse a run of Spanish number words ("dos mil veinte", "treinta y uno").
 * Trailing words that are not numbers are ignored; returns null when the
 * run does not start with a number word.
 */
export function parseSpanishNumber(words: string): number | null {
  let total = 0;
  let current = 0;
  let consumed = 0;

  for (const token of words.trim().split(/\s+/)) {
    if (token === 'y' && consumed > 0) continue;
    if (token === 'mil') {
      total += (current || 1) * 1000;
      current = 0;
    } else {
      const value = NUMBER_WORDS.get(token);
      if (value === undefined) break;
      current += value;
    }
    consumed++;
  }

  return consumed === 0 ? null : total + current;
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Build an ISO date, or null when the parts do not form a real calendar date
 */
export function toIsoDate(year: number, month: number, day: number): IsoDate | null {
  if (!Number.isInteger(year) || year < 1900 || year > 2100) return null;
  if (!Number.isInteger(month) || month < 1 || month > 12) return null;
  if (!Number.isInteger(day) || day < 1 || day > daysInMonth(year, month)) return null;
  return `${year}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

interface DateHit {
  position: number;
  date: IsoDate;
}

function collect(folded: string, pattern: RegExp, build: (m: RegExpExecArray) => IsoDate | null): DateHit[] {
  const hits: DateHit[] = [];
  pattern.lastIndex = 0;
  for (let m = pattern.exec(folded); m !== null; m = pattern.exec(folded)) {
    const date = build(m);
    if (date) hits.push({ position: m.index, date });
  }
  return hits;
}

/**
 * Extract every recognisable date in reading order, duplicates removed
 */
export function extractDates(text: string): IsoDate[] {
  const folded = foldText(text);

  const hits = [
    ...collect(folded, NUMERIC_DMY, (m) => toIsoDate(Number(m[3]), Number(m[2]), Number(m[1]))),
    ...collect(folded, NUMERIC_YMD, (m) => toIsoDate(Number(m[1]), Number(m[2]), Number(m[3]))),
    ...collect(folded, LONG_FORM, (m) => {
      const day = m[1] !== undefined ? Number(m[1]) : parseSpanishNumber(m[2] ?? '');
      const year = /^\d{4}$/.test(m[4]) ? Number(m[4]) : parseSpanishNumber(m[4]);
      if (day === null || year === null) return null;
      return toIsoDate(year, MONTHS[m[3]], day);
    }),
  ].sort((a, b) => a.position - b.position);

  const seen = new Set<IsoDate>();
  const dates: IsoDate[] = [];
  for (const hit of hits) {
    if (!seen.has(hit.date)) {
      seen.add(hit.date);
      dates.push(hit.date);
    }
  }
  return dates;
}

/**
 * The date that places a document in its lineage: the first one in reading
 * order, which for notarial deeds is the execution date in the opening line
 */
export function selectPrimaryDate(dates: readonly IsoDate[]): IsoDate | null {
  return dates.length > 0 ? dates[0] : null;
}

/**
 * Parse a single field value that should hold a date
 */
export function parseDateValue(value: string): IsoDate | null {
  return selectPrimaryDate(extractDates(value));
}
