/**
 * Rule-based document classification
 *
 * Rules are tried in file order; the first rule with at least `min_matches`
 * keyword hits labels the document. Keywords match whole words on
 * accent-folded, lower-cased text. Documents no rule recognises are left for
 * the extraction backend to decide.
 *
 * @module services/classification/keyword-classifier
 */

import { z } from 'zod';
import { CLASSIFICATIONS, type DocumentLabel } from '../../models/document.js';
import type { ExtractionSpec } from '../../pipeline/capabilities.js';
import { foldText } from '../dates/date-extractor.js';
import { resourcePath } from '../../utils/resources.js';
import { readJsonFile } from '../../utils/validation.js';

const LABELS = [...CLASSIFICATIONS, 'otros'] as const;

const RuleSchema = z.object({
  label: z.enum(LABELS),
  description: z.string().default(''),
  min_matches: z.number().int().positive().default(1),
  keywords: z.array(z.string().min(1)).min(1),
});

export const ClassificationRulesSchema = z.object({
  rules: z.array(RuleSchema).min(1),
  modification_keywords: z.array(z.string().min(1)).default([]),
});

export type ClassificationRules = z.infer<typeof ClassificationRulesSchema>;

export const DEFAULT_RULES_PATH = resourcePath('classification-keywords.json');

export function loadClassificationRules(filePath: string = DEFAULT_RULES_PATH): ClassificationRules {
  return readJsonFile(filePath, ClassificationRulesSchema);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Whole-word, accent-insensitive keyword test against already folded text
 */
function containsKeyword(folded: string, keyword: string): boolean {
  const pattern = escapeRegExp(foldText(keyword).trim());
  const start = /^\w/.test(pattern) ? '\\b' : '';
  const end = /\w$/.test(pattern) ? '\\b' : '';
  return new RegExp(`${start}${pattern}${end}`).test(folded);
}

function countMatches(folded: string, keywords: readonly string[]): number {
  return keywords.filter((keyword) => containsKeyword(folded, keyword)).length;
}

export class KeywordClassifier {
  constructor(private readonly rules: ClassificationRules) {}

  /**
   * Label of the first matching rule, or null when none matches
   */
  classify(text: string): DocumentLabel | null {
    const folded = foldText(text);
    for (const rule of this.rules.rules) {
      if (countMatches(folded, rule.keywords) >= rule.min_matches) {
        return rule.label;
      }
    }
    return null;
  }

  /** True when the text uses amendment wording */
  isModification(text: string): boolean {
    return countMatches(foldText(text), this.rules.modification_keywords) > 0;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// MODEL FALLBACK
// ═══════════════════════════════════════════════════════════════════════════════

export const ClassificationAnswerSchema = z.object({
  clasificacion: z.preprocess(
    (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
    z.enum(LABELS).catch('otros')
  ),
});

export const CLASSIFICATION_SPEC: ExtractionSpec<z.infer<typeof ClassificationAnswerSchema>> = {
  name: 'classification',
  instructions: [
    'Clasifica el documento legal chileno en UNA categoría según su contenido, no su nombre de archivo:',
    '- escritura_publica: escrituras de constitución o modificación, extractos, actas protocolizadas, estatutos.',
    '- inscripcion_cbr: inscripciones en el Registro de Comercio, certificados de vigencia, anotaciones marginales.',
    '- publicacion_diario_oficial: publicaciones en el Diario Oficial, aunque contengan extractos de constitución.',
    '- otros: cédulas de identidad y cualquier otro documento.',
  ].join('\n'),
  example: { clasificacion: 'escritura_publica' },
  schema: ClassificationAnswerSchema,
};
