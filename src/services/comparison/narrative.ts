/**
 * Change statements and the one-sentence comparison summary
 *
 * @module services/comparison/narrative
 */

import { CHANGE_CATEGORIES, type ChangeCategory, type FieldChange } from '../../models/comparison.js';
import { getFieldDefinition } from '../extraction/field-catalog.js';

/** Spanish name of each category as it appears in summaries */
export const CATEGORY_LABELS: Record<ChangeCategory, string> = {
  ownership: 'propiedad',
  capital: 'capital',
  administration: 'administración',
  identity: 'identidad',
  constitution: 'constitución',
  legalization: 'legalización',
  address: 'domicilio',
  other: 'otros aspectos',
};

/** Categories named explicitly in a summary; the rest are counted */
const MAX_SUMMARY_CATEGORIES = 3;

export function changeStatement(change: FieldChange): string {
  const label = getFieldDefinition(change.field).label;
  if (change.oldValue === null) return `Incorporación de ${label}`;
  if (change.newValue === null) return `Eliminación de ${label}`;
  return `Cambio de ${label}`;
}

function joinSpanish(items: readonly string[]): string {
  if (items.length <= 1) return items.join('');
  return `${items.slice(0, -1).join(', ')} y ${items[items.length - 1]}`;
}

/**
 * Summarise changes between two versions, most significant categories first.
 *
 * @example
 * summarizeChanges([{ field: 'capital_suscrito', category: 'capital', ... }], 1, 2)
 * // 'Cambios en capital (capital suscrito) entre la versión 1 y la versión 2.'
 */
export function summarizeChanges(
  changes: readonly FieldChange[],
  fromVersion: number,
  toVersion: number
): string {
  const between = `entre la versión ${fromVersion} y la versión ${toVersion}`;
  if (changes.length === 0) {
    return `Sin cambios significativos ${between}.`;
  }

  const byCategory = new Map<ChangeCategory, string[]>();
  for (const change of changes) {
    const labels = byCategory.get(change.category) ?? [];
    labels.push(getFieldDefinition(change.field).label);
    byCategory.set(change.category, labels);
  }

  const ranked = CHANGE_CATEGORIES.filter((category) => byCategory.has(category));
  const named = ranked.slice(0, MAX_SUMMARY_CATEGORIES).map((category) => {
    const labels = byCategory.get(category) ?? [];
    return `${CATEGORY_LABELS[category]} (${labels.join(', ')})`;
  });
  const minor = ranked
    .slice(MAX_SUMMARY_CATEGORIES)
    .reduce((sum, category) => sum + (byCategory.get(category)?.length ?? 0), 0);

  const tail =
    minor === 0 ? '' : `, más ${minor} cambio${minor === 1 ? '' : 's'} menor${minor === 1 ? '' : 'es'}`;
  return `Cambios en ${joinSpanish(named)} ${between}${tail}.`;
}
