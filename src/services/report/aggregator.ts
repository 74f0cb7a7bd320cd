/**
 * Report aggregator
 *
 * Resolves every report field to one value with provenance:
 *  - scalar fields: classification priority first (escritura_publica >
 *    inscripcion_cbr > publicacion_diario_oficial), then the highest version
 *    that states the field
 *  - legalization fields: only the base (version 1) escritura_publica
 *  - facultades and restricciones: union over all versions, each entry keeping
 *    its source document
 *
 * A required field nobody states becomes null plus a ReportError; the report is
 * still produced. No timestamps are added, so equal inputs give equal output.
 *
 * @module services/report/aggregator
 */

import {
  CLASSIFICATIONS,
  classificationRank,
  type DocumentLookup,
} from '../../models/document.js';
import type { ComparisonSet } from '../../models/comparison.js';
import type {
  FacultadHallazgo,
  FindingSource,
  LegalizationResult,
  RestriccionHallazgo,
} from '../../models/legalization.js';
import type {
  FieldSource,
  Report,
  ReportSection,
  ResolvedField,
  ScalarSectionName,
} from '../../models/report.js';
import type { VersionedDocument, VersioningResult } from '../../models/versioning.js';
import { ReportError } from '../../pipeline/errors.js';
import { normalizeText, presentValue } from '../comparison/normalize.js';
import { fieldsInSection } from '../extraction/field-catalog.js';

export interface AggregationInput {
  documents: DocumentLookup;
  versioning: VersioningResult;
  comparisons: ComparisonSet;
  legalization: LegalizationResult | null;
}

export interface AggregationResult {
  report: Report;
  errors: ReportError[];
}

const EMPTY: ResolvedField = { value: null, source: null };

function sourceOf(versioned: VersionedDocument): FieldSource {
  return {
    filename: versioned.filename,
    version: versioned.versionNumber,
    classification: versioned.classificationGroup,
  };
}

function valueIn(documents: DocumentLookup, versioned: VersionedDocument, field: string): string | null {
  return presentValue(documents.get(versioned.docIndex).structuredFields?.[field]);
}

/**
 * Scalar resolution: first group in priority order that states the field,
 * highest version within that group
 */
export function resolveField(
  field: string,
  documents: DocumentLookup,
  versioning: VersioningResult
): ResolvedField {
  for (const group of CLASSIFICATIONS) {
    const versions = versioning[group];
    for (let i = versions.length - 1; i >= 0; i--) {
      const value = valueIn(documents, versions[i], field);
      if (value !== null) return { value, source: sourceOf(versions[i]) };
    }
  }
  return EMPTY;
}

/**
 * Legalization facts belong to the constitutive deed and are never amended
 */
export function resolveLegalizationField(
  field: string,
  documents: DocumentLookup,
  versioning: VersioningResult
): ResolvedField {
  const base = versioning.escritura_publica[0];
  if (base === undefined) return EMPTY;
  // Base deed only: a value missing there stays null even if a later escritura states it.
  const value = valueIn(documents, base, field);
  return value === null ? EMPTY : { value, source: sourceOf(base) };
}

function latestChange(comparisons: ComparisonSet): ResolvedField {
  for (const group of CLASSIFICATIONS) {
    const list = comparisons[group];
    const last = list[list.length - 1];
    if (last !== undefined) {
      return {
        value: last.summary,
        source: { filename: last.fileB, version: last.toVersion, classification: group },
      };
    }
  }
  return EMPTY;
}

function compareFindings(a: FindingSource & { codigo: string }, b: FindingSource & { codigo: string }): number {
  return (
    classificationRank(a.clasificacion) - classificationRank(b.clasificacion) ||
    a.version - b.version ||
    (a.codigo < b.codigo ? -1 : a.codigo > b.codigo ? 1 : 0) ||
    (a.documento < b.documento ? -1 : a.documento > b.documento ? 1 : 0)
  );
}

function dedupe<T>(items: readonly T[], key: (item: T) => string): T[] {
  const seen = new Set<string>();
  return items.filter((item) => {
    const k = key(item);
    if (seen.has(k)) return false;
    seen.add(k);
    return true;
  });
}

export function collectFacultades(legalization: LegalizationResult | null): FacultadHallazgo[] {
  if (!legalization) return [];
  return dedupe(legalization.facultades, (f) => JSON.stringify([f.codigo, f.documento])).sort(
    compareFindings
  );
}

export function collectRestricciones(legalization: LegalizationResult | null): RestriccionHallazgo[] {
  if (!legalization) return [];
  return dedupe(legalization.restricciones, (r) =>
    JSON.stringify([normalizeText(r.descripcion), r.documento])
  ).sort(compareFindings);
}

/**
 * Build the seven-section report
 */
export function aggregateReport(input: AggregationInput): AggregationResult {
  const errors: ReportError[] = [];

  const buildSection = (section: ScalarSectionName): ReportSection => {
    const out: ReportSection = {};
    for (const definition of fieldsInSection(section)) {
      const resolved =
        section === 'legalizacion'
          ? resolveLegalizationField(definition.name, input.documents, input.versioning)
          : resolveField(definition.name, input.documents, input.versioning);
      out[definition.name] = resolved;
      if (resolved.value === null && definition.required) {
        errors.push(
          new ReportError(`Required field ${section}.${definition.name} has no value in any document`, {
            section,
            field: definition.name,
          })
        );
      }
    }
    return out;
  };

  const encabezado = buildSection('encabezado');
  encabezado.ultima_modificacion = latestChange(input.comparisons);

  const report: Report = {
    encabezado,
    constitucion: buildSection('constitucion'),
    capital_social: buildSection('capital_social'),
    administracion: buildSection('administracion'),
    legalizacion: buildSection('legalizacion'),
    poderes_personarias: { facultades_encontradas: collectFacultades(input.legalization) },
    restricciones: { restricciones: collectRestricciones(input.legalization) },
  };

  return { report, errors };
}
