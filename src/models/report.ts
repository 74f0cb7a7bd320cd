/**
 * Consolidated report interfaces
 *
 * Seven fixed sections. Scalar sections map field name -> resolved value with
 * the document and version it came from.
 *
 * @module models/report
 */

import type { Classification } from './document.js';
import type { FacultadHallazgo, RestriccionHallazgo } from './legalization.js';

export type ScalarSectionName =
  | 'encabezado'
  | 'constitucion'
  | 'capital_social'
  | 'administracion'
  | 'legalizacion';

export interface FieldSource {
  filename: string;
  version: number;
  classification: Classification;
}

export interface ResolvedField {
  value: string | null;
  source: FieldSource | null;
}

export type ReportSection = Record<string, ResolvedField>;

export interface Report {
  encabezado: ReportSection;
  constitucion: ReportSection;
  capital_social: ReportSection;
  administracion: ReportSection;
  legalizacion: ReportSection;
  poderes_personarias: { facultades_encontradas: FacultadHallazgo[] };
  restricciones: { restricciones: RestriccionHallazgo[] };
}
