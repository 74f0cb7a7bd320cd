/**
 * Legal powers (facultades) interfaces
 *
 * @module models/legalization
 */

import type { Classification } from './document.js';

export type Confidence = 'alta' | 'media' | 'baja';

/**
 * Catalog entry describing one legal power and how to spot it in text
 */
export interface FacultadDefinition {
  codigo: string;
  nombre: string;
  descripcion: string;
  grupo: string;
  palabras_claves: string[];
  /** Every anchor must appear; alternatives inside one anchor are separated by `|` */
  anclas_obligatorias: string[];
}

/**
 * Where a finding came from
 */
export interface FindingSource {
  documento: string;
  version: number;
  clasificacion: Classification;
}

export interface FacultadHallazgo extends FindingSource {
  codigo: string;
  nombre: string;
  grupo: string;
  actor: string | null;
  limites: string | null;
  evidencia: string;
  confianza: Confidence;
}

export interface RestriccionHallazgo extends FindingSource {
  codigo: string;
  descripcion: string;
}

export interface LegalizationResult {
  /** Filename of the base escritura, null when the company has none */
  documento_base: string | null;
  facultades: FacultadHallazgo[];
  restricciones: RestriccionHallazgo[];
  /** Chunks sent to verification across all documents */
  fragmentos_verificados: number;
}
