/**
 * Structured field catalog
 *
 * Every field the extraction backend is asked for, with the report section it
 * lands in, how changes to it are categorised, how its values compare, and
 * whether the report must have it.
 *
 * @module services/extraction/field-catalog
 */

import { z } from 'zod';
import type { ChangeCategory } from '../../models/comparison.js';
import type { StructuredFields } from '../../models/document.js';
import type { ScalarSectionName } from '../../models/report.js';
import type { ExtractionSpec } from '../../pipeline/capabilities.js';

/**
 * How two values of a field are compared
 * - text: normalised string equality
 * - monetary: parsed amount, tolerance 0.5
 * - count: parsed integer
 * - date: parsed calendar date
 */
export type FieldKind = 'text' | 'monetary' | 'count' | 'date';

export interface FieldDefinition {
  name: string;
  section: ScalarSectionName;
  /** Lower-case Spanish label used in change statements */
  label: string;
  category: ChangeCategory;
  kind: FieldKind;
  required: boolean;
  /** Instruction for the extraction backend */
  description: string;
}

function field(
  name: string,
  section: ScalarSectionName,
  label: string,
  category: ChangeCategory,
  description: string,
  options: { kind?: FieldKind; required?: boolean } = {}
): FieldDefinition {
  return {
    name,
    section,
    label,
    category,
    description,
    kind: options.kind ?? 'text',
    required: options.required ?? false,
  };
}

export const FIELD_CATALOG: readonly FieldDefinition[] = [
  // encabezado
  field('razon_social', 'encabezado', 'razón social', 'identity', 'Nombre legal completo de la sociedad', {
    required: true,
  }),
  field('rut', 'encabezado', 'RUT', 'identity', 'RUT de la sociedad, formato 76.123.456-7', {
    required: true,
  }),
  field('nombre_fantasia', 'encabezado', 'nombre de fantasía', 'identity', 'Nombre de fantasía, si se indica'),

  // constitucion
  field('razon_social_anterior', 'constitucion', 'razón social anterior', 'identity', 'Razón social previa cuando la escritura la modifica'),
  field('tipo_de_sociedad', 'constitucion', 'tipo de sociedad', 'constitution', 'SpA, Limitada, Anónima, EIRL, etc.', {
    required: true,
  }),
  field('domicilio', 'constitucion', 'domicilio', 'address', 'Domicilio social (comuna y ciudad)', {
    required: true,
  }),
  field('objeto_social', 'constitucion', 'objeto social', 'constitution', 'Resumen breve del objeto social', {
    required: true,
  }),
  field('fecha_constitucion', 'constitucion', 'fecha de constitución', 'constitution', 'Fecha de la escritura de constitución', {
    kind: 'date',
  }),
  field('duracion', 'constitucion', 'duración de la sociedad', 'constitution', 'Plazo de duración o "indefinida"'),
  field('prorroga', 'constitucion', 'prórroga', 'constitution', 'Regla de prórroga automática del plazo'),
  field('fallecimiento_socio', 'constitucion', 'cláusula de fallecimiento', 'ownership', 'Qué ocurre si fallece un socio'),

  // capital_social
  field('capital_suscrito', 'capital_social', 'capital suscrito', 'capital', 'Capital total suscrito, en pesos', {
    kind: 'monetary',
    required: true,
  }),
  field('capital_pagado', 'capital_social', 'capital pagado', 'capital', 'Capital efectivamente pagado, en pesos', {
    kind: 'monetary',
  }),
  field('plazo_para_enterarlo', 'capital_social', 'plazo para enterar el capital', 'capital', 'Plazo para pagar el capital pendiente'),
  field('numero_acciones', 'capital_social', 'número de acciones', 'capital', 'Cantidad total de acciones', {
    kind: 'count',
  }),
  field('socios', 'capital_social', 'socios', 'ownership', 'Socios o accionistas con su participación, separados por ";"'),
  field('responsabilidad_socios', 'capital_social', 'responsabilidad de los socios', 'ownership', 'Límite de responsabilidad de los socios'),
  field('distribucion_utilidades', 'capital_social', 'distribución de utilidades', 'ownership', 'Regla de reparto de utilidades'),
  field('cierre_ejercicio', 'capital_social', 'cierre de ejercicio', 'other', 'Fecha de cierre del ejercicio comercial'),

  // administracion
  field('tipo_administracion', 'administracion', 'tipo de administración', 'administration', 'Directorio, administrador único, socios, etc.', {
    required: true,
  }),
  field('administradores', 'administracion', 'administradores', 'administration', 'Nombres de los administradores o directores, separados por ";"'),
  field('duracion_administracion', 'administracion', 'duración de la administración', 'administration', 'Plazo del mandato de los administradores'),
  field('firmas_requeridas', 'administracion', 'firmas requeridas', 'administration', 'Número de firmas necesarias para obligar a la sociedad', {
    kind: 'count',
  }),
  field('representantes_legales', 'administracion', 'representantes legales', 'administration', 'Nombres de los representantes legales, separados por ";"'),
  field('forma_de_actuar', 'administracion', 'forma de actuar', 'administration', 'Conjunta, separada o indistinta'),

  // legalizacion
  field('tipo_escritura', 'legalizacion', 'tipo de escritura', 'legalization', 'Constitución, modificación, saneamiento, etc.'),
  field('repertorio', 'legalizacion', 'repertorio', 'legalization', 'Número de repertorio de la escritura', {
    required: true,
  }),
  field('notaria', 'legalizacion', 'notaría', 'legalization', 'Nombre del notario o notaría', { required: true }),
  field('ciudad_notaria', 'legalizacion', 'ciudad de la notaría', 'legalization', 'Ciudad de la notaría'),
  field('fecha_notaria', 'legalizacion', 'fecha de la escritura', 'legalization', 'Fecha en que se otorgó la escritura', {
    kind: 'date',
  }),
  field('inscripcion_registro_comercio', 'legalizacion', 'inscripción en el Registro de Comercio', 'legalization', 'Fojas, número y año de inscripción en el CBR'),
  field('fecha_publicacion_diario_oficial', 'legalizacion', 'fecha de publicación en el Diario Oficial', 'legalization', 'Fecha de publicación del extracto', {
    kind: 'date',
  }),
];

const BY_NAME: ReadonlyMap<string, FieldDefinition> = new Map(
  FIELD_CATALOG.map((definition) => [definition.name, definition])
);

/**
 * Definition of a field; fields outside the catalog compare as text under `other`
 */
export function getFieldDefinition(name: string): FieldDefinition {
  return (
    BY_NAME.get(name) ??
    field(name, 'encabezado', name.replace(/_/g, ' '), 'other', '', { required: false })
  );
}

export function fieldsInSection(section: ScalarSectionName): FieldDefinition[] {
  return FIELD_CATALOG.filter((definition) => definition.section === section);
}

/**
 * Ordering used wherever fields are listed: catalog order, then unknown fields
 * alphabetically
 */
export function compareFieldOrder(a: string, b: string): number {
  const ia = FIELD_CATALOG.findIndex((definition) => definition.name === a);
  const ib = FIELD_CATALOG.findIndex((definition) => definition.name === b);
  if (ia !== -1 && ib !== -1) return ia - ib;
  if (ia !== -1) return -1;
  if (ib !== -1) return 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

// ═══════════════════════════════════════════════════════════════════════════════
// EXTRACTION SCHEMA
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Models return numbers for counts and amounts, and "" or "N/A" for missing values
 */
const fieldValueSchema = z
  .union([z.string(), z.number(), z.null()])
  .optional()
  .transform((value): string | null => {
    if (value === undefined || value === null) return null;
    const text = String(value).trim();
    if (text === '' || /^(n\/?a|no (aplica|indica|informa)|null|-)$/i.test(text)) return null;
    return text;
  });

export const StructuredFieldsSchema = z.object(
  Object.fromEntries(FIELD_CATALOG.map((definition) => [definition.name, fieldValueSchema]))
);

export const STRUCTURED_FIELDS_EXAMPLE: Record<string, string | null> = Object.fromEntries(
  FIELD_CATALOG.map((definition) => [definition.name, null])
);

export const STRUCTURED_FIELDS_SPEC: ExtractionSpec<StructuredFields> = {
  name: 'structured_fields',
  instructions: [
    'Extrae los siguientes datos societarios del documento. Usa null cuando el documento no los indique.',
    'Copia montos y fechas tal como aparecen en el texto.',
    ...FIELD_CATALOG.map((definition) => `- ${definition.name}: ${definition.description}`),
  ].join('\n'),
  example: STRUCTURED_FIELDS_EXAMPLE,
  schema: StructuredFieldsSchema,
};
