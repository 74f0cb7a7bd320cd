/**
 * Catalog of legal powers (facultades)
 *
 * @module services/legalization/catalog
 */

import { z } from 'zod';
import type { FacultadDefinition } from '../../models/legalization.js';
import { resourcePath } from '../../utils/resources.js';
import { readJsonFile } from '../../utils/validation.js';

const FacultadDefinitionSchema = z.object({
  codigo: z.string().trim().min(1),
  nombre: z.string().trim().min(1),
  descripcion: z.string().default(''),
  grupo: z.string().default('General'),
  palabras_claves: z.array(z.string().min(1)).default([]),
  anclas_obligatorias: z.array(z.string().min(1)).min(1),
});

export const FacultadCatalogSchema = z
  .object({ facultades: z.array(FacultadDefinitionSchema).min(1) })
  .refine(
    (catalog) => new Set(catalog.facultades.map((f) => f.codigo)).size === catalog.facultades.length,
    'Facultad codes must be unique'
  );

export const DEFAULT_CATALOG_PATH = resourcePath('facultades-catalog.json');

/**
 * @throws ValidationError when the file is missing required keys or repeats a code
 */
export function loadFacultadCatalog(filePath: string = DEFAULT_CATALOG_PATH): FacultadDefinition[] {
  return readJsonFile(filePath, FacultadCatalogSchema).facultades;
}

/**
 * Retrieval query for a facultad: name, description and keywords
 */
export function catalogQuery(definition: FacultadDefinition): string {
  return [definition.nombre, definition.descripcion, definition.palabras_claves.join(', ')]
    .filter((part) => part.length > 0)
    .join(' ; ');
}
