/**
 * Stage output -> persisted JSON
 *
 * Snapshot files keep the Spanish key names downstream consumers read.
 *
 * @module pipeline/snapshots
 */

import { byClassification } from '../models/document.js';
import { MODE_LABELS, type StageName, type StageResult } from '../models/pipeline.js';
import type { DocumentArena } from './arena.js';

export interface SnapshotFile {
  /** File name without the company prefix, e.g. `ocr_results` */
  name: string;
  data: unknown;
}

const SNAPSHOT_NAMES: Record<StageName, string> = {
  ocr: 'ocr_results',
  dates: 'date_results',
  classification: 'classification_results',
  vectorization: 'vectorization_results',
  versioning: 'versioning_results',
  comparison: 'comparison_results',
  legalization: 'legalization_results',
  report: 'report_results',
};

export const EXTRACTION_SNAPSHOT = 'extraction_results';
export const MANIFEST_SNAPSHOT = 'pipeline_status';

export function snapshotFilename(company: string, name: string): string {
  return `${company}_${name}.json`;
}

export function stageSnapshotName(stage: StageName): string {
  return SNAPSHOT_NAMES[stage];
}

/**
 * Files written when `result`'s stage completes; the primary snapshot comes first
 */
export function renderSnapshots(result: StageResult, documents: DocumentArena): SnapshotFile[] {
  const name = SNAPSHOT_NAMES[result.stage];

  switch (result.stage) {
    case 'ocr':
      return [
        {
          name,
          data: result.output.documents.map((index) => {
            const doc = documents.get(index);
            return {
              filename: doc.filename,
              path: doc.sourcePath,
              hash: doc.metadata?.contentHash ?? null,
              tamano_bytes: doc.metadata?.byteSize ?? null,
              num_paginas: doc.metadata?.pageCount ?? null,
              desde_cache: doc.metadata?.fromCache ?? false,
              text: doc.rawText,
            };
          }),
        },
      ];

    case 'dates':
      return [
        {
          name,
          data: documents.all().map((doc) => ({ filename: doc.filename, fechas: doc.extractedDates })),
        },
      ];

    case 'classification': {
      const entries = result.output.labels.map((label) => ({ label, doc: documents.get(label.docIndex) }));
      return [
        {
          name,
          data: entries.map(({ label, doc }) => ({
            filename: doc.filename,
            fecha: doc.primaryDate,
            clasificacion: label.label,
          })),
        },
        {
          name: EXTRACTION_SNAPSHOT,
          data: entries.map(({ label, doc }) => ({
            filename: doc.filename,
            clasificacion: label.label,
            metodo: label.method,
            es_modificacion: label.isModification,
            campos: doc.structuredFields,
          })),
        },
      ];
    }

    case 'vectorization':
      return [
        {
          name,
          data: {
            collection: result.output.collection,
            documentos_procesados: result.output.documentsProcessed,
            total_chunks: result.output.totalChunks,
            modo: MODE_LABELS[result.output.mode],
            mensaje: result.output.message,
          },
        },
      ];

    case 'versioning': {
      const versioning = result.output;
      return [
        {
          name,
          data: byClassification((group) =>
            versioning[group].map((v) => ({
              filename: v.filename,
              fecha: v.primaryDate,
              version: v.versionNumber,
              clasificacion: v.classificationGroup,
            }))
          ),
        },
      ];
    }

    case 'comparison': {
      const { comparisons } = result.output;
      return [
        {
          name,
          data: byClassification((group) =>
            comparisons[group].map((c) => ({
              de: c.fromVersion,
              a: c.toVersion,
              archivo_v1: c.fileA,
              archivo_vn: c.fileB,
              fecha_v1: c.dateA,
              fecha_vn: c.dateB,
              cambios: c.narrative,
              resumen: c.summary,
              detalle: c.changes.map((change) => ({
                campo: change.field,
                valor_anterior: change.oldValue,
                valor_nuevo: change.newValue,
                categoria: change.category,
              })),
              similitud_texto: c.textSimilarity.similarityRatio,
            }))
          ),
        },
      ];
    }

    case 'legalization':
      return [{ name, data: result.output }];

    case 'report':
      return [{ name, data: result.output.report }];
  }
}
