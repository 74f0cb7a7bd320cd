/**
 * PipelineController integration tests
 *
 * Full runs over a temp data folder with in-process OCR, extraction and
 * embedding stand-ins. Snapshots are read back from the results directory.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import type { StructuredFields } from '../../../src/models/document.js';
import type { FacultadDefinition } from '../../../src/models/legalization.js';
import type { Capabilities } from '../../../src/pipeline/capabilities.js';
import type { PipelineConfigOverrides } from '../../../src/pipeline/config.js';
import { PipelineController, formatRunSummary } from '../../../src/pipeline/controller.js';
import { InputError, getRecoveryHint } from '../../../src/pipeline/errors.js';
import { SKIPPED_VECTORIZATION_MESSAGE } from '../../../src/pipeline/stages/vectorization.js';
import { loadFacultadCatalog } from '../../../src/services/legalization/catalog.js';
import { SqliteVectorStore } from '../../../src/services/vector/sqlite-store.js';
import { computeHash } from '../../../src/utils/hash.js';
import {
  FakeExtractor,
  FakeOcr,
  KeywordEmbedder,
  createTempDir,
  testConfig,
  writeCompanyFolder,
  type FakeAnswer,
} from '../../helpers/fakes.js';

// ═══════════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════════

const COMPANY = 'acme';

const TEXTS: Record<string, string> = {
  'a_constitucion.pdf':
    'En Santiago, a 15 de marzo de 2020, ANTE MÍ, notario, comparecen los socios. La sociedad podrá abrir cuentas corrientes bancarias.',
  'b_modificacion.pdf':
    'En Santiago, a 10 de junio de 2022, ANTE MÍ comparecen los socios y acuerdan la modificación de la sociedad: aumento de capital.',
  'c_inscripcion.pdf':
    'Inscrita a fojas 100 número 50 del Registro de Comercio de Santiago el 20 de marzo de 2020.',
  'd_cedula.pdf': 'CÉDULA DE IDENTIDAD de Juan Pérez',
  'e_extracto.pdf': 'Extracto publicado el 5 de mayo de 2020.',
};

const FILENAMES = Object.keys(TEXTS);

const BASE_FIELDS: StructuredFields = {
  razon_social: 'Comercial Andes SpA',
  rut: '76.123.456-7',
  tipo_de_sociedad: 'SpA',
  domicilio: 'Santiago',
  objeto_social: 'Comercio',
  capital_suscrito: '$1.000.000',
  tipo_administracion: 'Administrador único',
  repertorio: '1234-2020',
  notaria: 'Notaría Pérez',
};

const CUENTAS: FacultadDefinition[] = loadFacultadCatalog().filter((f) => f.codigo === 'F01');

/**
 * Extraction answers keyed on document text and request name
 */
function answers(fields: StructuredFields = BASE_FIELDS): FakeAnswer {
  return (text, specName) => {
    if (specName === 'classification') return { clasificacion: 'publicacion_diario_oficial' };
    if (specName === 'structured_fields') {
      if (text.includes('aumento de capital')) return { ...fields, capital_suscrito: '$5.000.000' };
      if (text.includes('fojas')) return { razon_social: 'Comercial Andes SpA' };
      if (text.includes('Extracto')) return {};
      return fields;
    }
    if (specName === 'facultad_F01') {
      return {
        otorgado: true,
        actor: 'el administrador',
        confianza: 'alta',
        evidencia: 'podrá abrir cuentas corrientes',
      };
    }
    return undefined;
  };
}

describe('PipelineController', () => {
  let root: string;

  beforeEach(() => {
    root = createTempDir();
    writeCompanyFolder(join(root, 'data'), COMPANY, FILENAMES);
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  function controller(capabilities: Capabilities, overrides: PipelineConfigOverrides = {}): PipelineController {
    return new PipelineController({ config: testConfig(root, overrides), capabilities, catalog: CUENTAS });
  }

  function readSnapshot(name: string): unknown {
    return JSON.parse(readFileSync(join(root, 'results', `${COMPANY}_${name}.json`), 'utf-8'));
  }

  function snapshotExists(name: string): boolean {
    return existsSync(join(root, 'results', `${COMPANY}_${name}.json`));
  }

  // ═════════════════════════════════════════════════════════════════════════════
  // FULL RUN
  // ═════════════════════════════════════════════════════════════════════════════

  describe('full run', () => {
    it('completes and writes every snapshot', async () => {
      const extractor = new FakeExtractor(answers());
      const pipeline = controller({ ocr: new FakeOcr(TEXTS), extractor });

      const outcome = await pipeline.run(COMPANY);
      expect(outcome.ok).toBe(true);

      for (const name of [
        'ocr_results',
        'date_results',
        'classification_results',
        'extraction_results',
        'vectorization_results',
        'versioning_results',
        'comparison_results',
        'legalization_results',
        'report_results',
        'pipeline_status',
      ]) {
        expect(snapshotExists(name)).toBe(true);
      }

      expect(extractor.callsFor('classification')).toBe(1);
      expect(extractor.callsFor('structured_fields')).toBe(4);
      expect(extractor.callsFor('facultad_F01')).toBe(1);
    });

    it('versions each group by primary date', async () => {
      await controller({ ocr: new FakeOcr(TEXTS), extractor: new FakeExtractor(answers()) }).run(COMPANY);

      expect(readSnapshot('versioning_results')).toEqual({
        escritura_publica: [
          { filename: 'a_constitucion.pdf', fecha: '2020-03-15', version: 1, clasificacion: 'escritura_publica' },
          { filename: 'b_modificacion.pdf', fecha: '2022-06-10', version: 2, clasificacion: 'escritura_publica' },
        ],
        inscripcion_cbr: [
          { filename: 'c_inscripcion.pdf', fecha: '2020-03-20', version: 1, clasificacion: 'inscripcion_cbr' },
        ],
        publicacion_diario_oficial: [
          {
            filename: 'e_extracto.pdf',
            fecha: '2020-05-05',
            version: 1,
            clasificacion: 'publicacion_diario_oficial',
          },
        ],
      });
      expect(readSnapshot('date_results')).toEqual([
        { filename: 'a_constitucion.pdf', fechas: ['2020-03-15'] },
        { filename: 'b_modificacion.pdf', fechas: ['2022-06-10'] },
        { filename: 'c_inscripcion.pdf', fechas: ['2020-03-20'] },
        { filename: 'd_cedula.pdf', fechas: [] },
        { filename: 'e_extracto.pdf', fechas: ['2020-05-05'] },
      ]);
    });

    it('records classification method and amendment flag', async () => {
      await controller({ ocr: new FakeOcr(TEXTS), extractor: new FakeExtractor(answers()) }).run(COMPANY);

      expect(readSnapshot('classification_results')).toEqual([
        { filename: 'a_constitucion.pdf', fecha: '2020-03-15', clasificacion: 'escritura_publica' },
        { filename: 'b_modificacion.pdf', fecha: '2022-06-10', clasificacion: 'escritura_publica' },
        { filename: 'c_inscripcion.pdf', fecha: '2020-03-20', clasificacion: 'inscripcion_cbr' },
        { filename: 'd_cedula.pdf', fecha: null, clasificacion: 'otros' },
        { filename: 'e_extracto.pdf', fecha: '2020-05-05', clasificacion: 'publicacion_diario_oficial' },
      ]);

      const extraction = readSnapshot('extraction_results');
      expect(extraction).toMatchObject([
        { filename: 'a_constitucion.pdf', metodo: 'keywords', es_modificacion: false },
        { filename: 'b_modificacion.pdf', metodo: 'keywords', es_modificacion: true },
        { filename: 'c_inscripcion.pdf', metodo: 'keywords', es_modificacion: false },
        { filename: 'd_cedula.pdf', metodo: 'keywords', es_modificacion: false, campos: null },
        { filename: 'e_extracto.pdf', metodo: 'model', es_modificacion: false },
      ]);
    });

    it('compares consecutive versions', async () => {
      await controller({ ocr: new FakeOcr(TEXTS), extractor: new FakeExtractor(answers()) }).run(COMPANY);

      const comparison = readSnapshot('comparison_results');
      expect(comparison).toMatchObject({
        escritura_publica: [
          {
            de: 1,
            a: 2,
            archivo_v1: 'a_constitucion.pdf',
            archivo_vn: 'b_modificacion.pdf',
            fecha_v1: '2020-03-15',
            fecha_vn: '2022-06-10',
            cambios: ['Cambio de capital suscrito'],
            resumen: 'Cambios en capital (capital suscrito) entre la versión 1 y la versión 2.',
            detalle: [
              {
                campo: 'capital_suscrito',
                valor_anterior: '$1.000.000',
                valor_nuevo: '$5.000.000',
                categoria: 'capital',
              },
            ],
          },
        ],
        inscripcion_cbr: [],
        publicacion_diario_oficial: [],
      });
    });

    it('resolves report fields with their sources', async () => {
      const outcome = await controller({
        ocr: new FakeOcr(TEXTS),
        extractor: new FakeExtractor(answers()),
      }).run(COMPANY);
      if (!outcome.ok) throw new Error(`run failed: ${outcome.failure.message}`);

      const { report } = outcome;
      expect(report.encabezado.razon_social).toEqual({
        value: 'Comercial Andes SpA',
        source: { filename: 'b_modificacion.pdf', version: 2, classification: 'escritura_publica' },
      });
      expect(report.capital_social.capital_suscrito.value).toBe('$5.000.000');
      expect(report.legalizacion.repertorio).toEqual({
        value: '1234-2020',
        source: { filename: 'a_constitucion.pdf', version: 1, classification: 'escritura_publica' },
      });
      expect(report.encabezado.ultima_modificacion).toEqual({
        value: 'Cambios en capital (capital suscrito) entre la versión 1 y la versión 2.',
        source: { filename: 'b_modificacion.pdf', version: 2, classification: 'escritura_publica' },
      });
      expect(report.poderes_personarias.facultades_encontradas).toMatchObject([
        {
          documento: 'a_constitucion.pdf',
          version: 1,
          clasificacion: 'escritura_publica',
          codigo: 'F01',
          actor: 'el administrador',
          evidencia: 'podrá abrir cuentas corrientes',
          confianza: 'alta',
        },
      ]);
      expect(readSnapshot('report_results')).toEqual(JSON.parse(JSON.stringify(report)));
    });

    it('writes a completed manifest with the run warnings', async () => {
      const pipeline = controller({ ocr: new FakeOcr(TEXTS), extractor: new FakeExtractor(answers()) });
      await pipeline.run(COMPANY);

      const manifest = pipeline.readRunManifest(COMPANY);
      expect(manifest?.status).toEqual({ state: 'completed' });
      expect(manifest?.failure).toBeNull();
      expect(manifest?.stages.map((s) => [s.stage, s.outcome])).toEqual([
        ['ocr', 'completed'],
        ['dates', 'completed'],
        ['classification', 'completed'],
        ['vectorization', 'skipped'],
        ['versioning', 'completed'],
        ['comparison', 'completed'],
        ['legalization', 'completed'],
        ['report', 'completed'],
      ]);
      expect(manifest?.stages[2].snapshot).toBe('acme_classification_results.json');
      expect(manifest?.warnings).toEqual([
        {
          stage: 'dates',
          category: 'VERSIONING_ERROR',
          message: 'No date recognised in d_cedula.pdf',
          document: 'd_cedula.pdf',
        },
        {
          stage: 'classification',
          category: 'VALIDATION_ERROR',
          message: 'd_cedula.pdf is not a versioned document type and is left out of versioning',
          document: 'd_cedula.pdf',
        },
      ]);
    });

    it('summarises the run', async () => {
      const outcome = await controller({
        ocr: new FakeOcr(TEXTS),
        extractor: new FakeExtractor(answers()),
      }).run(COMPANY);

      expect(formatRunSummary(outcome)).toEqual([
        `Empresa: acme (ejecución ${outcome.state.runId})`,
        '  Documentos procesados: 5',
        '  Documentos versionados: 4',
        '  Comparaciones: 1',
        '  Facultades encontradas: 1',
        '  Advertencias: 2',
        '  Estado: completado',
      ]);
    });
  });

  // ═════════════════════════════════════════════════════════════════════════════
  // MODES
  // ═════════════════════════════════════════════════════════════════════════════

  describe('modes', () => {
    it('writes the skipped placeholder outside vectorized mode', async () => {
      for (const mode of ['ocr_direct', 'no_vectorization'] as const) {
        await controller({ ocr: new FakeOcr(TEXTS), extractor: new FakeExtractor(answers()) }, { mode }).run(
          COMPANY
        );
        expect(readSnapshot('vectorization_results')).toEqual({
          collection: 'legal_acme',
          documentos_procesados: 0,
          total_chunks: 0,
          modo: mode === 'ocr_direct' ? 'OCR_DIRECTO' : 'SIN_VECTORIZACION',
          mensaje: SKIPPED_VECTORIZATION_MESSAGE,
        });
      }
    });

    it('stores chunks once and retrieves fragments from the vector store', async () => {
      const store = SqliteVectorStore.open(':memory:');
      const embedder = new KeywordEmbedder(['cuenta', 'abrir', 'capital']);
      const capabilities: Capabilities = {
        ocr: new FakeOcr(TEXTS),
        extractor: new FakeExtractor(answers()),
        embedder,
        vectorStore: store,
      };

      try {
        const first = await controller(capabilities, { mode: 'vectorized' }).run(COMPANY);
        expect(first.ok).toBe(true);
        expect(readSnapshot('vectorization_results')).toEqual({
          collection: 'legal_acme',
          documentos_procesados: 4,
          total_chunks: 4,
          modo: 'VECTORIZADO',
          mensaje: '4 fragmento(s) nuevo(s) almacenado(s) en legal_acme (VECTORIZADO)',
        });
        // four documents plus one catalog query
        expect(embedder.embedCalls).toBe(5);
        expect(first.state.results.legalization?.facultades.map((f) => f.documento)).toEqual([
          'a_constitucion.pdf',
        ]);

        await controller(capabilities, { mode: 'vectorized' }).run(COMPANY);
        expect(store.count('legal_acme')).toBe(4);
        expect(readSnapshot('vectorization_results')).toMatchObject({
          mensaje: '0 fragmento(s) nuevo(s) almacenado(s) en legal_acme (VECTORIZADO)',
        });
      } finally {
        store.close();
      }
    });

    it('fails vectorized mode without an embedder', async () => {
      const outcome = await controller(
        { ocr: new FakeOcr(TEXTS), extractor: new FakeExtractor(answers()) },
        { mode: 'vectorized' }
      ).run(COMPANY);

      expect(outcome.ok).toBe(false);
      if (outcome.ok) return;
      expect(outcome.failure).toMatchObject({ stage: 'vectorization', category: 'CONFIGURATION_ERROR' });
      expect(snapshotExists('classification_results')).toBe(true);
      expect(snapshotExists('versioning_results')).toBe(false);
    });
  });

  // ═════════════════════════════════════════════════════════════════════════════
  // FAILURES
  // ═════════════════════════════════════════════════════════════════════════════

  describe('failures', () => {
    it('aborts on an OCR failure and records it in the manifest', async () => {
      const ocr = new FakeOcr({ ...TEXTS, 'b_modificacion.pdf': new Error('scanner offline') });
      const pipeline = controller({ ocr, extractor: new FakeExtractor(answers()) });

      const outcome = await pipeline.run(COMPANY);
      expect(outcome.ok).toBe(false);
      if (outcome.ok) return;

      const message = 'ocr failed after 2 attempt(s): scanner offline';
      expect(outcome.failure).toEqual({
        stage: 'ocr',
        category: 'EXTERNAL_SERVICE_ERROR',
        message,
        document: 'b_modificacion.pdf',
        hint: getRecoveryHint('EXTERNAL_SERVICE_ERROR'),
      });
      expect(ocr.calls).toEqual(['a_constitucion.pdf', 'b_modificacion.pdf', 'b_modificacion.pdf']);
      expect(snapshotExists('ocr_results')).toBe(false);

      const manifest = pipeline.readRunManifest(COMPANY);
      expect(manifest?.status).toEqual({ state: 'failed', stage: 'ocr', reason: message });
      expect(manifest?.stages.map((s) => [s.stage, s.outcome, s.snapshot])).toEqual([['ocr', 'failed', null]]);
      expect(manifest?.failure?.document).toBe('b_modificacion.pdf');
    });

    it('keeps snapshots of the stages that finished before the failure', async () => {
      const extractor = new FakeExtractor((text, specName) => {
        if (specName === 'structured_fields') throw new Error('model offline');
        return answers()(text, specName);
      });
      const outcome = await controller({ ocr: new FakeOcr(TEXTS), extractor }).run(COMPANY);

      expect(outcome.ok).toBe(false);
      if (outcome.ok) return;
      expect(outcome.failure).toMatchObject({
        stage: 'classification',
        category: 'EXTERNAL_SERVICE_ERROR',
        message: 'structured_fields failed after 2 attempt(s): model offline',
        document: 'a_constitucion.pdf',
      });
      expect(snapshotExists('ocr_results')).toBe(true);
      expect(snapshotExists('date_results')).toBe(true);
      expect(snapshotExists('classification_results')).toBe(false);
      expect(formatRunSummary(outcome).slice(-4)).toEqual([
        '  Estado: falló en la etapa classification (EXTERNAL_SERVICE_ERROR)',
        '  Documento: a_constitucion.pdf',
        '  Error: structured_fields failed after 2 attempt(s): model offline',
        `  Sugerencia: ${getRecoveryHint('EXTERNAL_SERVICE_ERROR')}`,
      ]);
    });

    it('fails with an input error when the company folder is missing', async () => {
      const outcome = await controller({ ocr: new FakeOcr(TEXTS), extractor: new FakeExtractor(answers()) }).run(
        'ghost'
      );
      expect(outcome.ok).toBe(false);
      if (outcome.ok) return;
      expect(outcome.failure.category).toBe('INPUT_ERROR');
      expect(outcome.failure.message).toBe(`Company folder not found: ${join(root, 'data', 'ghost')}`);
    });

    it('rejects a company name that is not a plain folder name', async () => {
      const pipeline = controller({ ocr: new FakeOcr(TEXTS), extractor: new FakeExtractor(answers()) });
      await expect(pipeline.run('../acme')).rejects.toBeInstanceOf(InputError);
      expect(() => pipeline.readRunManifest('../acme')).toThrow(InputError);
    });

    it('reads the manifest under the trimmed company name', async () => {
      const pipeline = controller({ ocr: new FakeOcr(TEXTS), extractor: new FakeExtractor(answers()) });
      await pipeline.run(COMPANY);
      expect(pipeline.readRunManifest(` ${COMPANY} `)?.company).toBe(COMPANY);
    });
  });

  // ═════════════════════════════════════════════════════════════════════════════
  // OCR CACHE
  // ═════════════════════════════════════════════════════════════════════════════

  describe('OCR cache', () => {
    it('does not call the OCR backend again for unchanged files', async () => {
      const first = new FakeOcr(TEXTS);
      await controller({ ocr: first, extractor: new FakeExtractor(answers()) }).run(COMPANY);
      expect(first.calls).toHaveLength(5);

      const second = new FakeOcr(TEXTS);
      const outcome = await controller({ ocr: second, extractor: new FakeExtractor(answers()) }).run(COMPANY);

      expect(outcome.ok).toBe(true);
      expect(second.calls).toEqual([]);
      expect(outcome.state.results.ocr?.cachedDocuments).toEqual([0, 1, 2, 3, 4]);
      expect(outcome.state.documents.get(0).rawText).toBe(TEXTS['a_constitucion.pdf']);
    });

    it('reads a file again once its bytes change', async () => {
      await controller({ ocr: new FakeOcr(TEXTS), extractor: new FakeExtractor(answers()) }).run(COMPANY);
      writeFileSync(join(root, 'data', COMPANY, 'b_modificacion.pdf'), '%PDF-1.4\n% revised\n');

      const second = new FakeOcr(TEXTS);
      const outcome = await controller({ ocr: second, extractor: new FakeExtractor(answers()) }).run(COMPANY);

      expect(second.calls).toEqual(['b_modificacion.pdf']);
      expect(outcome.state.results.ocr?.cachedDocuments).toEqual([0, 2, 3, 4]);
    });

    it('records hash, size and page count per document', async () => {
      await controller({ ocr: new FakeOcr(TEXTS), extractor: new FakeExtractor(answers()) }).run(COMPANY);
      const bytes = '%PDF-1.4\n% a_constitucion.pdf\n';

      const snapshot = readSnapshot('ocr_results');
      expect(Array.isArray(snapshot) ? snapshot[0] : null).toEqual({
        filename: 'a_constitucion.pdf',
        path: join(root, 'data', COMPANY, 'a_constitucion.pdf'),
        hash: computeHash(bytes),
        tamano_bytes: Buffer.byteLength(bytes),
        num_paginas: 1,
        desde_cache: false,
        text: TEXTS['a_constitucion.pdf'],
      });
    });

    it('reads every file when caching is disabled', async () => {
      const overrides: PipelineConfigOverrides = { ocrCache: { enabled: false } };
      await controller({ ocr: new FakeOcr(TEXTS), extractor: new FakeExtractor(answers()) }, overrides).run(COMPANY);

      const second = new FakeOcr(TEXTS);
      await controller({ ocr: second, extractor: new FakeExtractor(answers()) }, overrides).run(COMPANY);

      expect(second.calls).toHaveLength(5);
      expect(existsSync(join(root, 'results', 'ocr-cache'))).toBe(false);
    });
  });

  // ═════════════════════════════════════════════════════════════════════════════
  // LOCAL ERRORS
  // ═════════════════════════════════════════════════════════════════════════════

  describe('local errors', () => {
    it('completes with a warning when a required field is missing everywhere', async () => {
      const fields: StructuredFields = { ...BASE_FIELDS, domicilio: null };
      const outcome = await controller({
        ocr: new FakeOcr(TEXTS),
        extractor: new FakeExtractor(answers(fields)),
      }).run(COMPANY);

      expect(outcome.ok).toBe(true);
      if (!outcome.ok) return;
      expect(outcome.report.constitucion.domicilio).toEqual({ value: null, source: null });
      expect(outcome.state.results.report?.missingFields).toEqual(['constitucion.domicilio']);
      expect(outcome.state.warnings[outcome.state.warnings.length - 1]).toEqual({
        stage: 'report',
        category: 'REPORT_ERROR',
        message: 'Required field constitucion.domicilio has no value in any document',
        field: 'domicilio',
      });
    });

    it('turns an unusable field answer into a comparison gap', async () => {
      const extractor = new FakeExtractor((text, specName) => {
        if (specName === 'structured_fields' && text.includes('aumento de capital')) return undefined;
        return answers()(text, specName);
      });
      const outcome = await controller({ ocr: new FakeOcr(TEXTS), extractor }).run(COMPANY);

      expect(outcome.ok).toBe(true);
      if (!outcome.ok) return;
      expect(outcome.state.results.classification?.extractionFailures).toEqual([1]);
      expect(outcome.state.results.comparison?.failures).toEqual([
        {
          group: 'escritura_publica',
          fromVersion: 1,
          toVersion: 2,
          message: 'Cannot compare escritura_publica v1 -> v2: no structured fields for b_modificacion.pdf',
        },
      ]);
      expect(outcome.state.warnings.map((w) => [w.stage, w.category])).toEqual([
        ['dates', 'VERSIONING_ERROR'],
        ['classification', 'PARSE_ERROR'],
        ['classification', 'VALIDATION_ERROR'],
        ['comparison', 'COMPARISON_ERROR'],
      ]);
      expect(outcome.report.encabezado.razon_social.source?.filename).toBe('a_constitucion.pdf');
      expect(outcome.report.encabezado.ultima_modificacion).toEqual({ value: null, source: null });
    });
  });
});
