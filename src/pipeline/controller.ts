/**
 * PipelineController - runs one company through the stage graph
 *
 * Stages execute one at a time in graph order. After each stage the output is
 * folded into a new ProcessingState and its snapshot is written before the
 * next stage starts. The first error that escapes a stage fails the run: the
 * status moves to `failed`, the run manifest is written and nothing downstream
 * runs. Local problems (comparison gaps, missing report fields, unusable model
 * answers) come back from stages as warnings instead.
 *
 * @module pipeline/controller
 */

import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { FacultadDefinition } from '../models/legalization.js';
import type {
  PipelineWarning,
  RunManifest,
  StageFailure,
  StageName,
  StageRecord,
} from '../models/pipeline.js';
import type { Report } from '../models/report.js';
import {
  loadClassificationRules,
  type ClassificationRules,
} from '../services/classification/keyword-classifier.js';
import { loadFacultadCatalog } from '../services/legalization/catalog.js';
import { OCR_CACHE_DIRNAME, OcrCache } from '../services/ocr/ocr-cache.js';
import { CompanyIdSchema } from '../utils/validation.js';
import type { Capabilities } from './capabilities.js';
import type { PipelineConfig } from './config.js';
import {
  InputError,
  PipelineError,
  getRecoveryHint,
  isStageFatal,
} from './errors.js';
import type { CallPolicy } from './external-call.js';
import { StageGraph } from './graph.js';
import { JsonResultsStore, type ResultsStore } from './results-store.js';
import { renderSnapshots } from './snapshots.js';
import { STAGES } from './stages/index.js';
import type { StageContext, StageDefinition, StageOutcome, StageRegistry } from './stages/types.js';
import { createState, toStageResult, withStageOutput, type ProcessingState } from './state.js';
import { describeStatus, transition } from './status.js';

export type RunOutcome =
  | { ok: true; report: Report; state: ProcessingState }
  | { ok: false; failure: StageFailure; state: ProcessingState };

export interface PipelineControllerOptions {
  config: PipelineConfig;
  capabilities: Capabilities;
  store?: ResultsStore;
  classificationRules?: ClassificationRules;
  catalog?: readonly FacultadDefinition[];
  /** Defaults to a cache under the output directory unless disabled in config */
  ocrCache?: OcrCache | null;
  stages?: StageRegistry;
  graph?: StageGraph;
  /** Clock for stage records */
  now?: () => Date;
}

function defaultOcrCache(config: PipelineConfig): OcrCache | null {
  if (!config.ocrCache.enabled) return null;
  return new OcrCache(config.ocrCache.directory ?? path.join(config.outputDir, OCR_CACHE_DIRNAME));
}

function companyName(companyId: string): string {
  const parsed = CompanyIdSchema.safeParse(companyId);
  if (!parsed.success) {
    throw new InputError(`Invalid company name "${companyId}": ${parsed.error.errors[0]?.message}`);
  }
  return parsed.data;
}

export class PipelineController {
  private readonly store: ResultsStore;
  private readonly stages: StageRegistry;
  private readonly graph: StageGraph;
  private readonly context: StageContext;
  private readonly now: () => Date;

  constructor(private readonly options: PipelineControllerOptions) {
    const { config } = options;
    this.store = options.store ?? new JsonResultsStore(config.outputDir);
    this.stages = options.stages ?? STAGES;
    this.graph = options.graph ?? new StageGraph();
    this.now = options.now ?? (() => new Date());

    const policy: CallPolicy = { ...config.external };
    this.context = {
      config,
      capabilities: options.capabilities,
      classificationRules: options.classificationRules ?? loadClassificationRules(),
      catalog: options.catalog ?? loadFacultadCatalog(config.legalization.catalogPath),
      policy,
      ocrCache: options.ocrCache !== undefined ? options.ocrCache : defaultOcrCache(config),
    };
  }

  /**
   * @throws InputError when the company name cannot be used as a file prefix
   */
  readRunManifest(companyId: string): RunManifest | null {
    return this.store.readRunManifest(companyName(companyId));
  }

  /**
   * Run every stage for one company.
   *
   * @throws InputError when the company name cannot be used as a folder or file prefix
   */
  async run(companyId: string): Promise<RunOutcome> {
    const company = companyName(companyId);
    const { config } = this.options;

    let state = createState({
      runId: uuidv4(),
      companyId: company,
      folderPath: path.join(config.dataDir, company),
      mode: config.mode,
    });
    console.error(`[Pipeline] Run ${state.runId} for ${company} (${state.mode})`);

    for (const stageName of this.graph.executionOrder()) {
      state = { ...state, status: transition(state.status, { type: 'start_stage', stage: stageName }) };
      const startedAt = this.now();

      try {
        state = await this.executeStage(this.stages[stageName], state, startedAt);
      } catch (error) {
        return this.fail(state, stageName, startedAt, error);
      }
    }

    state = { ...state, status: transition(state.status, { type: 'complete' }) };
    this.writeManifest(state, null);

    const report = state.results.report?.report;
    if (report === undefined) {
      throw new PipelineError('INTERNAL_ERROR', 'Run completed without a report', { company });
    }
    console.error(`[Pipeline] ${company}: ${describeStatus(state.status)}, ${state.warnings.length} warning(s)`);
    return { ok: true, report, state };
  }

  private async executeStage<K extends StageName>(
    definition: StageDefinition<K>,
    state: ProcessingState,
    startedAt: Date
  ): Promise<ProcessingState> {
    const placeholder = definition.skip?.(state, this.context) ?? null;
    const outcome: StageOutcome<K> =
      placeholder !== null ? { output: placeholder } : await definition.run(state, this.context);

    const results = withStageOutput(state.results, definition.name, outcome.output);
    const documents = outcome.documents ?? state.documents;
    const warnings: PipelineWarning[] = outcome.warnings ?? [];
    for (const warning of warnings) {
      console.error(`[Pipeline] Warning (${warning.stage}/${warning.category}): ${warning.message}`);
    }

    let snapshot: string | null = null;
    const result = toStageResult(results, definition.name);
    if (result !== null) {
      for (const file of renderSnapshots(result, documents)) {
        const written = this.store.writeSnapshot(state.companyId, file.name, file.data);
        snapshot ??= written;
      }
    }

    const finishedAt = this.now();
    const record: StageRecord = {
      stage: definition.name,
      outcome: placeholder !== null ? 'skipped' : 'completed',
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      snapshot,
    };
    console.error(`[Pipeline] ${definition.name} ${record.outcome} in ${record.durationMs}ms`);

    return {
      ...state,
      documents,
      results,
      stageRecords: [...state.stageRecords, record],
      warnings: [...state.warnings, ...warnings],
    };
  }

  private fail(state: ProcessingState, stage: StageName, startedAt: Date, error: unknown): RunOutcome {
    const caught = PipelineError.fromUnknown(error, 'INTERNAL_ERROR', { company: state.companyId, stage });
    // Local categories are handled inside stages; one escaping is a defect
    const category = isStageFatal(caught.category) ? caught.category : 'INTERNAL_ERROR';

    const failure: StageFailure = {
      stage,
      category,
      message: caught.message,
      document: caught.document ?? null,
      hint: getRecoveryHint(category),
    };
    const finishedAt = this.now();
    const failedState: ProcessingState = {
      ...state,
      status: transition(state.status, { type: 'fail', reason: caught.message }),
      stageRecords: [
        ...state.stageRecords,
        {
          stage,
          outcome: 'failed',
          startedAt: startedAt.toISOString(),
          finishedAt: finishedAt.toISOString(),
          durationMs: finishedAt.getTime() - startedAt.getTime(),
          snapshot: null,
        },
      ],
    };

    console.error(
      `[Pipeline] ${state.companyId}: stage ${stage} failed (${category})${failure.document ? ` on ${failure.document}` : ''}: ${caught.message}`
    );
    if (category === 'INTERNAL_ERROR' && caught.stack) {
      console.error(caught.stack);
    }
    this.writeManifest(failedState, failure);
    return { ok: false, failure, state: failedState };
  }

  private writeManifest(state: ProcessingState, failure: StageFailure | null): void {
    const manifest: RunManifest = {
      run_id: state.runId,
      company: state.companyId,
      mode: state.mode,
      status: state.status,
      stages: [...state.stageRecords],
      warnings: [...state.warnings],
      failure,
    };
    try {
      this.store.writeManifest(manifest);
    } catch (error) {
      // The run outcome is still returned to the caller
      console.error(
        `[Pipeline] Could not write run manifest for ${state.companyId}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Human-readable lines describing a finished run
 */
export function formatRunSummary(outcome: RunOutcome): string[] {
  const { state } = outcome;
  const lines = [`Empresa: ${state.companyId} (ejecución ${state.runId})`];
  lines.push(`  Documentos procesados: ${state.documents.size}`);

  const versioning = state.results.versioning;
  if (versioning) {
    const versioned = Object.values(versioning).reduce((sum, list) => sum + list.length, 0);
    lines.push(`  Documentos versionados: ${versioned}`);
  }
  const comparison = state.results.comparison;
  if (comparison) {
    const count = Object.values(comparison.comparisons).reduce((sum, list) => sum + list.length, 0);
    lines.push(`  Comparaciones: ${count}`);
  }
  const legalization = state.results.legalization;
  if (legalization) {
    const codes = new Set(legalization.facultades.map((f) => f.codigo));
    lines.push(`  Facultades encontradas: ${codes.size}`);
  }
  lines.push(`  Advertencias: ${state.warnings.length}`);

  if (outcome.ok) {
    lines.push('  Estado: completado');
  } else {
    const { failure } = outcome;
    lines.push(`  Estado: falló en la etapa ${failure.stage} (${failure.category})`);
    if (failure.document) lines.push(`  Documento: ${failure.document}`);
    lines.push(`  Error: ${failure.message}`);
    lines.push(`  Sugerencia: ${failure.hint}`);
  }
  return lines;
}
