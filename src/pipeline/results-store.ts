/**
 * Durable result storage
 *
 * Every snapshot is written to a temp file beside its target and renamed into
 * place, so a reader never sees a half-written file and a crash leaves the
 * previous snapshot intact.
 *
 * @module pipeline/results-store
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { PIPELINE_MODES, STAGE_NAMES, type RunManifest } from '../models/pipeline.js';
import { readJsonFile } from '../utils/validation.js';
import { isErrorCategory, type ErrorCategory } from './errors.js';
import { MANIFEST_SNAPSHOT, snapshotFilename } from './snapshots.js';

export interface ResultsStore {
  /** @returns the file name written */
  writeSnapshot(company: string, name: string, data: unknown): string;
  writeManifest(manifest: RunManifest): string;
  readRunManifest(company: string): RunManifest | null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// MANIFEST SCHEMA
// ═══════════════════════════════════════════════════════════════════════════════

const StageNameSchema = z.enum(STAGE_NAMES);

const CategorySchema = z.custom<ErrorCategory>(
  (value) => typeof value === 'string' && isErrorCategory(value),
  'Unknown error category'
);

const RunStatusSchema = z.discriminatedUnion('state', [
  z.object({ state: z.literal('pending') }),
  z.object({ state: z.literal('running'), stage: StageNameSchema }),
  z.object({ state: z.literal('completed') }),
  z.object({ state: z.literal('failed'), stage: StageNameSchema, reason: z.string() }),
]);

export const RunManifestSchema = z.object({
  run_id: z.string().uuid(),
  company: z.string(),
  mode: z.enum(PIPELINE_MODES),
  status: RunStatusSchema,
  stages: z.array(
    z.object({
      stage: StageNameSchema,
      outcome: z.enum(['completed', 'skipped', 'failed']),
      startedAt: z.string(),
      finishedAt: z.string(),
      durationMs: z.number(),
      snapshot: z.string().nullable(),
    })
  ),
  warnings: z.array(
    z.object({
      stage: StageNameSchema,
      category: CategorySchema,
      message: z.string(),
      document: z.string().optional(),
      field: z.string().optional(),
    })
  ),
  failure: z
    .object({
      stage: StageNameSchema,
      category: CategorySchema,
      message: z.string(),
      document: z.string().nullable(),
      hint: z.string(),
    })
    .nullable(),
});

/**
 * Write pretty-printed JSON to a temp file beside `target`, then rename it into place
 */
export function writeJsonAtomic(target: string, data: unknown): void {
  const tempPath = `${target}.${process.pid}.tmp`;
  fs.mkdirSync(path.dirname(target), { recursive: true });
  try {
    fs.writeFileSync(tempPath, JSON.stringify(data, null, 2) + '\n', 'utf-8');
    fs.renameSync(tempPath, target);
  } catch (error) {
    if (fs.existsSync(tempPath)) {
      fs.unlinkSync(tempPath);
    }
    throw error;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// JSON FILE STORE
// ═══════════════════════════════════════════════════════════════════════════════

export class JsonResultsStore implements ResultsStore {
  constructor(private readonly outputDir: string) {}

  writeSnapshot(company: string, name: string, data: unknown): string {
    const filename = snapshotFilename(company, name);
    writeJsonAtomic(path.join(this.outputDir, filename), data);
    return filename;
  }

  writeManifest(manifest: RunManifest): string {
    return this.writeSnapshot(manifest.company, MANIFEST_SNAPSHOT, manifest);
  }

  /**
   * Manifest of the company's last run, null when it never ran
   *
   * @throws ValidationError when the file exists but is not a manifest
   */
  readRunManifest(company: string): RunManifest | null {
    const filePath = path.join(this.outputDir, snapshotFilename(company, MANIFEST_SNAPSHOT));
    if (!fs.existsSync(filePath)) return null;
    return readJsonFile(filePath, RunManifestSchema);
  }
}
