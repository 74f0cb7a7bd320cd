/**
 * OCR text cache keyed by file content
 *
 * One JSON file per content hash. An entry is reused only by the OCR backend
 * that wrote it, so switching backends re-reads every PDF. Renaming or moving
 * a PDF keeps its entry; editing it does not.
 *
 * @module services/ocr/ocr-cache
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { OcrText } from '../../pipeline/capabilities.js';
import { PipelineError, errorMessage } from '../../pipeline/errors.js';
import { writeJsonAtomic } from '../../pipeline/results-store.js';
import { isValidHash } from '../../utils/hash.js';
import { readJsonFile } from '../../utils/validation.js';

export const OCR_CACHE_DIRNAME = 'ocr-cache';

const CacheEntrySchema = z.object({
  contentHash: z.string(),
  engine: z.string(),
  pageCount: z.number().int().min(0),
  text: z.string(),
});

export type OcrCacheEntry = z.infer<typeof CacheEntrySchema>;

export class OcrCache {
  constructor(private readonly directory: string) {}

  private entryPath(contentHash: string): string {
    if (!isValidHash(contentHash)) {
      throw new PipelineError('INTERNAL_ERROR', `Not a content hash: "${contentHash}"`);
    }
    return path.join(this.directory, `${contentHash.slice('sha256:'.length)}.json`);
  }

  /**
   * Cached text for these bytes, null on a miss. An unreadable entry counts as
   * a miss and is overwritten by the next `put`.
   */
  get(contentHash: string, engine: string): OcrText | null {
    const filePath = this.entryPath(contentHash);
    if (!fs.existsSync(filePath)) return null;

    let entry: OcrCacheEntry;
    try {
      entry = readJsonFile(filePath, CacheEntrySchema);
    } catch (error) {
      console.error(`[OCR] Ignoring cache entry ${path.basename(filePath)}: ${errorMessage(error)}`);
      return null;
    }
    if (entry.contentHash !== contentHash || entry.engine !== engine) return null;
    return { text: entry.text, pageCount: entry.pageCount };
  }

  put(contentHash: string, engine: string, ocr: OcrText): void {
    const entry: OcrCacheEntry = { contentHash, engine, pageCount: ocr.pageCount, text: ocr.text };
    writeJsonAtomic(this.entryPath(contentHash), entry);
  }
}
