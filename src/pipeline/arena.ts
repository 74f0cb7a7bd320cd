/**
 * Document arena
 *
 * Holds a run's documents in an indexable, append-only collection. Versioned
 * documents and comparisons refer to entries by index. Updates return a new
 * arena so earlier ProcessingState values keep their view.
 *
 * @module pipeline/arena
 */

import type { DocumentEntry } from '../models/document.js';
import { PipelineError } from './errors.js';

export type NewDocument = Pick<DocumentEntry, 'filename' | 'sourcePath' | 'rawText'> &
  Partial<Pick<DocumentEntry, 'metadata'>>;

export class DocumentArena {
  private constructor(private readonly entries: readonly DocumentEntry[]) {}

  static empty(): DocumentArena {
    return new DocumentArena([]);
  }

  static fromSources(sources: readonly NewDocument[]): DocumentArena {
    return new DocumentArena(
      sources.map((source, index) => ({
        index,
        filename: source.filename,
        sourcePath: source.sourcePath,
        rawText: source.rawText,
        metadata: source.metadata ?? null,
        extractedDates: [],
        primaryDate: null,
        classification: null,
        isModification: false,
        structuredFields: null,
      }))
    );
  }

  get size(): number {
    return this.entries.length;
  }

  get(index: number): DocumentEntry {
    const entry = this.entries[index];
    if (entry === undefined) {
      throw new PipelineError('INTERNAL_ERROR', `No document at arena index ${index}`, {
        index,
        size: this.entries.length,
      });
    }
    return entry;
  }

  all(): readonly DocumentEntry[] {
    return this.entries;
  }

  /**
   * Replace fields of one entry. The index and source fields are fixed.
   */
  update(
    index: number,
    patch: Partial<Omit<DocumentEntry, 'index' | 'filename' | 'sourcePath' | 'metadata'>>
  ): DocumentArena {
    const current = this.get(index);
    const next = this.entries.slice();
    next[index] = { ...current, ...patch };
    return new DocumentArena(next);
  }

  /**
   * Apply one patch per entry
   */
  map(
    fn: (entry: DocumentEntry) => Partial<Omit<DocumentEntry, 'index' | 'filename' | 'sourcePath' | 'metadata'>>
  ): DocumentArena {
    return new DocumentArena(this.entries.map((entry) => ({ ...entry, ...fn(entry) })));
  }
}
