/**
 * SqliteVectorStore - chunk embeddings in a local SQLite file
 *
 * One table holds every collection. Chunks are keyed by (collection, chunk_id),
 * so upserting a chunk that is already stored inserts nothing. Similarity is
 * cosine, computed over the collection's rows in process.
 *
 * @module services/vector/sqlite-store
 */

import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import type {
  EmbeddingChunk,
  VectorMatch,
  VectorQuery,
  VectorStore,
} from '../../pipeline/capabilities.js';
import { cosineSimilarity } from '../../utils/math.js';

const PRAGMAS = [
  'PRAGMA journal_mode = WAL',
  'PRAGMA synchronous = NORMAL',
  'PRAGMA busy_timeout = 30000',
] as const;

const CREATE_CHUNKS_TABLE = `
CREATE TABLE IF NOT EXISTS chunk_embeddings (
  collection TEXT NOT NULL,
  chunk_id TEXT NOT NULL,
  filename TEXT NOT NULL,
  classification TEXT NOT NULL,
  chunk_index INTEGER NOT NULL,
  text TEXT NOT NULL,
  embedding TEXT NOT NULL,
  created_at TEXT NOT NULL,
  UNIQUE (collection, chunk_id)
)`;

const CREATE_COLLECTION_INDEX =
  'CREATE INDEX IF NOT EXISTS idx_chunk_embeddings_collection ON chunk_embeddings(collection, filename)';

interface ChunkRow {
  chunk_id: string;
  filename: string;
  chunk_index: number;
  text: string;
  embedding: string;
}

interface InsertParams {
  collection: string;
  chunk_id: string;
  filename: string;
  classification: string;
  chunk_index: number;
  text: string;
  embedding: string;
  created_at: string;
}

function parseEmbedding(raw: string): number[] {
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed) || !parsed.every((value) => typeof value === 'number')) {
    throw new Error('Stored embedding is not a numeric array');
  }
  return parsed;
}

export class SqliteVectorStore implements VectorStore {
  private readonly insertStmt: Database.Statement<InsertParams>;
  private readonly selectByCollection: Database.Statement<[string], ChunkRow>;
  private readonly selectByFile: Database.Statement<[string, string], ChunkRow>;

  private constructor(private readonly db: Database.Database) {
    this.insertStmt = db.prepare<InsertParams>(`
      INSERT OR IGNORE INTO chunk_embeddings
        (collection, chunk_id, filename, classification, chunk_index, text, embedding, created_at)
      VALUES
        (@collection, @chunk_id, @filename, @classification, @chunk_index, @text, @embedding, @created_at)
    `);
    const columns = 'chunk_id, filename, chunk_index, text, embedding';
    this.selectByCollection = db.prepare<[string], ChunkRow>(
      `SELECT ${columns} FROM chunk_embeddings WHERE collection = ? ORDER BY filename, chunk_index`
    );
    this.selectByFile = db.prepare<[string, string], ChunkRow>(
      `SELECT ${columns} FROM chunk_embeddings WHERE collection = ? AND filename = ? ORDER BY chunk_index`
    );
  }

  /**
   * Open (or create) the store. `:memory:` gives a private in-memory store.
   */
  static open(filePath: string): SqliteVectorStore {
    if (filePath !== ':memory:') {
      fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
    }
    const db = new Database(filePath);
    try {
      for (const pragma of PRAGMAS) {
        db.exec(pragma);
      }
      db.exec(CREATE_CHUNKS_TABLE);
      db.exec(CREATE_COLLECTION_INDEX);
    } catch (error) {
      db.close();
      throw error;
    }
    return new SqliteVectorStore(db);
  }

  upsertEmbeddings(chunks: readonly EmbeddingChunk[]): number {
    const createdAt = new Date().toISOString();
    const insertAll = this.db.transaction((batch: readonly EmbeddingChunk[]) => {
      let inserted = 0;
      for (const chunk of batch) {
        const result = this.insertStmt.run({
          collection: chunk.collection,
          chunk_id: chunk.chunkId,
          filename: chunk.filename,
          classification: chunk.classification,
          chunk_index: chunk.chunkIndex,
          text: chunk.text,
          embedding: JSON.stringify(chunk.embedding),
          created_at: createdAt,
        });
        inserted += result.changes;
      }
      return inserted;
    });
    return insertAll(chunks);
  }

  query(query: VectorQuery): VectorMatch[] {
    const rows =
      query.filename === undefined
        ? this.selectByCollection.all(query.collection)
        : this.selectByFile.all(query.collection, query.filename);

    return rows
      .map((row) => ({
        chunkId: row.chunk_id,
        filename: row.filename,
        chunkIndex: row.chunk_index,
        text: row.text,
        similarity: cosineSimilarity(query.embedding, parseEmbedding(row.embedding)),
      }))
      .filter((match) => match.similarity >= query.minSimilarity)
      .sort((a, b) => b.similarity - a.similarity || a.chunkIndex - b.chunkIndex)
      .slice(0, query.topK);
  }

  /** Stored chunk count, optionally for one collection */
  count(collection?: string): number {
    const row =
      collection === undefined
        ? this.db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM chunk_embeddings').get()
        : this.db
            .prepare<[string], { n: number }>('SELECT COUNT(*) AS n FROM chunk_embeddings WHERE collection = ?')
            .get(collection);
    return row?.n ?? 0;
  }

  close(): void {
    this.db.close();
  }
}
