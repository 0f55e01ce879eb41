/**
 * Query Embedding Cache
 *
 * SQLite-backed cache of query vectors keyed by text hash, model
 * identifier and vector width, so a repeated question costs no provider call.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { xxh64 } from '@node-rs/xxhash';
import { encodeEmbedding, decodeEmbedding } from '../../models/embedding-vector.js';
import { PersistenceFailureError } from '../../lib/errors/EngineErrors.js';
import { Result, ok, trySync, toError } from '../../lib/result-types.js';
import { RETRIEVAL_CONFIG } from '../../constants/retrieval-constants.js';

const QUERY_CACHE_LAYOUT_VERSION = 2;

interface CachedRow {
  embedding: Buffer;
  dimensions: number;
}

/**
 * 16-character hex xxh64 of the query text
 */
export function hashQueryText(text: string): string {
  return xxh64(Buffer.from(text, 'utf-8')).toString(16).padStart(16, '0');
}

export class QueryEmbeddingCache {
  private db: Database.Database | null = null;

  /**
   * @param dbPath - SQLite file, or ':memory:' for a process-local cache
   * @param maxEntries - Least recently used entries beyond this are pruned
   */
  constructor(
    private readonly dbPath: string,
    private readonly maxEntries: number = RETRIEVAL_CONFIG.QUERY_CACHE_MAX_ENTRIES
  ) {}

  /**
   * Opens the database and creates the schema if needed
   *
   * A table written under an older layout is dropped; its entries are only
   * a cache.
   */
  initialize(): Result<void, PersistenceFailureError> {
    if (this.db) {
      return ok(undefined);
    }

    return trySync(
      () => {
        if (this.dbPath !== ':memory:') {
          mkdirSync(dirname(this.dbPath), { recursive: true });
        }
        const db = new Database(this.dbPath);
        db.pragma('journal_mode = WAL');
        const version = db.pragma('user_version', { simple: true });
        if (version !== QUERY_CACHE_LAYOUT_VERSION) {
          db.exec('DROP TABLE IF EXISTS query_embeddings');
          db.pragma(`user_version = ${QUERY_CACHE_LAYOUT_VERSION}`);
        }
        db.exec(`
          CREATE TABLE IF NOT EXISTS query_embeddings (
            textHash TEXT NOT NULL,
            modelId TEXT NOT NULL,
            dimensions INTEGER NOT NULL,
            embedding BLOB NOT NULL,
            createdAt INTEGER NOT NULL,
            lastAccessedAt INTEGER NOT NULL,
            PRIMARY KEY (textHash, modelId, dimensions)
          );
          CREATE INDEX IF NOT EXISTS idx_query_accessed
            ON query_embeddings (lastAccessedAt);
        `);
        this.db = db;
      },
      (error) => new PersistenceFailureError('open query cache', this.dbPath, toError(error))
    );
  }

  private run<T>(operation: string, fn: (db: Database.Database) => T): Result<T, PersistenceFailureError> {
    return trySync(
      () => {
        if (!this.db) {
          throw new Error('Query cache not initialized');
        }
        return fn(this.db);
      },
      (error) => new PersistenceFailureError(operation, this.dbPath, toError(error))
    );
  }

  /**
   * Cached vector for the text under the given model and width, or null
   */
  get(text: string, modelId: string, dimensions: number): Result<number[] | null, PersistenceFailureError> {
    const textHash = hashQueryText(text);

    return this.run('read query cache', (db) => {
      const row = db
        .prepare<[string, string, number], CachedRow>(
          'SELECT embedding, dimensions FROM query_embeddings WHERE textHash = ? AND modelId = ? AND dimensions = ?'
        )
        .get(textHash, modelId, dimensions);

      if (!row) return null;

      const vector = decodeEmbedding(row.embedding);
      if (vector.length !== row.dimensions) {
        // Damaged row; forget it and let the caller re-embed
        db.prepare<[string, string, number]>(
          'DELETE FROM query_embeddings WHERE textHash = ? AND modelId = ? AND dimensions = ?'
        ).run(textHash, modelId, dimensions);
        return null;
      }

      db.prepare<[number, string, string, number]>(
        'UPDATE query_embeddings SET lastAccessedAt = ? WHERE textHash = ? AND modelId = ? AND dimensions = ?'
      ).run(Date.now(), textHash, modelId, dimensions);

      return Array.from(vector);
    });
  }

  set(text: string, modelId: string, vector: readonly number[]): Result<void, PersistenceFailureError> {
    const now = Date.now();

    return this.run('write query cache', (db) => {
      db.prepare<[string, string, number, Buffer, number, number]>(`
        INSERT OR REPLACE INTO query_embeddings
          (textHash, modelId, dimensions, embedding, createdAt, lastAccessedAt)
        VALUES (?, ?, ?, ?, ?, ?)
      `).run(hashQueryText(text), modelId, vector.length, encodeEmbedding([...vector]), now, now);

      this.prune(db);
    });
  }

  /**
   * Forgets the text under the model at every width; returns rows removed
   */
  delete(text: string, modelId: string): Result<number, PersistenceFailureError> {
    return this.run('delete from query cache', (db) =>
      db.prepare<[string, string]>('DELETE FROM query_embeddings WHERE textHash = ? AND modelId = ?')
        .run(hashQueryText(text), modelId).changes
    );
  }

  /**
   * Drops least recently used entries above the size cap
   */
  private prune(db: Database.Database): number {
    const result = db.prepare<[number]>(`
      DELETE FROM query_embeddings WHERE rowid IN (
        SELECT rowid FROM query_embeddings
        ORDER BY lastAccessedAt DESC, rowid DESC
        LIMIT -1 OFFSET ?
      )
    `).run(this.maxEntries);
    return result.changes;
  }

  size(): Result<number, PersistenceFailureError> {
    return this.run('count query cache', (db) => {
      const row = db
        .prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM query_embeddings')
        .get();
      return row?.count ?? 0;
    });
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }
}
