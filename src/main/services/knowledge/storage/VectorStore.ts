/**
 * @file VectorStore - Vector Storage Service
 * @description SQLite-backed dense store: vectors as float32 BLOBs, brute-force cosine search,
 *   collections with an atomically switched active pointer.
 * @depends better-sqlite3, zod
 */

import { mkdirSync } from 'node:fs';
import * as path from 'node:path';
import Database from 'better-sqlite3';
import { z } from 'zod';
import { createLogger } from '../../LoggerService';
import type { IDisposable } from '../../../../../shared/utils/lifecycle';
import type { IVectorStore } from '../../interfaces/IVectorStore';
import {
  type ChunkFilter,
  type ChunkMetadata,
  type StoredChunk,
  type VectorMatch,
  type VectorRecord,
  assertSameDimension,
  bufferToFloat32,
  cosineSimilarity,
  float32ToBuffer,
} from '../types';

const logger = createLogger('VectorStore');

const ACTIVE_COLLECTION_KEY = 'active_collection';

// ====== Row Types ======

interface ChunkRow {
  id: string;
  text: string;
  metadata: string;
}

interface EmbeddingRow extends ChunkRow {
  embedding: Buffer;
}

interface MetaRow {
  value: string;
}

interface CountRow {
  count: number;
}

const chunkMetadataSchema = z
  .object({
    length: z.number(),
    sentenceCount: z.number(),
    isQaPair: z.boolean().optional(),
    question: z.string().optional(),
    answer: z.string().optional(),
  })
  .passthrough();

function parseMetadata(raw: string): ChunkMetadata {
  return chunkMetadataSchema.parse(JSON.parse(raw));
}

interface DecodedRecord {
  id: string;
  text: string;
  metadata: ChunkMetadata;
  vector: Float32Array;
}

export class VectorStore implements IVectorStore, IDisposable {
  private db: Database.Database;
  /** Decoded vectors per collection, dropped on every write to it */
  private decoded = new Map<string, DecodedRecord[]>();

  /**
   * @param dbPath File path, or ':memory:'
   */
  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.createTables();
    logger.info('[VectorStore] Opened', { dbPath });
  }

  private createTables(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS chunks (
        collection TEXT NOT NULL,
        id TEXT NOT NULL,
        text TEXT NOT NULL,
        metadata TEXT NOT NULL,
        embedding BLOB NOT NULL,
        PRIMARY KEY (collection, id)
      );
      CREATE TABLE IF NOT EXISTS meta (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );
    `);
  }

  // ==================== Writes ====================

  async upsert(collection: string, records: VectorRecord[]): Promise<void> {
    const stmt = this.db.prepare<[string, string, string, string, Buffer]>(`
      INSERT INTO chunks (collection, id, text, metadata, embedding)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT (collection, id) DO UPDATE SET
        text = excluded.text,
        metadata = excluded.metadata,
        embedding = excluded.embedding
    `);

    const insertAll = this.db.transaction((items: VectorRecord[]) => {
      for (const record of items) {
        stmt.run(
          collection,
          record.id,
          record.text,
          JSON.stringify(record.metadata),
          float32ToBuffer(record.vector)
        );
      }
    });

    insertAll(records);
    this.decoded.delete(collection);
    logger.debug(`[VectorStore] Upserted ${records.length} records into ${collection}`);
  }

  async dropCollection(collection: string): Promise<void> {
    this.db.transaction(() => {
      this.db.prepare<[string]>('DELETE FROM chunks WHERE collection = ?').run(collection);
      this.db
        .prepare<[string, string]>('DELETE FROM meta WHERE key = ? AND value = ?')
        .run(ACTIVE_COLLECTION_KEY, collection);
    })();
    this.decoded.delete(collection);
    logger.debug(`[VectorStore] Dropped collection ${collection}`);
  }

  async promote(collection: string): Promise<void> {
    const previous = this.readActiveCollection();

    this.db.transaction(() => {
      this.db
        .prepare<[string, string]>(
          'INSERT INTO meta (key, value) VALUES (?, ?) ON CONFLICT (key) DO UPDATE SET value = excluded.value'
        )
        .run(ACTIVE_COLLECTION_KEY, collection);
      if (previous && previous !== collection) {
        this.db.prepare<[string]>('DELETE FROM chunks WHERE collection = ?').run(previous);
      }
    })();

    if (previous && previous !== collection) {
      this.decoded.delete(previous);
    }
    logger.info('[VectorStore] Promoted collection', { collection, previous });
  }

  // ==================== Reads ====================

  async getActiveCollection(): Promise<string | null> {
    return this.readActiveCollection();
  }

  private readActiveCollection(): string | null {
    const row = this.db
      .prepare<[string], MetaRow>('SELECT value FROM meta WHERE key = ?')
      .get(ACTIVE_COLLECTION_KEY);
    return row?.value ?? null;
  }

  async count(collection: string): Promise<number> {
    const row = this.db
      .prepare<[string], CountRow>('SELECT COUNT(*) AS count FROM chunks WHERE collection = ?')
      .get(collection);
    return row?.count ?? 0;
  }

  async listChunks(collection: string): Promise<StoredChunk[]> {
    return this.db
      .prepare<[string], ChunkRow>(
        'SELECT id, text, metadata FROM chunks WHERE collection = ? ORDER BY rowid'
      )
      .all(collection)
      .map((row) => ({ id: row.id, text: row.text, metadata: parseMetadata(row.metadata) }));
  }

  async queryByVector(
    collection: string,
    vector: number[],
    k: number,
    exclude?: ChunkFilter
  ): Promise<VectorMatch[]> {
    if (k <= 0) {
      return [];
    }

    const scored: VectorMatch[] = [];
    for (const record of this.loadDecoded(collection)) {
      assertSameDimension(vector, record.vector);
      if (exclude?.(record.metadata)) {
        continue;
      }
      scored.push({
        id: record.id,
        text: record.text,
        metadata: record.metadata,
        score: cosineSimilarity(vector, record.vector),
      });
    }

    return scored.sort((a, b) => b.score - a.score).slice(0, k);
  }

  private loadDecoded(collection: string): DecodedRecord[] {
    const cached = this.decoded.get(collection);
    if (cached) {
      return cached;
    }

    const records = this.db
      .prepare<[string], EmbeddingRow>(
        'SELECT id, text, metadata, embedding FROM chunks WHERE collection = ? ORDER BY rowid'
      )
      .all(collection)
      .map((row) => ({
        id: row.id,
        text: row.text,
        metadata: parseMetadata(row.metadata),
        vector: bufferToFloat32(row.embedding),
      }));

    this.decoded.set(collection, records);
    return records;
  }

  close(): void {
    this.decoded.clear();
    if (this.db.open) {
      this.db.close();
      logger.info('[VectorStore] Closed');
    }
  }

  dispose(): void {
    this.close();
  }
}
