/**
 * @file IVectorStore - Dense vector store contract
 * @description Collection-scoped upsert and similarity search. One collection is active at a time;
 *   index rebuilds write a staging collection and promote it.
 * @depends VectorStore
 */

import type { ChunkFilter, StoredChunk, VectorMatch, VectorRecord } from '../knowledge/types';

export interface IVectorStore {
  /** Insert or replace records by id */
  upsert(collection: string, records: VectorRecord[]): Promise<void>;

  /**
   * Top `k` records by cosine similarity, best first. Records matching `exclude` never take a slot.
   * @throws Error when `vector` does not match the indexed dimension
   */
  queryByVector(
    collection: string,
    vector: number[],
    k: number,
    exclude?: ChunkFilter
  ): Promise<VectorMatch[]>;

  /** Every record of a collection in insertion order, without vectors */
  listChunks(collection: string): Promise<StoredChunk[]>;

  count(collection: string): Promise<number>;

  dropCollection(collection: string): Promise<void>;

  getActiveCollection(): Promise<string | null>;

  /**
   * Atomically make `collection` active and drop the previously active one.
   */
  promote(collection: string): Promise<void>;

  close(): void;
}
