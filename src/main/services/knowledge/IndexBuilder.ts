/**
 * @file IndexBuilder - Dense + sparse index construction
 * @description Embeds chunks, writes them to a staging collection, builds the sparse index and
 *   promotes the staging collection. Any failure before promotion drops the staging collection,
 *   so the previously active index stays authoritative.
 * @depends IEmbeddingService, IVectorStore, SparseIndex
 */

import { randomUUID } from 'node:crypto';
import { retry } from '../../../../shared/utils/async';
import { createLogger } from '../LoggerService';
import { IndexBuildFailed } from '../errors';
import type { IEmbeddingService } from '../interfaces/IEmbeddingService';
import type { IVectorStore } from '../interfaces/IVectorStore';
import { SparseIndex, type SparseIndexOptions } from './sparse/SparseIndex';
import { Tokenizer } from './sparse/Tokenizer';
import type { Chunk, IndexSnapshot, StoredChunk, VectorRecord } from './types';

const logger = createLogger('IndexBuilder');

export interface IndexBuilderOptions {
  sparse: Partial<SparseIndexOptions>;
  batchSize: number;
  /** Extra attempts for the embedding pass */
  retries: number;
  retryDelayMs: number;
}

const DEFAULT_INDEX_BUILDER_OPTIONS: IndexBuilderOptions = {
  sparse: {},
  batchSize: 10,
  retries: 2,
  retryDelayMs: 500,
};

function stagingCollectionName(): string {
  return `chunks_${Date.now().toString(36)}_${randomUUID().slice(0, 8)}`;
}

function toStoredChunk(chunk: Chunk): StoredChunk {
  return {
    id: chunk.id,
    text: chunk.text,
    metadata: {
      ...chunk.metadata,
      sourceFile: chunk.sourceFile,
      index: chunk.index,
      language: chunk.language,
    },
  };
}

export class IndexBuilder {
  private options: IndexBuilderOptions;

  constructor(
    private readonly embedding: IEmbeddingService,
    private readonly vectorStore: IVectorStore,
    private readonly tokenizer: Tokenizer = new Tokenizer(),
    options: Partial<IndexBuilderOptions> = {}
  ) {
    this.options = { ...DEFAULT_INDEX_BUILDER_OPTIONS, ...options };
  }

  /**
   * @throws IndexBuildFailed on an empty or inconsistent chunk list, or any embedding,
   *   storage or sparse-index failure
   */
  async build(chunks: Chunk[], signal?: AbortSignal): Promise<IndexSnapshot> {
    if (chunks.length === 0) {
      throw new IndexBuildFailed('No chunks to index');
    }

    const stored = chunks.map(toStoredChunk);
    const byId = new Map<string, StoredChunk>();
    for (const chunk of stored) {
      if (byId.has(chunk.id)) {
        throw new IndexBuildFailed(`Duplicate chunk id: ${chunk.id}`);
      }
      byId.set(chunk.id, chunk);
    }

    const collection = stagingCollectionName();
    logger.info('[IndexBuilder] Building index', { collection, chunks: chunks.length });
    logger.time('build');

    try {
      const texts = stored.map((chunk) => chunk.text);
      const vectors = await retry(
        () => this.embedding.embedBatch(texts, { batchSize: this.options.batchSize, signal }),
        { retries: this.options.retries, delay: this.options.retryDelayMs }
      );

      const records: VectorRecord[] = stored.map((chunk, i) => ({ ...chunk, vector: vectors[i] }));
      await this.vectorStore.upsert(collection, records);

      const sparse = SparseIndex.build(stored, this.tokenizer, this.options.sparse);

      signal?.throwIfAborted();
      await this.vectorStore.promote(collection);

      logger.timeEnd('build');
      logger.info('[IndexBuilder] Index ready', {
        collection,
        chunks: stored.length,
        vocabularySize: sparse.vocabularySize,
      });

      return { collection, sparse, chunks: byId, chunkCount: stored.length, builtAt: Date.now() };
    } catch (error) {
      await this.discardStaging(collection);
      const reason = error instanceof Error ? error.message : String(error);
      logger.error('[IndexBuilder] Build failed, previous index kept', { collection, reason });
      throw new IndexBuildFailed(`Index build failed: ${reason}`, error);
    }
  }

  /**
   * Restore the active collection and rebuild its sparse index.
   * @returns null when nothing has been built yet
   */
  async load(): Promise<IndexSnapshot | null> {
    const collection = await this.vectorStore.getActiveCollection();
    if (!collection) {
      logger.info('[IndexBuilder] No active index');
      return null;
    }

    const stored = await this.vectorStore.listChunks(collection);
    if (stored.length === 0) {
      logger.warn('[IndexBuilder] Active collection is empty', { collection });
      return null;
    }

    const sparse = SparseIndex.build(stored, this.tokenizer, this.options.sparse);
    logger.info('[IndexBuilder] Index loaded', { collection, chunks: stored.length });

    return {
      collection,
      sparse,
      chunks: new Map(stored.map((chunk) => [chunk.id, chunk])),
      chunkCount: stored.length,
      builtAt: Date.now(),
    };
  }

  private async discardStaging(collection: string): Promise<void> {
    try {
      await this.vectorStore.dropCollection(collection);
    } catch (error) {
      logger.error('[IndexBuilder] Failed to drop staging collection', { collection, error });
    }
  }
}
