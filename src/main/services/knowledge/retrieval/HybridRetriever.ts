/**
 * @file HybridRetriever - Hybrid Retriever
 * @description Fuses dense vector similarity with sparse TF-IDF cosine. Scores are min-max
 *   normalised per query over the candidate union, then weighted (dense 0.7, sparse 0.3 by default).
 * @depends IEmbeddingService, IVectorStore, SparseIndex, QuestionDetector
 */

import {
  DEFAULT_DENSE_WEIGHT,
  DEFAULT_OVER_FETCH_FACTOR,
  DEFAULT_TOP_K,
} from '../../../../../shared/types/defaults';
import { isCancellationError } from '../../../../../shared/utils/cancellation';
import { createLogger } from '../../LoggerService';
import { InvalidRequest, RetrievalUnavailable } from '../../errors';
import type { IEmbeddingService } from '../../interfaces/IEmbeddingService';
import type { IRetriever } from '../../interfaces/IRetriever';
import type { IVectorStore } from '../../interfaces/IVectorStore';
import type {
  ChunkFilter,
  ChunkMetadata,
  IndexSnapshot,
  RetrievalResult,
  VectorMatch,
} from '../types';
import { QuestionDetector } from './QuestionDetector';

const logger = createLogger('HybridRetriever');

// ==================== Type Definitions ====================

export interface HybridRetrieverConfig {
  topK: number;
  /** Candidates fetched per source = topK * overFetchFactor; at least 2 */
  overFetchFactor: number;
  /** Sparse weight is 1 - denseWeight */
  denseWeight: number;
}

export const DEFAULT_HYBRID_CONFIG: HybridRetrieverConfig = {
  topK: DEFAULT_TOP_K,
  overFetchFactor: DEFAULT_OVER_FETCH_FACTOR,
  denseWeight: DEFAULT_DENSE_WEIGHT,
};

interface Candidate {
  chunkId: string;
  text: string;
  metadata: ChunkMetadata;
  dense: number | null;
  denseRank: number;
  sparse: number;
  sparseRank: number;
}

// ==================== Normalisation ====================

interface Range {
  min: number;
  max: number;
}

function rangeOf(values: number[]): Range | null {
  if (values.length === 0) {
    return null;
  }
  return { min: Math.min(...values), max: Math.max(...values) };
}

const isQaPair: ChunkFilter = (metadata) => metadata.isQaPair === true;

/** Min-max into [0, 1]; a flat range maps to 1 when positive, else 0 */
export function normalizeScore(value: number, range: Range): number {
  if (range.max === range.min) {
    return range.max > 0 ? 1 : 0;
  }
  return (value - range.min) / (range.max - range.min);
}

// ==================== Retriever ====================

export class HybridRetriever implements IRetriever {
  private config: HybridRetrieverConfig;
  private snapshot: IndexSnapshot | null = null;

  /**
   * @throws InvalidRequest for an over-fetch factor below 2 or a weight outside [0, 1]
   */
  constructor(
    private readonly embedding: IEmbeddingService,
    private readonly vectorStore: IVectorStore,
    config: Partial<HybridRetrieverConfig> = {},
    private readonly questionDetector: QuestionDetector = new QuestionDetector()
  ) {
    this.config = { ...DEFAULT_HYBRID_CONFIG, ...config };

    if (!Number.isInteger(this.config.overFetchFactor) || this.config.overFetchFactor < 2) {
      throw new InvalidRequest(
        `overFetchFactor must be an integer >= 2, got ${this.config.overFetchFactor}`
      );
    }
    if (this.config.denseWeight < 0 || this.config.denseWeight > 1) {
      throw new InvalidRequest(`denseWeight must be within [0, 1], got ${this.config.denseWeight}`);
    }
  }

  setSnapshot(snapshot: IndexSnapshot | null): void {
    this.snapshot = snapshot;
    logger.info('[HybridRetriever] Index snapshot set', {
      collection: snapshot?.collection ?? null,
      chunks: snapshot?.chunkCount ?? 0,
    });
  }

  getSnapshot(): IndexSnapshot | null {
    return this.snapshot;
  }

  isReady(): boolean {
    return this.snapshot !== null;
  }

  /**
   * Ranked, deduplicated results, at most `topK`. Empty when no index is loaded.
   * @throws RetrievalUnavailable when the query cannot be embedded or the dense search fails
   */
  async search(
    query: string,
    topK = this.config.topK,
    signal?: AbortSignal
  ): Promise<RetrievalResult[]> {
    const snapshot = this.snapshot;
    if (!snapshot || !query.trim() || topK <= 0) {
      return [];
    }

    const fetchSize = topK * this.config.overFetchFactor;
    // Q/A pairs are filtered inside each source so they never crowd out other chunks
    const excludeQaPairs = this.questionDetector.isQuestion(query);
    const exclude = excludeQaPairs ? isQaPair : undefined;

    const dense = await this.denseSearch(snapshot.collection, query, fetchSize, exclude, signal);

    const sparseQuery = snapshot.sparse.vectorize(query);
    const sparseExclude = exclude
      ? (id: string): boolean => {
          const chunk = snapshot.chunks.get(id);
          return chunk !== undefined && exclude(chunk.metadata);
        }
      : undefined;
    const sparseMatches = snapshot.sparse.search(sparseQuery, fetchSize, sparseExclude);

    const candidates = new Map<string, Candidate>();

    dense.forEach((match, rank) => {
      const existing = candidates.get(match.id);
      if (existing) {
        existing.dense = Math.max(existing.dense ?? match.score, match.score);
        return;
      }
      candidates.set(match.id, {
        chunkId: match.id,
        text: match.text,
        metadata: match.metadata,
        dense: match.score,
        denseRank: rank,
        sparse: 0,
        sparseRank: Number.POSITIVE_INFINITY,
      });
    });

    sparseMatches.forEach((match, rank) => {
      const existing = candidates.get(match.id);
      if (existing) {
        existing.sparseRank = Math.min(existing.sparseRank, rank);
        return;
      }
      const chunk = snapshot.chunks.get(match.id);
      if (!chunk) {
        return;
      }
      candidates.set(match.id, {
        chunkId: match.id,
        text: chunk.text,
        metadata: chunk.metadata,
        dense: null,
        denseRank: Number.POSITIVE_INFINITY,
        sparse: 0,
        sparseRank: rank,
      });
    });

    // Sparse scores are local, so every candidate gets an exact one
    for (const candidate of candidates.values()) {
      candidate.sparse = snapshot.sparse.score(sparseQuery, candidate.chunkId);
    }

    const results = this.rank([...candidates.values()]).slice(0, topK);

    logger.debug('[HybridRetriever] Search complete', {
      dense: dense.length,
      sparse: sparseMatches.length,
      union: candidates.size,
      returned: results.length,
      excludeQaPairs,
    });

    return results;
  }

  private async denseSearch(
    collection: string,
    query: string,
    k: number,
    exclude: ChunkFilter | undefined,
    signal?: AbortSignal
  ): Promise<VectorMatch[]> {
    let vector: number[];
    try {
      vector = await this.embedding.embed(query, signal);
    } catch (error) {
      if (isCancellationError(error)) {
        throw error;
      }
      throw new RetrievalUnavailable(
        `Query embedding failed: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }

    try {
      return await this.vectorStore.queryByVector(collection, vector, k, exclude);
    } catch (error) {
      throw new RetrievalUnavailable(
        `Dense search failed: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }
  }

  private rank(candidates: Candidate[]): RetrievalResult[] {
    const denseRange = rangeOf(
      candidates.flatMap((candidate) => (candidate.dense === null ? [] : [candidate.dense]))
    );
    const sparseRange = rangeOf(candidates.map((candidate) => candidate.sparse));
    const sparseWeight = 1 - this.config.denseWeight;

    return candidates
      .map((candidate) => {
        const normDense =
          candidate.dense === null || !denseRange ? 0 : normalizeScore(candidate.dense, denseRange);
        const normSparse = sparseRange ? normalizeScore(candidate.sparse, sparseRange) : 0;
        return {
          candidate,
          result: {
            chunkId: candidate.chunkId,
            text: candidate.text,
            metadata: candidate.metadata,
            denseScore: candidate.dense ?? 0,
            sparseScore: candidate.sparse,
            combinedScore: this.config.denseWeight * normDense + sparseWeight * normSparse,
          },
        };
      })
      .sort(
        (a, b) =>
          b.result.combinedScore - a.result.combinedScore ||
          a.candidate.denseRank - b.candidate.denseRank ||
          a.candidate.sparseRank - b.candidate.sparseRank
      )
      .map(({ result }) => result);
  }
}
