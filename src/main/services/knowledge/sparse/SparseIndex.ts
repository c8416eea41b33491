/**
 * @file SparseIndex - TF-IDF index over unigrams and bigrams
 * @description Built in full from a chunk list, read-only afterwards.
 *   Weights are raw counts times smooth IDF `ln((1+N)/(1+df)) + 1`, L2-normalised per chunk,
 *   so the dot product of two vectors is their cosine.
 * @depends Tokenizer
 */

import { DEFAULT_SPARSE_MAX_FEATURES, SPARSE_MAX_DF, SPARSE_MIN_DF } from '../../../../../shared/types/defaults';
import { createLogger } from '../../LoggerService';
import type { Tokenizer } from './Tokenizer';

const logger = createLogger('SparseIndex');

// ====== Types ======

/** Column → weight */
export type SparseVector = Map<number, number>;

export interface SparseIndexOptions {
  maxFeatures: number;
  /** Terms in more than this share of chunks are dropped */
  maxDf: number;
  /** Terms in fewer chunks than this are dropped */
  minDf: number;
}

export interface SparseMatch {
  id: string;
  score: number;
}

export const DEFAULT_SPARSE_OPTIONS: SparseIndexOptions = {
  maxFeatures: DEFAULT_SPARSE_MAX_FEATURES,
  maxDf: SPARSE_MAX_DF,
  minDf: SPARSE_MIN_DF,
};

// ====== Helpers ======

/** Unigrams followed by adjacent-pair bigrams */
export function extractFeatures(tokens: readonly string[]): string[] {
  const features = [...tokens];
  for (let i = 0; i + 1 < tokens.length; i++) {
    features.push(`${tokens[i]} ${tokens[i + 1]}`);
  }
  return features;
}

function countFeatures(features: readonly string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const feature of features) {
    counts.set(feature, (counts.get(feature) ?? 0) + 1);
  }
  return counts;
}

function compareTerms(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

// ====== Index ======

export class SparseIndex {
  private constructor(
    private readonly tokenizer: Tokenizer,
    /** Term → column, columns in term order */
    readonly vocabulary: ReadonlyMap<string, number>,
    readonly idf: readonly number[],
    private readonly vectors: ReadonlyMap<string, SparseVector>
  ) {}

  static build(
    chunks: ReadonlyArray<{ id: string; text: string }>,
    tokenizer: Tokenizer,
    options: Partial<SparseIndexOptions> = {}
  ): SparseIndex {
    const { maxFeatures, maxDf, minDf } = { ...DEFAULT_SPARSE_OPTIONS, ...options };
    const total = chunks.length;

    const docCounts = chunks.map((chunk) => countFeatures(extractFeatures(tokenizer.tokenize(chunk.text))));

    const df = new Map<string, number>();
    const frequency = new Map<string, number>();
    for (const counts of docCounts) {
      for (const [term, count] of counts) {
        df.set(term, (df.get(term) ?? 0) + 1);
        frequency.set(term, (frequency.get(term) ?? 0) + count);
      }
    }

    const aboveMin = [...df.keys()].filter((term) => (df.get(term) ?? 0) >= minDf);
    let kept = aboveMin.filter((term) => (df.get(term) ?? 0) <= maxDf * total);
    if (kept.length === 0 && aboveMin.length > 0) {
      logger.warn('[SparseIndex] maxDf would empty the vocabulary, skipping it', {
        chunks: total,
        terms: aboveMin.length,
      });
      kept = aboveMin;
    }

    if (kept.length > maxFeatures) {
      kept = kept
        .sort(
          (a, b) => (frequency.get(b) ?? 0) - (frequency.get(a) ?? 0) || compareTerms(a, b)
        )
        .slice(0, maxFeatures);
    }

    const vocabulary = new Map<string, number>();
    const idf: number[] = [];
    for (const term of kept.sort(compareTerms)) {
      vocabulary.set(term, idf.length);
      idf.push(Math.log((1 + total) / (1 + (df.get(term) ?? 0))) + 1);
    }

    const vectors = new Map<string, SparseVector>();
    chunks.forEach((chunk, i) => {
      vectors.set(chunk.id, SparseIndex.weigh(docCounts[i], vocabulary, idf));
    });

    logger.info('[SparseIndex] Built', { chunks: total, vocabularySize: vocabulary.size });
    return new SparseIndex(tokenizer, vocabulary, idf, vectors);
  }

  private static weigh(
    counts: ReadonlyMap<string, number>,
    vocabulary: ReadonlyMap<string, number>,
    idf: readonly number[]
  ): SparseVector {
    const vector: SparseVector = new Map();
    let norm = 0;
    for (const [term, count] of counts) {
      const column = vocabulary.get(term);
      if (column !== undefined) {
        const weight = count * idf[column];
        vector.set(column, weight);
        norm += weight * weight;
      }
    }
    if (norm > 0) {
      const length = Math.sqrt(norm);
      for (const [column, weight] of vector) {
        vector.set(column, weight / length);
      }
    }
    return vector;
  }

  get size(): number {
    return this.vectors.size;
  }

  get vocabularySize(): number {
    return this.vocabulary.size;
  }

  has(id: string): boolean {
    return this.vectors.has(id);
  }

  vectorize(text: string): SparseVector {
    const counts = countFeatures(extractFeatures(this.tokenizer.tokenize(text)));
    return SparseIndex.weigh(counts, this.vocabulary, this.idf);
  }

  /** Cosine between a query vector and one chunk; 0 for unknown ids */
  score(query: SparseVector, id: string): number {
    const vector = this.vectors.get(id);
    if (!vector || query.size === 0) {
      return 0;
    }
    const [small, large] = query.size <= vector.size ? [query, vector] : [vector, query];
    let dot = 0;
    for (const [column, weight] of small) {
      dot += weight * (large.get(column) ?? 0);
    }
    return dot;
  }

  /**
   * Chunks with a positive score, best first; equal scores keep build order.
   * Ids matching `exclude` are skipped before the limit applies.
   */
  search(query: SparseVector, limit: number, exclude?: (id: string) => boolean): SparseMatch[] {
    const matches: SparseMatch[] = [];
    for (const id of this.vectors.keys()) {
      if (exclude?.(id)) {
        continue;
      }
      const score = this.score(query, id);
      if (score > 0) {
        matches.push({ id, score });
      }
    }
    // Array.prototype.sort is stable
    return matches.sort((a, b) => b.score - a.score).slice(0, limit);
  }
}
