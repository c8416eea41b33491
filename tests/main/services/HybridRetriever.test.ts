/**
 * @file HybridRetriever.test.ts - Dense + sparse fusion tests
 * @description Min-max normalisation, weighted fusion order, deduplication, Q/A exclusion for
 *   question-phrased queries and degraded behaviour without an index or dense backend.
 */

import { beforeEach, describe, expect, it } from 'vitest';
import { InvalidRequest, RetrievalUnavailable } from '../../../src/main/services/errors';
import { IndexBuilder } from '../../../src/main/services/knowledge/IndexBuilder';
import {
  HybridRetriever,
  normalizeScore,
} from '../../../src/main/services/knowledge/retrieval/HybridRetriever';
import { Tokenizer } from '../../../src/main/services/knowledge/sparse/Tokenizer';
import type { Chunk } from '../../../src/main/services/knowledge/types';
import { FakeEmbeddingService, InMemoryVectorStore } from '../../setup/mocks';

function chunk(id: string, text: string, qa?: { question: string; answer: string }): Chunk {
  return {
    id,
    text,
    sourceFile: 'guide.txt',
    index: 0,
    language: 'en',
    metadata: qa
      ? { length: text.length, sentenceCount: 2, isQaPair: true, ...qa }
      : { length: text.length, sentenceCount: 1 },
  };
}

const FOUNDING = chunk('founding', 'ITRI was founded in 1973 in Hsinchu.');
const MUSEUM = chunk('museum', 'The museum opens at nine every morning.');
const FOUNDING_QA = chunk('founding-qa', 'Question: When was ITRI founded?\nAnswer: In 1973.', {
  question: 'When was ITRI founded?',
  answer: 'In 1973.',
});

describe('normalizeScore', () => {
  it('should map the range onto [0, 1]', () => {
    expect(normalizeScore(2, { min: 2, max: 6 })).toBe(0);
    expect(normalizeScore(4, { min: 2, max: 6 })).toBe(0.5);
    expect(normalizeScore(6, { min: 2, max: 6 })).toBe(1);
  });

  it('should map a flat range to 1 when positive and 0 otherwise', () => {
    expect(normalizeScore(0.4, { min: 0.4, max: 0.4 })).toBe(1);
    expect(normalizeScore(0, { min: 0, max: 0 })).toBe(0);
  });
});

describe('HybridRetriever', () => {
  let embedding: FakeEmbeddingService;
  let store: InMemoryVectorStore;
  let retriever: HybridRetriever;

  async function index(chunks: Chunk[]): Promise<void> {
    const builder = new IndexBuilder(embedding, store, new Tokenizer(['ITRI']), {
      retries: 0,
      retryDelayMs: 0,
    });
    retriever.setSnapshot(await builder.build(chunks));
  }

  beforeEach(() => {
    embedding = new FakeEmbeddingService()
      .set(FOUNDING.text, [0.9, 0.1, 0])
      .set(MUSEUM.text, [0, 1, 0])
      .set(FOUNDING_QA.text, [1, 0, 0]);
    store = new InMemoryVectorStore();
    retriever = new HybridRetriever(embedding, store);
  });

  it('should reject an over-fetch factor below 2 and weights outside [0, 1]', () => {
    expect(() => new HybridRetriever(embedding, store, { overFetchFactor: 1 })).toThrow(
      InvalidRequest
    );
    expect(() => new HybridRetriever(embedding, store, { denseWeight: 1.5 })).toThrow(
      InvalidRequest
    );
  });

  it('should return nothing and not embed while no index is loaded', async () => {
    expect(retriever.isReady()).toBe(false);
    expect(await retriever.search('When was ITRI founded?')).toEqual([]);
    expect(embedding.embedCalls).toEqual([]);
  });

  it('should return nothing for a blank query or a non-positive topK', async () => {
    await index([FOUNDING, MUSEUM]);

    expect(await retriever.search('   ')).toEqual([]);
    expect(await retriever.search('ITRI', 0)).toEqual([]);
  });

  it('should rank the founding passage first for the founding question', async () => {
    await index([FOUNDING, MUSEUM, FOUNDING_QA]);
    embedding.set('When was ITRI founded?', [1, 0, 0]);

    const results = await retriever.search('When was ITRI founded?', 3);

    expect(results[0].chunkId).toBe('founding');
  });

  it('should hide verbatim Q/A chunks from question-phrased queries', async () => {
    await index([FOUNDING, MUSEUM, FOUNDING_QA]);
    embedding.set('When was ITRI founded?', [1, 0, 0]);

    const results = await retriever.search('When was ITRI founded?', 3);

    expect(results.map((r) => r.chunkId)).toEqual(['founding', 'museum']);
  });

  it('should not let Q/A chunks take every candidate slot of a question', async () => {
    const pairs = Array.from({ length: 6 }, (_, i) =>
      chunk(`qa-${i}`, `Question: When was ITRI founded? (${i})\nAnswer: In 1973.`, {
        question: 'When was ITRI founded?',
        answer: 'In 1973.',
      })
    );
    for (const pair of pairs) {
      embedding.set(pair.text, [1, 0, 0]);
    }
    await index([...pairs, MUSEUM]);
    embedding.set('When was ITRI founded?', [1, 0, 0]);

    const results = await retriever.search('When was ITRI founded?', 2);

    expect(results.map((r) => r.chunkId)).toEqual(['museum']);
  });

  it('should report a dimension mismatch as RetrievalUnavailable', async () => {
    await index([FOUNDING, MUSEUM]);
    embedding.set('museum', [1, 0]);

    await expect(retriever.search('museum')).rejects.toThrow(
      'Dense search failed: Query embedding has dimension 2, but the index expects embedding with dimension 3'
    );
  });

  it('should keep Q/A chunks for statement queries', async () => {
    await index([FOUNDING, MUSEUM, FOUNDING_QA]);
    embedding.set('ITRI founding year', [1, 0, 0]);

    const results = await retriever.search('ITRI founding year', 3);

    expect(results.map((r) => r.chunkId).sort()).toEqual(['founding', 'founding-qa', 'museum']);
    expect(results[2].chunkId).toBe('museum');
  });

  it('should return unique chunks in non-increasing combined score, at most topK', async () => {
    await index([FOUNDING, MUSEUM, FOUNDING_QA]);
    embedding.set('museum ITRI', [0.5, 0.5, 0]);

    const results = await retriever.search('museum ITRI', 2);
    const ids = results.map((r) => r.chunkId);

    expect(results).toHaveLength(2);
    expect(new Set(ids).size).toBe(ids.length);
    expect(results[0].combinedScore).toBeGreaterThanOrEqual(results[1].combinedScore);
  });

  it('should fuse normalised scores with the configured weights', async () => {
    await index([FOUNDING, MUSEUM]);
    embedding.set('museum hours', [0, 1, 0]);

    const [top, second] = await retriever.search('museum hours', 2);

    // museum: dense 1 → norm 1, sparse best → norm 1
    expect(top.chunkId).toBe('museum');
    expect(top.combinedScore).toBeCloseTo(1);
    // founding: lowest dense and zero sparse → norm 0 on both
    expect(second.chunkId).toBe('founding');
    expect(second.combinedScore).toBe(0);
    expect(second.sparseScore).toBe(0);
  });

  it('should weigh sparse only when the dense weight is 0', async () => {
    retriever = new HybridRetriever(embedding, store, { denseWeight: 0 });
    await index([FOUNDING, MUSEUM]);
    embedding.set('museum', [1, 0, 0]);

    const [top] = await retriever.search('museum', 1);

    expect(top.chunkId).toBe('museum');
    expect(top.combinedScore).toBe(1);
  });

  it('should raise RetrievalUnavailable when the query cannot be embedded', async () => {
    await index([FOUNDING, MUSEUM]);
    embedding.failure = new Error('connection refused');

    await expect(retriever.search('museum')).rejects.toBeInstanceOf(RetrievalUnavailable);
    await expect(retriever.search('museum')).rejects.toThrow(
      'Query embedding failed: connection refused'
    );
  });

  it('should raise RetrievalUnavailable when the dense search fails', async () => {
    await index([FOUNDING, MUSEUM]);
    store.failure = new Error('disk I/O error');

    await expect(retriever.search('museum')).rejects.toThrow('Dense search failed: disk I/O error');
  });

  it('should pass cancellation through unchanged', async () => {
    await index([FOUNDING, MUSEUM]);
    const controller = new AbortController();
    controller.abort();

    const attempt = retriever.search('museum', 2, controller.signal);

    await expect(attempt).rejects.not.toBeInstanceOf(RetrievalUnavailable);
  });
});
