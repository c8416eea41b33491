/**
 * @file RagService.test.ts
 * @description Engine facade over real components with in-process fakes for the model, the
 *   embedding service, the vector store and the vision service.
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { RagService } from '../../../src/main/services/RagService';
import { ChatOrchestrator } from '../../../src/main/services/chat/ChatOrchestrator';
import { ChatSessionStore } from '../../../src/main/services/chat/ChatSessionStore';
import { IndexBuildFailed, InvalidRequest } from '../../../src/main/services/errors';
import type { IAIService } from '../../../src/main/services/interfaces/IAIService';
import { IndexBuilder } from '../../../src/main/services/knowledge/IndexBuilder';
import { HybridRetriever } from '../../../src/main/services/knowledge/retrieval/HybridRetriever';
import { Tokenizer } from '../../../src/main/services/knowledge/sparse/Tokenizer';
import { ToneConverter } from '../../../src/main/services/tone/ToneConverter';
import {
  FakeEmbeddingService,
  InMemoryVectorStore,
  collect,
  createMockAIService,
  createMockContextProvider,
} from '../../setup/mocks';

describe('RagService', () => {
  let dir: string;
  let aiService: IAIService;
  let embedding: FakeEmbeddingService;
  let store: InMemoryVectorStore;
  let sessionStore: ChatSessionStore;
  let service: RagService;

  function createService(): RagService {
    const indexBuilder = new IndexBuilder(embedding, store, new Tokenizer([]), {
      retries: 0,
      retryDelayMs: 0,
    });
    const retriever = new HybridRetriever(embedding, store);
    const orchestrator = new ChatOrchestrator({
      aiService,
      retriever,
      contextProvider: createMockContextProvider(),
      sessionStore,
    });
    return new RagService({
      aiService,
      embedding,
      vectorStore: store,
      indexBuilder,
      retriever,
      sessionStore,
      orchestrator,
      toneConverter: new ToneConverter(aiService),
    });
  }

  async function writeCorpus(): Promise<void> {
    await writeFile(path.join(dir, 'guide.txt'), 'ITRI was founded in 1973. It is in Hsinchu.');
    await writeFile(
      path.join(dir, 'faq.json'),
      JSON.stringify([
        { question: 'When was ITRI founded?', answer: 'In 1973.' },
        { question: 'Where is ITRI?', answer: 'In Hsinchu.' },
      ])
    );
  }

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'docent-rag-'));
    aiService = createMockAIService({ answer: '(smiles) Hi there!' });
    embedding = new FakeEmbeddingService();
    store = new InMemoryVectorStore();
    sessionStore = new ChatSessionStore(10);
    service = createService();
  });

  afterEach(async () => {
    service.dispose();
    await rm(dir, { recursive: true, force: true });
  });

  // ====== Lifecycle and Indexing ======

  describe('initialize', () => {
    it('should report false when no index exists', async () => {
      expect(await service.initialize()).toBe(false);
      expect(service.health()).toMatchObject({ ragInitialized: false, chunkCount: 0 });
    });

    it('should report false when the store cannot be read', async () => {
      store.failure = new Error('database is locked');

      expect(await service.initialize()).toBe(false);
    });

    it('should restore an index built by an earlier instance', async () => {
      await writeCorpus();
      await service.buildIndex(dir);

      const restarted = createService();

      expect(await restarted.initialize()).toBe(true);
      expect(restarted.health()).toMatchObject({ ragInitialized: true, chunkCount: 3 });
    });
  });

  describe('buildIndex', () => {
    it('should load, chunk, index and activate the corpus', async () => {
      await writeCorpus();

      const result = await service.buildIndex(dir);

      expect(result.collection).toMatch(/^chunks_/);
      expect(result).toMatchObject({ documentCount: 2, chunkCount: 3 });
      expect(result.vocabularySize).toBeGreaterThan(0);
      expect(await store.getActiveCollection()).toBe(result.collection);
      expect(service.health()).toMatchObject({ ragInitialized: true, chunkCount: 3 });
    });

    it('should fail on a directory without documents', async () => {
      const attempt = service.buildIndex(dir);

      await expect(attempt).rejects.toBeInstanceOf(IndexBuildFailed);
      await expect(attempt).rejects.toThrow(`No documents found in ${dir}`);
    });

    it('should fail on a directory that cannot be read', async () => {
      const missing = path.join(dir, 'missing');

      await expect(service.buildIndex(missing)).rejects.toThrow(`Cannot read ${missing}: `);
    });

    it('should refuse a second build while one is running', async () => {
      await writeCorpus();

      const first = service.buildIndex(dir);
      const second = service.buildIndex(dir);

      await expect(second).rejects.toBeInstanceOf(InvalidRequest);
      await expect(second).rejects.toThrow('An index build is already running');
      await expect(first).resolves.toMatchObject({ chunkCount: 3 });
    });
  });

  describe('health', () => {
    it('should always report healthy with a timestamp', () => {
      const health = service.health();

      expect(health.status).toBe('healthy');
      expect(health.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T/);
    });
  });

  // ====== Query and Sessions ======

  describe('query and sessions', () => {
    it('should stream an answer and record the exchange', async () => {
      const chunks = await collect(service.query({ text: 'Hello?', sessionId: 'visitor-1' }));

      expect(chunks.at(-1)).toEqual({ type: 'end' });
      expect(await service.getHistory('visitor-1')).toEqual({
        sessionId: 'visitor-1',
        history: [
          { role: 'user', content: 'Hello?' },
          { role: 'assistant', content: 'Hello there!' },
        ],
        messageCount: 2,
      });
    });

    it('should clear and close a session', async () => {
      await sessionStore.appendExchange('visitor-1', 'q', 'a');

      expect(await service.clearHistory('visitor-1')).toEqual({ sessionId: 'visitor-1', cleared: 2 });
      expect(await service.closeSession('visitor-1')).toEqual({
        success: true,
        sessionId: 'visitor-1',
        sessionExisted: true,
        messagesCleared: 0,
      });
      expect(await service.closeSession('visitor-1')).toMatchObject({ sessionExisted: false });
    });
  });

  // ====== Tone Conversion ======

  describe('convertTone', () => {
    it('should return the buffered rewrite with the default tone', async () => {
      const result = await service.convertTone({ text: '  ITRI was founded in 1973. ', stream: false });

      expect(result).toEqual({
        success: true,
        originalText: 'ITRI was founded in 1973.',
        convertedText: '(smiles) Hi there!',
        tone: 'child_friendly',
        userDescription: '',
      });
    });

    it('should echo the requested tone and description', async () => {
      const result = await service.convertTone({
        text: 'Welcome.',
        tone: 'elder_friendly',
        userDescription: 'A man with a cane',
        stream: false,
      });

      expect(result).toMatchObject({ tone: 'elder_friendly', userDescription: 'A man with a cane' });
    });

    it('should reject an unknown tone', async () => {
      await expect(
        service.convertTone({ text: 'Welcome.', tone: 'shouty', stream: false })
      ).rejects.toBeInstanceOf(InvalidRequest);
    });

    it('should stream tokens and end', async () => {
      const chunks = await collect(service.convertTone({ text: 'Welcome.' }));

      expect(chunks).toEqual([
        { type: 'token', content: 'Hello ' },
        { type: 'token', content: 'there!' },
        { type: 'end' },
      ]);
    });

    it('should stream an error for empty text', async () => {
      const chunks = await collect(service.convertTone({ text: '   ' }));

      expect(chunks).toEqual([
        { type: 'error', error: { code: 'INVALID_REQUEST', message: 'text must not be empty' } },
      ]);
    });

    it('should stream an error when the rewrite is empty', async () => {
      aiService = createMockAIService({ streamChunks: [{ type: 'complete', content: '' }] });
      service = createService();

      const chunks = await collect(service.convertTone({ text: 'Welcome.' }));

      expect(chunks).toEqual([
        {
          type: 'error',
          error: {
            code: 'GENERATION_FAILED',
            message: 'Tone conversion returned an empty response',
          },
        },
      ]);
    });

    it('should stream an error when the rewrite stops without completing', async () => {
      aiService = createMockAIService({ streamChunks: [{ type: 'chunk', content: 'Wel' }] });
      service = createService();

      const chunks = await collect(service.convertTone({ text: 'Welcome.' }));

      expect(chunks).toEqual([
        { type: 'token', content: 'Wel' },
        {
          type: 'error',
          error: { code: 'GENERATION_FAILED', message: 'Tone conversion stopped before completing' },
        },
      ]);
    });
  });

  // ====== Warmup ======

  describe('warmup', () => {
    it('should skip the embedding step without an index', async () => {
      const result = await service.warmup();

      expect(result.embeddingModel).toEqual({
        status: 'skipped',
        message: 'RAG system not initialized',
        timeMs: 0,
      });
      expect(result.llmModel).toMatchObject({ status: 'success', message: 'LLM model warmed up' });
      expect(result.overallSuccess).toBe(true);
      expect(aiService.generate).toHaveBeenCalledWith(
        [
          { role: 'system', content: "You are a helpful assistant. Respond with just 'OK'." },
          { role: 'user', content: 'Warmup test' },
        ],
        { temperature: 0, maxOutputTokens: 16 }
      );
    });

    it('should exercise the embedding model once an index exists', async () => {
      await writeCorpus();
      await service.buildIndex(dir);

      const result = await service.warmup();

      expect(result.embeddingModel).toMatchObject({
        status: 'success',
        message: 'Embedding model fake-embed warmed up',
      });
      expect(embedding.embedCalls).toContain('ITRI warmup test');
    });

    it('should report each failure without throwing', async () => {
      await writeCorpus();
      await service.buildIndex(dir);
      embedding.failure = new Error('model not loaded');
      vi.mocked(aiService.generate).mockRejectedValue(new Error('rate limited'));

      const result = await service.warmup();

      expect(result.embeddingModel).toMatchObject({
        status: 'error',
        message: 'Embedding warmup failed: model not loaded',
      });
      expect(result.llmModel).toMatchObject({
        status: 'error',
        message: 'LLM warmup failed: rate limited',
      });
      expect(result.overallSuccess).toBe(false);
    });

    it('should report an embedding model whose dimension no longer matches the index', async () => {
      await writeCorpus();
      await service.buildIndex(dir);
      embedding.set('ITRI warmup test', [1, 0, 0]);

      const result = await service.warmup();

      expect(result.embeddingModel).toMatchObject({
        status: 'error',
        message:
          'Embedding warmup failed: Query embedding has dimension 3, but the index expects embedding with dimension 26',
      });
      expect(result.overallSuccess).toBe(false);
    });

    it('should treat an empty LLM reply as a failure', async () => {
      vi.mocked(aiService.generate).mockResolvedValue('  ');

      const result = await service.warmup();

      expect(result.llmModel).toMatchObject({
        status: 'error',
        message: 'LLM returned an empty response',
      });
      expect(result.overallSuccess).toBe(false);
    });
  });
});
