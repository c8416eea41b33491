/**
 * @file RagService - Engine facade
 * @description Caller surface over the orchestrator, the tone converter, the session store and
 *   the index pipeline (DocumentLoader → Chunker → IndexBuilder → HybridRetriever).
 * @depends IChatOrchestrator, ToneConverter, ChatSessionStore, IndexBuilder, HybridRetriever
 * @implements IRagService
 */

import type {
  BuildIndexResult,
  ClearHistoryResult,
  CloseSessionResult,
  HealthResult,
  HistoryResult,
  QueryRequestInput,
  QueryStreamChunk,
  ToneConversionRequest,
  ToneConversionResult,
  WarmupResult,
  WarmupStep,
} from '../../../shared/types/chat';
import { WARMUP_TEMPERATURE } from '../../../shared/types/defaults';
import { TONE_WIRE_NAMES } from '../../../shared/types/tone';
import { LinkedAbortSource, isCancellationError } from '../../../shared/utils/cancellation';
import { createLogger } from './LoggerService';
import type { ChatSessionStore } from './chat/ChatSessionStore';
import { GenerationFailed, IndexBuildFailed, InvalidRequest, toErrorPayload } from './errors';
import type { IAIService } from './interfaces/IAIService';
import type { IChatOrchestrator } from './interfaces/IChatOrchestrator';
import type { IEmbeddingService } from './interfaces/IEmbeddingService';
import type { IRagService } from './interfaces/IRagService';
import type { IVectorStore } from './interfaces/IVectorStore';
import type { IndexBuilder } from './knowledge/IndexBuilder';
import { Chunker } from './knowledge/processors/Chunker';
import { DocumentLoader } from './knowledge/processors/DocumentLoader';
import type { HybridRetriever } from './knowledge/retrieval/HybridRetriever';
import type { ToneConversionInput, ToneConverter } from './tone/ToneConverter';
import { parseTone } from './tone/ToneSelector';

const logger = createLogger('RagService');

const DEFAULT_CONVERSION_TONE = 'child_friendly';
const EMBEDDING_WARMUP_QUERY = 'ITRI warmup test';
const LLM_WARMUP_SYSTEM_PROMPT = "You are a helpful assistant. Respond with just 'OK'.";
const LLM_WARMUP_MAX_TOKENS = 16;

export interface RagServiceDeps {
  aiService: IAIService;
  embedding: IEmbeddingService;
  vectorStore: IVectorStore;
  indexBuilder: IndexBuilder;
  retriever: HybridRetriever;
  sessionStore: ChatSessionStore;
  orchestrator: IChatOrchestrator;
  toneConverter: ToneConverter;
  chunker?: Chunker;
  documentLoader?: DocumentLoader;
}

function elapsedSince(start: number): number {
  return Math.round((performance.now() - start) * 100) / 100;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class RagService implements IRagService {
  private readonly chunker: Chunker;
  private readonly documentLoader: DocumentLoader;
  private building: Promise<BuildIndexResult> | null = null;
  private readonly conversions = new Set<LinkedAbortSource>();

  constructor(private readonly deps: RagServiceDeps) {
    this.chunker = deps.chunker ?? new Chunker();
    this.documentLoader = deps.documentLoader ?? new DocumentLoader();
  }

  // ====== Lifecycle ======

  async initialize(): Promise<boolean> {
    try {
      const snapshot = await this.deps.indexBuilder.load();
      this.deps.retriever.setSnapshot(snapshot);
      if (!snapshot) {
        logger.warn('[RagService] No index found; answering without retrieved context');
        return false;
      }
      logger.info('[RagService] Initialized', {
        collection: snapshot.collection,
        chunks: snapshot.chunkCount,
      });
      return true;
    } catch (error) {
      logger.error('[RagService] Index load failed; answering without retrieved context', error);
      this.deps.retriever.setSnapshot(null);
      return false;
    }
  }

  dispose(): void {
    for (const source of this.conversions) {
      source.abort();
    }
    this.conversions.clear();
    logger.info('[RagService] Disposed');
  }

  // ====== Query ======

  query(request: QueryRequestInput, signal?: AbortSignal): AsyncGenerator<QueryStreamChunk> {
    return this.deps.orchestrator.query(request, { signal });
  }

  // ====== Tone Conversion ======

  convertTone(
    request: ToneConversionRequest & { stream: false },
    signal?: AbortSignal
  ): Promise<ToneConversionResult>;
  convertTone(
    request: ToneConversionRequest & { stream?: true },
    signal?: AbortSignal
  ): AsyncGenerator<QueryStreamChunk>;
  convertTone(
    request: ToneConversionRequest,
    signal?: AbortSignal
  ): Promise<ToneConversionResult> | AsyncGenerator<QueryStreamChunk> {
    if (request.stream === false) {
      return this.convertToneBuffered(request, signal);
    }
    return this.convertToneStreamed(request, signal);
  }

  private toConversionInput(request: ToneConversionRequest): ToneConversionInput {
    const text = request.text.trim();
    if (!text) {
      throw new InvalidRequest('text must not be empty', ['text: text must not be empty']);
    }
    return {
      text,
      tone: parseTone(request.tone ?? DEFAULT_CONVERSION_TONE),
      userDescription: request.userDescription,
      userMessage: request.userMessage,
      isFirstMessage: false,
    };
  }

  private async convertToneBuffered(
    request: ToneConversionRequest,
    signal?: AbortSignal
  ): Promise<ToneConversionResult> {
    const input = this.toConversionInput(request);
    const convertedText = await this.deps.toneConverter.convert(input, signal);

    return {
      success: true,
      originalText: input.text,
      convertedText,
      tone: TONE_WIRE_NAMES[input.tone],
      userDescription: request.userDescription ?? '',
    };
  }

  private async *convertToneStreamed(
    request: ToneConversionRequest,
    signal?: AbortSignal
  ): AsyncGenerator<QueryStreamChunk> {
    const source = new LinkedAbortSource(signal);
    this.conversions.add(source);

    try {
      const input = this.toConversionInput(request);
      let converted = '';

      for await (const token of this.deps.toneConverter.streamTokens(input, source.signal)) {
        converted += token;
        yield { type: 'token', content: token };
      }

      if (source.aborted) {
        return;
      }
      if (!converted.trim()) {
        throw new GenerationFailed('Tone conversion returned an empty response');
      }
      yield { type: 'end' };
    } catch (error) {
      if (source.aborted || isCancellationError(error)) {
        return;
      }
      logger.error('[RagService] Tone conversion failed', error);
      yield { type: 'error', error: toErrorPayload(error) };
    } finally {
      this.conversions.delete(source);
      source.dispose(true);
    }
  }

  // ====== Sessions ======

  async getHistory(sessionId: string): Promise<HistoryResult> {
    const history = await this.deps.sessionStore.getHistory(sessionId);
    return { sessionId, history, messageCount: history.length };
  }

  async clearHistory(sessionId: string): Promise<ClearHistoryResult> {
    const cleared = await this.deps.sessionStore.clear(sessionId);
    return { sessionId, cleared };
  }

  async closeSession(sessionId: string): Promise<CloseSessionResult> {
    const { existed, cleared } = await this.deps.sessionStore.close(sessionId);
    return { success: true, sessionId, sessionExisted: existed, messagesCleared: cleared };
  }

  // ====== Indexing ======

  /**
   * @throws InvalidRequest while another build is running
   */
  async buildIndex(sourceDir: string, signal?: AbortSignal): Promise<BuildIndexResult> {
    if (this.building) {
      throw new InvalidRequest('An index build is already running');
    }

    this.building = this.runBuild(sourceDir, signal);
    try {
      return await this.building;
    } finally {
      this.building = null;
    }
  }

  private async runBuild(sourceDir: string, signal?: AbortSignal): Promise<BuildIndexResult> {
    let documents;
    try {
      documents = await this.documentLoader.loadDirectory(sourceDir);
    } catch (error) {
      throw new IndexBuildFailed(`Cannot read ${sourceDir}: ${messageOf(error)}`, error);
    }
    if (documents.length === 0) {
      throw new IndexBuildFailed(`No documents found in ${sourceDir}`);
    }

    const chunks = this.chunker.chunkAll(documents);
    const snapshot = await this.deps.indexBuilder.build(chunks, signal);
    this.deps.retriever.setSnapshot(snapshot);

    const result: BuildIndexResult = {
      collection: snapshot.collection,
      documentCount: documents.length,
      chunkCount: snapshot.chunkCount,
      vocabularySize: snapshot.sparse.vocabularySize,
    };
    logger.info('[RagService] Index built', result);
    return result;
  }

  // ====== Probes ======

  health(): HealthResult {
    const snapshot = this.deps.retriever.getSnapshot();
    return {
      status: 'healthy',
      ragInitialized: snapshot !== null,
      chunkCount: snapshot?.chunkCount ?? 0,
      timestamp: new Date().toISOString(),
    };
  }

  async warmup(): Promise<WarmupResult> {
    const embeddingModel = await this.warmupEmbedding();
    const llmModel = await this.warmupLLM();
    const overallSuccess =
      (embeddingModel.status === 'success' || embeddingModel.status === 'skipped') &&
      llmModel.status === 'success';

    logger.info('[RagService] Warmup finished', {
      embedding: embeddingModel.status,
      llm: llmModel.status,
      overallSuccess,
    });
    return { embeddingModel, llmModel, overallSuccess };
  }

  private async warmupEmbedding(): Promise<WarmupStep> {
    const snapshot = this.deps.retriever.getSnapshot();
    if (!snapshot) {
      return { status: 'skipped', message: 'RAG system not initialized', timeMs: 0 };
    }

    const start = performance.now();
    try {
      const vector = await this.deps.embedding.embed(EMBEDDING_WARMUP_QUERY);
      await this.deps.vectorStore.queryByVector(snapshot.collection, vector, 1);
      return {
        status: 'success',
        message: `Embedding model ${this.deps.embedding.getModel()} warmed up`,
        timeMs: elapsedSince(start),
      };
    } catch (error) {
      logger.warn('[RagService] Embedding warmup failed', { error: messageOf(error) });
      return {
        status: 'error',
        message: `Embedding warmup failed: ${messageOf(error)}`,
        timeMs: elapsedSince(start),
      };
    }
  }

  private async warmupLLM(): Promise<WarmupStep> {
    const start = performance.now();
    try {
      const reply = await this.deps.aiService.generate(
        [
          { role: 'system', content: LLM_WARMUP_SYSTEM_PROMPT },
          { role: 'user', content: 'Warmup test' },
        ],
        { temperature: WARMUP_TEMPERATURE, maxOutputTokens: LLM_WARMUP_MAX_TOKENS }
      );
      if (!reply.trim()) {
        return {
          status: 'error',
          message: 'LLM returned an empty response',
          timeMs: elapsedSince(start),
        };
      }
      return { status: 'success', message: 'LLM model warmed up', timeMs: elapsedSince(start) };
    } catch (error) {
      logger.warn('[RagService] LLM warmup failed', { error: messageOf(error) });
      return {
        status: 'error',
        message: `LLM warmup failed: ${messageOf(error)}`,
        timeMs: elapsedSince(start),
      };
    }
  }
}
