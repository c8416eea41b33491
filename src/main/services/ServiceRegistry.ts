/**
 * @file ServiceRegistry - Engine service registration
 * @description Registers every engine service from a resolved EngineConfig.
 * @depends ServiceContainer, EngineConfig, all service factories
 * @sideeffect Populates the given ServiceContainer with service instances
 */

import type { EngineConfig } from './EngineConfig';
import { createLogger } from './LoggerService';
import { ServiceNames, type ServiceContainer } from './ServiceContainer';

const logger = createLogger('ServiceRegistry');

// ====== Service Factory Imports ======

import { createAIService } from './AIService';
import { RagService } from './RagService';
import { ChatOrchestrator, ChatSessionStore } from './chat';
import { VisualContextProvider } from './context/VisualContextProvider';
import type {
  IAIService,
  IChatOrchestrator,
  IContextProvider,
  IEmbeddingService,
  IRagService,
  IVectorStore,
} from './interfaces';
import {
  Chunker,
  EmbeddingService,
  HybridRetriever,
  IndexBuilder,
  Tokenizer,
  VectorStore,
} from './knowledge';
import { ToneConverter } from './tone';

// ====== Service Registration ======

/**
 * Register all engine services. Nothing is constructed until first use, so a container
 * can be populated and then have single entries swapped for fakes.
 */
export function registerServices(container: ServiceContainer, config: EngineConfig): void {
  logger.info('[ServiceRegistry] Registering services...');

  container.registerInstance(ServiceNames.CONFIG, config);

  // ====== Model Clients ======

  container.registerSingleton<IAIService>(ServiceNames.AI, () =>
    createAIService({
      provider: config.llm.provider,
      apiKey: config.llm.apiKey,
      baseUrl: config.llm.baseUrl,
      model: config.llm.model,
      maxTokens: config.llm.maxTokens,
    })
  );
  container.registerSingleton<IEmbeddingService>(
    ServiceNames.EMBEDDING,
    () => new EmbeddingService(config.embedding)
  );

  // ====== Knowledge ======

  container.registerSingleton<IVectorStore>(
    ServiceNames.VECTOR_STORE,
    () => new VectorStore(config.indexing.dbPath)
  );
  container.registerSingleton(
    ServiceNames.INDEX_BUILDER,
    (c) =>
      new IndexBuilder(
        c.get<IEmbeddingService>(ServiceNames.EMBEDDING),
        c.get<IVectorStore>(ServiceNames.VECTOR_STORE),
        new Tokenizer(),
        { sparse: { maxFeatures: config.indexing.sparseMaxFeatures } }
      )
  );
  container.registerSingleton(
    ServiceNames.HYBRID_RETRIEVER,
    (c) =>
      new HybridRetriever(
        c.get<IEmbeddingService>(ServiceNames.EMBEDDING),
        c.get<IVectorStore>(ServiceNames.VECTOR_STORE),
        config.retrieval
      )
  );

  // ====== Conversation ======

  container.registerSingleton(
    ServiceNames.SESSION_STORE,
    () => new ChatSessionStore(config.session.maxHistory)
  );
  container.registerSingleton<IContextProvider>(
    ServiceNames.CONTEXT_PROVIDER,
    () => new VisualContextProvider(config.context.serviceUrl)
  );
  container.registerSingleton<IChatOrchestrator>(
    ServiceNames.CHAT_ORCHESTRATOR,
    (c) =>
      new ChatOrchestrator(
        {
          aiService: c.get<IAIService>(ServiceNames.AI),
          retriever: c.get<HybridRetriever>(ServiceNames.HYBRID_RETRIEVER),
          contextProvider: c.get<IContextProvider>(ServiceNames.CONTEXT_PROVIDER),
          sessionStore: c.get<ChatSessionStore>(ServiceNames.SESSION_STORE),
          toneConverter: new ToneConverter(
            c.get<IAIService>(ServiceNames.AI),
            config.prompt.appearancePercentage
          ),
        },
        {
          topK: config.retrieval.topK,
          contextFetchTimeoutMs: config.context.fetchTimeoutMs,
          maxContextLength: config.prompt.maxContextLength,
        }
      )
  );

  // ====== Facade ======

  container.registerSingleton<IRagService>(
    ServiceNames.RAG,
    (c) =>
      new RagService({
        aiService: c.get<IAIService>(ServiceNames.AI),
        embedding: c.get<IEmbeddingService>(ServiceNames.EMBEDDING),
        vectorStore: c.get<IVectorStore>(ServiceNames.VECTOR_STORE),
        indexBuilder: c.get<IndexBuilder>(ServiceNames.INDEX_BUILDER),
        retriever: c.get<HybridRetriever>(ServiceNames.HYBRID_RETRIEVER),
        sessionStore: c.get<ChatSessionStore>(ServiceNames.SESSION_STORE),
        orchestrator: c.get<IChatOrchestrator>(ServiceNames.CHAT_ORCHESTRATOR),
        toneConverter: new ToneConverter(
          c.get<IAIService>(ServiceNames.AI),
          config.prompt.appearancePercentage
        ),
        chunker: new Chunker({
          chunkSize: config.indexing.chunkSize,
          chunkOverlap: config.indexing.chunkOverlap,
        }),
      })
  );

  logger.info(
    '[ServiceRegistry] Services registered:',
    container.getRegisteredServices().join(', ')
  );
}

// ====== Service Lifecycle ======

/**
 * Dispose everything the container created, newest first.
 * @sideeffect Aborts running streams and closes the database
 */
export async function shutdownServices(container: ServiceContainer): Promise<void> {
  logger.info('[ServiceRegistry] Shutting down services...');
  await container.dispose();
  logger.info('[ServiceRegistry] Services shutdown complete');
}

// ====== Type-Safe Service Getters ======

export function getRagService(container: ServiceContainer): IRagService {
  return container.get<IRagService>(ServiceNames.RAG);
}

export function getEngineConfig(container: ServiceContainer): EngineConfig {
  return container.get<EngineConfig>(ServiceNames.CONFIG);
}
