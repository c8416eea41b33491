/**
 * @file interfaces/index - Service interface entrypoint
 * @description Re-exports service contracts for dependency injection
 * @depends ServiceContainer
 */

// ====== AI Services ======
export type {
  IAIService,
  AIConfig,
  AIMessage,
  GenerateOptions,
  StreamChunk,
} from './IAIService';

// ====== Knowledge ======
export type { IEmbeddingService, EmbedBatchOptions } from './IEmbeddingService';
export type { IVectorStore } from './IVectorStore';
export type { IRetriever } from './IRetriever';

// ====== Conversation ======
export type { IContextProvider, AuxiliaryContext } from './IContextProvider';
export type { IChatOrchestrator, OrchestratorState, QueryOptions } from './IChatOrchestrator';
export type { IRagService } from './IRagService';

// ====== Configuration ======
export type { IConfigManager } from './IConfigManager';
