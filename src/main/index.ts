/**
 * @file index.ts - Engine entry
 * @description Builds a ready engine from the persisted configuration and re-exports the
 *   public surface for embedding in other processes.
 * @depends ConfigManager, ServiceRegistry
 */

import { getConfigManager } from './services/ConfigManager';
import type { EngineConfig } from './services/EngineConfig';
import { createLogger } from './services/LoggerService';
import { ServiceContainer } from './services/ServiceContainer';
import { getRagService, registerServices, shutdownServices } from './services/ServiceRegistry';
import type { IRagService } from './services/interfaces/IRagService';

const logger = createLogger('Engine');

export interface Engine {
  rag: IRagService;
  config: EngineConfig;
  container: ServiceContainer;
  /** Whether a persisted index was loaded */
  ragInitialized: boolean;
  shutdown(): Promise<void>;
}

export interface CreateEngineOptions {
  /** Resolved from the config store and DOCENT_* variables when omitted */
  config?: EngineConfig;
  /** Skip loading the persisted index */
  skipInitialize?: boolean;
}

export async function createEngine(options: CreateEngineOptions = {}): Promise<Engine> {
  const config = options.config ?? getConfigManager().getEngineConfig();
  const container = new ServiceContainer();
  registerServices(container, config);

  const rag = getRagService(container);
  const ragInitialized = options.skipInitialize ? false : await rag.initialize();

  logger.info('[Engine] Ready', {
    llm: `${config.llm.provider}/${config.llm.model}`,
    embedding: `${config.embedding.provider}/${config.embedding.model}`,
    ragInitialized,
  });

  let stopped: Promise<void> | null = null;
  return {
    rag,
    config,
    container,
    ragInitialized,
    shutdown: () => {
      stopped ??= shutdownServices(container);
      return stopped;
    },
  };
}

// ====== Public Surface ======

export { getConfigManager } from './services/ConfigManager';
export { engineConfigSchema, type EngineConfig } from './services/EngineConfig';
export {
  ContextFetchTimeout,
  EngineError,
  GenerationFailed,
  IndexBuildFailed,
  InvalidRequest,
  RetrievalUnavailable,
} from './services/errors';
export type { IRagService } from './services/interfaces/IRagService';
export { RagService } from './services/RagService';
export { Chunker } from './services/knowledge/processors/Chunker';
export { DocumentLoader } from './services/knowledge/processors/DocumentLoader';
export { ToneSelector, parseTone } from './services/tone/ToneSelector';
export type * from '../../shared/types/chat';
export type { ToneId, ToneWireName } from '../../shared/types/tone';
