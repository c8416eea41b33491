/**
 * @file Configuration Keys
 * @description Unified configuration key management to prevent typos
 * @depends None (pure enum definitions)
 */

export enum ConfigKeys {
  // ====== Generation ======
  LLMProvider = 'llm.provider',
  LLMModel = 'llm.model',
  LLMBaseUrl = 'llm.baseUrl',
  LLMApiKey = 'llm.apiKey',
  LLMMaxTokens = 'llm.maxTokens',

  // ====== Embedding ======
  EmbeddingProvider = 'embedding.provider',
  EmbeddingModel = 'embedding.model',
  EmbeddingBaseUrl = 'embedding.baseUrl',
  EmbeddingApiKey = 'embedding.apiKey',
  EmbeddingDimensions = 'embedding.dimensions',

  // ====== Indexing ======
  ChunkSize = 'indexing.chunkSize',
  ChunkOverlap = 'indexing.chunkOverlap',
  SparseMaxFeatures = 'indexing.sparseMaxFeatures',
  DatabasePath = 'indexing.dbPath',

  // ====== Retrieval ======
  RetrievalTopK = 'retrieval.topK',
  RetrievalOverFetchFactor = 'retrieval.overFetchFactor',
  RetrievalDenseWeight = 'retrieval.denseWeight',

  // ====== Conversation ======
  SessionMaxHistory = 'session.maxHistory',
  MaxContextLength = 'prompt.maxContextLength',
  AppearancePercentage = 'prompt.appearancePercentage',

  // ====== Auxiliary Context ======
  ContextServiceUrl = 'context.serviceUrl',
  ContextFetchTimeoutMs = 'context.fetchTimeoutMs',
}
