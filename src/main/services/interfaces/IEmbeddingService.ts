/**
 * @file IEmbeddingService - Embedding backend contract
 * @description Text → vector, used at build time for chunks and at query time for the query
 * @depends EmbeddingService
 */

export interface EmbedBatchOptions {
  /** Texts per request; Ollama always sends one */
  batchSize?: number;
  signal?: AbortSignal;
}

export interface IEmbeddingService {
  /**
   * @throws Error when the backend is unreachable or answers with an invalid payload
   */
  embed(text: string, signal?: AbortSignal): Promise<number[]>;

  /** Vectors in input order */
  embedBatch(texts: string[], options?: EmbedBatchOptions): Promise<number[][]>;

  getModel(): string;

  testConnection(): Promise<{ success: boolean; message: string; dimensions?: number }>;
}
