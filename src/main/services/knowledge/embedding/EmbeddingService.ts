/**
 * @file EmbeddingService - Text Vector Embedding Service
 * @description OpenAI-compatible and Ollama embedding clients with batching and an LRU cache
 * @depends EngineConfig, lru-cache, zod
 */

import { LRUCache } from 'lru-cache';
import { z } from 'zod';
import type { EngineConfig } from '../../EngineConfig';
import { createLogger } from '../../LoggerService';
import type { EmbedBatchOptions, IEmbeddingService } from '../../interfaces/IEmbeddingService';

const logger = createLogger('EmbeddingService');

export type EmbeddingConfig = EngineConfig['embedding'];

// ====== Response Schemas ======

const openAIEmbeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number().int(),
    })
  ),
  usage: z.object({ total_tokens: z.number() }).optional(),
});

const ollamaEmbeddingResponseSchema = z.object({
  embedding: z.array(z.number()).min(1),
});

const EMBEDDING_CACHE_OPTIONS = {
  max: 10000,
};

const DEFAULT_BATCH_SIZE = 10;

function trimTrailingSlash(url: string): string {
  return url.endsWith('/') ? url.slice(0, -1) : url;
}

export class EmbeddingService implements IEmbeddingService {
  private config: EmbeddingConfig;
  private cache = new LRUCache<string, number[]>(EMBEDDING_CACHE_OPTIONS);

  constructor(config: EmbeddingConfig) {
    this.config = { ...config };
  }

  getModel(): string {
    return this.config.model;
  }

  /**
   * Only defined values replace the current ones
   */
  updateConfig(config: Partial<EmbeddingConfig>): void {
    if (config.provider !== undefined) {
      this.config.provider = config.provider;
    }
    if (config.model !== undefined) {
      this.config.model = config.model;
    }
    if (config.baseUrl !== undefined) {
      this.config.baseUrl = config.baseUrl;
    }
    if (config.apiKey !== undefined) {
      this.config.apiKey = config.apiKey;
    }
    if (config.dimensions !== undefined) {
      this.config.dimensions = config.dimensions;
    }
    logger.info('[EmbeddingService] Configuration updated', {
      provider: this.config.provider,
      model: this.config.model,
      hasApiKey: !!this.config.apiKey,
    });
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const cacheKey = this.getCacheKey(text);
    const cached = this.cache.get(cacheKey);
    if (cached) {
      return cached;
    }

    const [embedding] = await this.callEmbeddingAPI([text], signal);
    if (!embedding) {
      throw new Error('Failed to generate embedding');
    }
    this.cache.set(cacheKey, embedding);
    return embedding;
  }

  async embedBatch(texts: string[], options: EmbedBatchOptions = {}): Promise<number[][]> {
    const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    const results: number[][] = [];

    logger.info(`[EmbeddingService] Batch embedding: ${texts.length} texts, batch size: ${batchSize}`);

    for (let i = 0; i < texts.length; i += batchSize) {
      const batch = texts.slice(i, i + batchSize);
      const pending = batch.filter((text) => !this.cache.has(this.getCacheKey(text)));

      if (pending.length > 0) {
        const vectors = await this.callEmbeddingAPI(pending, options.signal);
        if (vectors.length !== pending.length) {
          throw new Error(
            `Embedding backend returned ${vectors.length} vectors for ${pending.length} texts`
          );
        }
        pending.forEach((text, j) => this.cache.set(this.getCacheKey(text), vectors[j]));
      }

      for (const text of batch) {
        const vector = this.cache.get(this.getCacheKey(text));
        if (!vector) {
          throw new Error('Embedding evicted before use; raise the cache size');
        }
        results.push(vector);
      }
    }

    logger.debug(`[EmbeddingService] Batch embedding complete: ${results.length} vectors`);
    return results;
  }

  private async callEmbeddingAPI(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    switch (this.config.provider) {
      case 'openai':
        return this.callOpenAI(texts, signal);
      case 'ollama':
        return this.callOllama(texts, signal);
    }
  }

  private async callOpenAI(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const { model, apiKey, dimensions } = this.config;
    if (!apiKey) {
      throw new Error('OpenAI API key is required');
    }

    let url = trimTrailingSlash(this.config.baseUrl);
    if (!url.endsWith('/embeddings')) {
      url = `${url}/embeddings`;
    }

    const response = await fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${apiKey}`,
      },
      body: JSON.stringify({
        model,
        input: texts,
        ...(dimensions ? { dimensions } : {}),
      }),
      signal,
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`OpenAI API error: ${response.status} - ${errorText}`);
    }

    const data = openAIEmbeddingResponseSchema.parse(await response.json());
    return [...data.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
  }

  /** Ollama has no batch endpoint here; one request per text */
  private async callOllama(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const url = `${trimTrailingSlash(this.config.baseUrl)}/api/embeddings`;
    const results: number[][] = [];

    for (const text of texts) {
      const response = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ model: this.config.model, prompt: text }),
        signal,
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new Error(`Ollama API error: ${response.status} - ${errorText}`);
      }

      results.push(ollamaEmbeddingResponseSchema.parse(await response.json()).embedding);
    }

    return results;
  }

  private getCacheKey(text: string): string {
    return `${this.config.provider}:${this.config.model}:${text}`;
  }

  clearCache(): void {
    this.cache.clear();
  }

  async testConnection(): Promise<{ success: boolean; message: string; dimensions?: number }> {
    try {
      const embedding = await this.embed('test connection');
      return {
        success: true,
        message: `Connection successful, vector dimensions: ${embedding.length}`,
        dimensions: embedding.length,
      };
    } catch (error) {
      return {
        success: false,
        message: `Connection failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
      };
    }
  }
}
