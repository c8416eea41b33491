/**
 * @file EngineConfig - Resolved engine configuration
 * @description zod schema for the settings every engine component reads, plus the
 *   environment variables that override stored values.
 * @depends zod, shared/types/defaults
 */

import { z } from 'zod';
import {
  DEFAULT_APPEARANCE_PERCENTAGE,
  DEFAULT_CHUNK_OVERLAP,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_CONTEXT_FETCH_TIMEOUT_MS,
  DEFAULT_CONTEXT_SERVICE_URL,
  DEFAULT_DB_PATH,
  DEFAULT_DENSE_WEIGHT,
  DEFAULT_EMBEDDING_BASE_URL,
  DEFAULT_EMBEDDING_MODEL,
  DEFAULT_EMBEDDING_PROVIDER,
  DEFAULT_LLM_MAX_TOKENS,
  DEFAULT_LLM_MODEL,
  DEFAULT_LLM_PROVIDER,
  DEFAULT_MAX_CONTEXT_LENGTH,
  DEFAULT_MAX_HISTORY,
  DEFAULT_OVER_FETCH_FACTOR,
  DEFAULT_SPARSE_MAX_FEATURES,
  DEFAULT_TOP_K,
} from '../../../shared/types/defaults';
import { ConfigKeys } from '../../../shared/types/config-keys';

// ====== Schema ======

export const LLM_PROVIDERS = ['openai', 'anthropic', 'ollama', 'deepseek', 'custom'] as const;
export const EMBEDDING_PROVIDERS = ['openai', 'ollama'] as const;

export type LLMProviderId = (typeof LLM_PROVIDERS)[number];
export type EmbeddingProviderId = (typeof EMBEDDING_PROVIDERS)[number];

const positiveInt = z.coerce.number().int().positive();

export const engineConfigSchema = z
  .object({
    llm: z.object({
      provider: z.enum(LLM_PROVIDERS).default(DEFAULT_LLM_PROVIDER),
      model: z.string().min(1).default(DEFAULT_LLM_MODEL),
      /** Unset means the provider's own endpoint */
      baseUrl: z.string().url().optional(),
      apiKey: z.string().default(''),
      maxTokens: positiveInt.default(DEFAULT_LLM_MAX_TOKENS),
    }),
    embedding: z.object({
      provider: z.enum(EMBEDDING_PROVIDERS).default(DEFAULT_EMBEDDING_PROVIDER),
      model: z.string().min(1).default(DEFAULT_EMBEDDING_MODEL),
      baseUrl: z.string().url().default(DEFAULT_EMBEDDING_BASE_URL),
      apiKey: z.string().default(''),
      dimensions: positiveInt.optional(),
    }),
    indexing: z.object({
      chunkSize: positiveInt.default(DEFAULT_CHUNK_SIZE),
      chunkOverlap: z.coerce.number().int().min(0).default(DEFAULT_CHUNK_OVERLAP),
      sparseMaxFeatures: positiveInt.default(DEFAULT_SPARSE_MAX_FEATURES),
      dbPath: z.string().min(1).default(DEFAULT_DB_PATH),
    }),
    retrieval: z.object({
      topK: positiveInt.default(DEFAULT_TOP_K),
      overFetchFactor: z.coerce.number().int().min(2).default(DEFAULT_OVER_FETCH_FACTOR),
      denseWeight: z.coerce.number().min(0).max(1).default(DEFAULT_DENSE_WEIGHT),
    }),
    session: z.object({
      maxHistory: positiveInt.default(DEFAULT_MAX_HISTORY),
    }),
    prompt: z.object({
      maxContextLength: positiveInt.default(DEFAULT_MAX_CONTEXT_LENGTH),
      appearancePercentage: z.coerce
        .number()
        .int()
        .min(0)
        .max(100)
        .default(DEFAULT_APPEARANCE_PERCENTAGE),
    }),
    context: z.object({
      serviceUrl: z.string().url().default(DEFAULT_CONTEXT_SERVICE_URL),
      fetchTimeoutMs: positiveInt.default(DEFAULT_CONTEXT_FETCH_TIMEOUT_MS),
    }),
  })
  .refine((config) => config.indexing.chunkOverlap < config.indexing.chunkSize, {
    message: 'chunkOverlap must be smaller than chunkSize',
    path: ['indexing', 'chunkOverlap'],
  });

export type EngineConfig = z.infer<typeof engineConfigSchema>;

// ====== Environment Overrides ======

/** Environment variable → config key. Empty variables are ignored. */
export const ENV_OVERRIDES: ReadonlyArray<readonly [string, ConfigKeys]> = [
  ['DOCENT_LLM_PROVIDER', ConfigKeys.LLMProvider],
  ['DOCENT_LLM_MODEL', ConfigKeys.LLMModel],
  ['DOCENT_LLM_BASE_URL', ConfigKeys.LLMBaseUrl],
  ['DOCENT_LLM_API_KEY', ConfigKeys.LLMApiKey],
  ['DOCENT_EMBEDDING_PROVIDER', ConfigKeys.EmbeddingProvider],
  ['DOCENT_EMBEDDING_MODEL', ConfigKeys.EmbeddingModel],
  ['DOCENT_EMBEDDING_BASE_URL', ConfigKeys.EmbeddingBaseUrl],
  ['DOCENT_EMBEDDING_API_KEY', ConfigKeys.EmbeddingApiKey],
  ['DOCENT_DB_PATH', ConfigKeys.DatabasePath],
  ['DOCENT_CONTEXT_URL', ConfigKeys.ContextServiceUrl],
];

/**
 * Assemble the nested raw object the schema parses.
 * `read` returns the stored (or overridden) value for a key, or undefined.
 */
export function collectRawConfig(read: (key: ConfigKeys) => unknown): Record<string, unknown> {
  return {
    llm: {
      provider: read(ConfigKeys.LLMProvider),
      model: read(ConfigKeys.LLMModel),
      baseUrl: read(ConfigKeys.LLMBaseUrl),
      apiKey: read(ConfigKeys.LLMApiKey),
      maxTokens: read(ConfigKeys.LLMMaxTokens),
    },
    embedding: {
      provider: read(ConfigKeys.EmbeddingProvider),
      model: read(ConfigKeys.EmbeddingModel),
      baseUrl: read(ConfigKeys.EmbeddingBaseUrl),
      apiKey: read(ConfigKeys.EmbeddingApiKey),
      dimensions: read(ConfigKeys.EmbeddingDimensions),
    },
    indexing: {
      chunkSize: read(ConfigKeys.ChunkSize),
      chunkOverlap: read(ConfigKeys.ChunkOverlap),
      sparseMaxFeatures: read(ConfigKeys.SparseMaxFeatures),
      dbPath: read(ConfigKeys.DatabasePath),
    },
    retrieval: {
      topK: read(ConfigKeys.RetrievalTopK),
      overFetchFactor: read(ConfigKeys.RetrievalOverFetchFactor),
      denseWeight: read(ConfigKeys.RetrievalDenseWeight),
    },
    session: {
      maxHistory: read(ConfigKeys.SessionMaxHistory),
    },
    prompt: {
      maxContextLength: read(ConfigKeys.MaxContextLength),
      appearancePercentage: read(ConfigKeys.AppearancePercentage),
    },
    context: {
      serviceUrl: read(ConfigKeys.ContextServiceUrl),
      fetchTimeoutMs: read(ConfigKeys.ContextFetchTimeoutMs),
    },
  };
}
