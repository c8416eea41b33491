/**
 * @file Default Configuration Values
 * @description Single source of truth for default settings
 * @depends None (pure constant definitions)
 */

// ====== Generation Defaults ======
export const DEFAULT_LLM_PROVIDER = 'ollama';
export const DEFAULT_LLM_MODEL = 'llama3.1:8b';
/** Ollama's OpenAI-compatible endpoint, used when ollama has no base URL configured */
export const DEFAULT_LLM_BASE_URL = 'http://localhost:11434/v1';
export const DEFAULT_LLM_MAX_TOKENS = 1024;
export const QA_TEMPERATURE = 0.7;
export const TONE_TEMPERATURE = 0.3;
export const WARMUP_TEMPERATURE = 0;

// ====== Embedding Defaults ======
export const DEFAULT_EMBEDDING_PROVIDER = 'ollama';
export const DEFAULT_EMBEDDING_MODEL = 'bge-m3:latest';
export const DEFAULT_EMBEDDING_BASE_URL = 'http://localhost:11434';

// ====== Indexing Defaults ======
export const DEFAULT_CHUNK_SIZE = 300;
export const DEFAULT_CHUNK_OVERLAP = 50;
export const DEFAULT_SPARSE_MAX_FEATURES = 1000;
export const SPARSE_MAX_DF = 0.95;
export const SPARSE_MIN_DF = 1;
export const DEFAULT_DB_PATH = './data/docent.db';

// ====== Retrieval Defaults ======
export const DEFAULT_TOP_K = 10;
export const DEFAULT_OVER_FETCH_FACTOR = 2;
export const DEFAULT_DENSE_WEIGHT = 0.7;

// ====== Conversation Defaults ======
export const DEFAULT_SESSION_ID = 'default';
export const DEFAULT_MAX_HISTORY = 20;
export const DEFAULT_MAX_CONTEXT_LENGTH = 2500;
export const DEFAULT_APPEARANCE_PERCENTAGE = 70;

// ====== Auxiliary Context Defaults ======
export const DEFAULT_CONTEXT_SERVICE_URL = 'http://localhost:5004';
export const DEFAULT_CONTEXT_FETCH_TIMEOUT_MS = 5000;
