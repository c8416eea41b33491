/**
 * @file Chat Types
 * @description Query requests, session history and the streamed reply protocol
 * @depends tone
 */

import type { ToneWireName } from './tone';

// ====== Messages ======

export type ChatMessageRole = 'user' | 'assistant';

export interface ChatMessage {
  role: ChatMessageRole;
  content: string;
}

// ====== Session ======

export interface ChatSession {
  sessionId: string;
  history: ChatMessage[];
  /** Epoch ms of the last mutation */
  lastActivity: number;
}

// ====== Query ======

export interface QueryRequest {
  text: string;
  sessionId: string;
  includeHistory: boolean;
  /** Explicit user description; when present, no context fetch happens */
  auxiliaryContext?: string;
  applyStyleConversion: boolean;
  /** Overrides the configured retrieval depth */
  topK?: number;
}

/** Caller-side shape; everything but `text` has a default */
export type QueryRequestInput = Pick<QueryRequest, 'text'> & Partial<Omit<QueryRequest, 'text'>>;

// ====== Stream Protocol ======

export interface StreamErrorPayload {
  code: string;
  message: string;
}

/**
 * One item of a reply stream.
 * Every stream ends with exactly one `end` or one `error`.
 */
export type QueryStreamChunk =
  | { type: 'token'; content: string }
  | { type: 'error'; error: StreamErrorPayload }
  | { type: 'end' };

/** Line-protocol rendering of the `end` chunk */
export const END_MARKER = 'END_FLAG';

/** Line-protocol prefix of the `error` chunk */
export const ERROR_PREFIX = 'ERROR: ';

// ====== Caller Surface Results ======

export interface ToneConversionRequest {
  text: string;
  tone?: ToneWireName | string;
  stream?: boolean;
  userDescription?: string;
  userMessage?: string;
}

export interface ToneConversionResult {
  success: boolean;
  originalText: string;
  convertedText: string;
  tone: ToneWireName;
  userDescription: string;
}

export interface HistoryResult {
  sessionId: string;
  history: ChatMessage[];
  messageCount: number;
}

export interface ClearHistoryResult {
  sessionId: string;
  cleared: number;
}

export interface CloseSessionResult {
  success: boolean;
  sessionId: string;
  sessionExisted: boolean;
  messagesCleared: number;
}

export interface BuildIndexResult {
  collection: string;
  documentCount: number;
  chunkCount: number;
  vocabularySize: number;
}

export interface HealthResult {
  status: 'healthy';
  ragInitialized: boolean;
  chunkCount: number;
  timestamp: string;
}

export type WarmupStatus = 'success' | 'error' | 'skipped';

export interface WarmupStep {
  status: WarmupStatus;
  message: string;
  timeMs: number;
}

export interface WarmupResult {
  embeddingModel: WarmupStep;
  llmModel: WarmupStep;
  overallSuccess: boolean;
}
