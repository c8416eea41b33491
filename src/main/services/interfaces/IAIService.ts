/**
 * @file IAIService - AI service contract
 * @description Buffered and streaming chat generation used by the orchestrator and tone conversion
 * @depends AIService
 */

import type { IDisposable } from '../../../../shared/utils/lifecycle';
import type { LLMProviderId } from '../EngineConfig';

export interface AIConfig {
  provider: LLMProviderId;
  /** Ollama needs none */
  apiKey: string;
  /** Unset means the provider's own endpoint */
  baseUrl?: string;
  model: string;
  maxTokens: number;
}

export interface AIMessage {
  role: 'user' | 'assistant' | 'system';
  content: string;
}

/**
 * Streaming response chunk.
 */
export interface StreamChunk {
  type: 'chunk' | 'complete' | 'error';
  content?: string;
  error?: string;
}

export interface GenerateOptions {
  temperature?: number;
  /** Defaults to the configured maxTokens */
  maxOutputTokens?: number;
  /** Aborting cancels the provider request */
  signal?: AbortSignal;
}

export interface IAIService extends IDisposable {
  /**
   * @sideeffect Reconfigures provider clients
   */
  updateConfig(config: AIConfig): void;

  getConfig(): AIConfig | null;

  isConfigured(): boolean;

  /**
   * Full completion as one string.
   * @throws GenerationFailed on provider errors; cancellation errors pass through
   */
  generate(messages: AIMessage[], options?: GenerateOptions): Promise<string>;

  /**
   * Token stream ending in one `complete` or one `error` chunk.
   * An aborted stream ends without either.
   */
  generateStream(messages: AIMessage[], options?: GenerateOptions): AsyncGenerator<StreamChunk>;

  /**
   * Aborts every in-flight generation.
   * @returns Whether anything was running
   */
  stopGeneration(): boolean;

  isGenerating(): boolean;

  testConnection(): Promise<{ success: boolean; message: string }>;
}
