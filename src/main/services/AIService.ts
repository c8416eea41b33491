/**
 * @file AIService - LLM generation service
 * @description Unified multi-provider management using Vercel AI SDK
 * @supports OpenAI, Anthropic, DeepSeek, Ollama and OpenAI-compatible endpoints
 * @implements IAIService for dependency injection via ServiceContainer
 */

import { createAnthropic } from '@ai-sdk/anthropic';
import { createOpenAI } from '@ai-sdk/openai';
import { APICallError, type LanguageModel, type ModelMessage, generateText, streamText } from 'ai';
import { DEFAULT_LLM_BASE_URL } from '../../../shared/types/defaults';
import { LinkedAbortSource, isCancellationError } from '../../../shared/utils/cancellation';
import { createLogger } from './LoggerService';
import { GenerationFailed, describeProviderError } from './errors';
import type {
  AIConfig,
  AIMessage,
  GenerateOptions,
  IAIService,
  StreamChunk,
} from './interfaces/IAIService';

const logger = createLogger('AIService');

export type { AIConfig, AIMessage, GenerateOptions, StreamChunk } from './interfaces/IAIService';

/** Endpoints for providers whose SDK default is not the right one */
const PROVIDER_BASE_URLS: Partial<Record<AIConfig['provider'], string>> = {
  ollama: DEFAULT_LLM_BASE_URL,
  deepseek: 'https://api.deepseek.com/v1',
};

/** Ollama ignores the key but the OpenAI client insists on one */
const OLLAMA_PLACEHOLDER_KEY = 'ollama';

// ====== Message Formatting ======

interface FormattedMessages {
  system?: string;
  messages: ModelMessage[];
}

/** System messages merge into one system prompt; the rest keep their order */
function formatMessages(messages: AIMessage[]): FormattedMessages {
  const system = messages
    .filter((m) => m.role === 'system')
    .map((m) => m.content.trim())
    .filter(Boolean)
    .join('\n\n');

  const conversation: ModelMessage[] = [];
  for (const message of messages) {
    if (message.role === 'user') {
      conversation.push({ role: 'user', content: message.content });
    } else if (message.role === 'assistant') {
      conversation.push({ role: 'assistant', content: message.content });
    }
  }

  return { system: system || undefined, messages: conversation };
}

// ====== AIService Implementation ======

/**
 * @remarks Issues network requests to AI providers and may stream responses.
 * @sideeffect Tracks one abort source per in-flight call.
 */
export class AIService implements IAIService {
  private currentConfig: AIConfig | null = null;
  private inFlight = new Set<LinkedAbortSource>();

  constructor(config?: AIConfig) {
    if (config) {
      this.updateConfig(config);
    }
  }

  private createModel(): LanguageModel {
    if (!this.currentConfig) {
      throw new GenerationFailed('AI provider not configured');
    }

    const { provider, apiKey, model } = this.currentConfig;
    const baseURL = this.currentConfig.baseUrl || PROVIDER_BASE_URLS[provider];

    switch (provider) {
      case 'anthropic': {
        const anthropic = createAnthropic({ apiKey, baseURL });
        return anthropic(model);
      }
      default: {
        // All OpenAI-compatible providers use createOpenAI
        const openai = createOpenAI({
          apiKey: provider === 'ollama' ? apiKey || OLLAMA_PLACEHOLDER_KEY : apiKey,
          baseURL,
        });
        // Chat Completions API; most compatible servers lack the Responses API
        return openai.chat(model);
      }
    }
  }

  updateConfig(config: AIConfig): void {
    if (config.provider === 'custom' && !config.baseUrl) {
      logger.warn('[AIService] Custom provider requires a base URL');
      this.currentConfig = null;
      return;
    }
    if (config.provider !== 'ollama' && !config.apiKey) {
      logger.warn(`[AIService] API Key not configured for ${config.provider}`);
      this.currentConfig = null;
      return;
    }

    this.currentConfig = { ...config };
    logger.info(
      `[AIService] Config updated: ${config.provider} ${config.baseUrl ?? '(default endpoint)'} ${config.model}`
    );
  }

  getConfig(): AIConfig | null {
    return this.currentConfig;
  }

  isConfigured(): boolean {
    return this.currentConfig !== null;
  }

  async generate(messages: AIMessage[], options: GenerateOptions = {}): Promise<string> {
    const model = this.createModel();
    const { system, messages: conversation } = formatMessages(messages);
    const source = this.track(options.signal);

    try {
      const { text } = await generateText({
        model,
        system,
        messages: conversation,
        temperature: options.temperature,
        maxOutputTokens: options.maxOutputTokens ?? this.currentConfig?.maxTokens,
        abortSignal: source.signal,
      });
      return text;
    } catch (error) {
      if (isCancellationError(error) || source.aborted) {
        throw error;
      }
      logger.error('[AIService] Generation failed', error);
      throw new GenerationFailed(describeProviderError(error), error);
    } finally {
      this.untrack(source);
    }
  }

  async *generateStream(
    messages: AIMessage[],
    options: GenerateOptions = {}
  ): AsyncGenerator<StreamChunk> {
    if (!this.currentConfig) {
      yield { type: 'error', error: 'AI provider not configured' };
      return;
    }

    const { system, messages: conversation } = formatMessages(messages);
    const source = this.track(options.signal);
    let fullResponse = '';
    let streamError: unknown;

    try {
      const result = streamText({
        model: this.createModel(),
        system,
        messages: conversation,
        temperature: options.temperature,
        maxOutputTokens: options.maxOutputTokens ?? this.currentConfig.maxTokens,
        abortSignal: source.signal,
        onError: ({ error }) => {
          streamError = error;
        },
      });

      for await (const textPart of result.textStream) {
        if (source.aborted) {
          break;
        }
        if (textPart) {
          fullResponse += textPart;
          yield { type: 'chunk', content: textPart };
        }
      }

      if (source.aborted) {
        logger.info('[AIService] Stream aborted');
        return;
      }
      if (streamError !== undefined) {
        throw streamError;
      }

      yield { type: 'complete', content: fullResponse };
    } catch (error) {
      if (isCancellationError(error) || source.aborted) {
        logger.info('[AIService] Stream aborted');
        return;
      }

      logger.error('[AIService] Stream generation failed', error);
      yield { type: 'error', error: describeProviderError(error) };
    } finally {
      this.untrack(source);
    }
  }

  private track(parent?: AbortSignal): LinkedAbortSource {
    const source = new LinkedAbortSource(parent);
    this.inFlight.add(source);
    return source;
  }

  /** Aborts too, so a consumer that stops iterating releases the provider connection */
  private untrack(source: LinkedAbortSource): void {
    this.inFlight.delete(source);
    source.dispose(true);
  }

  stopGeneration(): boolean {
    if (this.inFlight.size === 0) {
      return false;
    }
    logger.info(`[AIService] Stopping ${this.inFlight.size} generation(s)`);
    for (const source of this.inFlight) {
      source.abort();
    }
    return true;
  }

  isGenerating(): boolean {
    return this.inFlight.size > 0;
  }

  async testConnection(): Promise<{ success: boolean; message: string }> {
    if (!this.currentConfig) {
      return { success: false, message: 'AI provider not configured' };
    }

    logger.info('[AIService] Testing connection', {
      provider: this.currentConfig.provider,
      baseUrl: this.currentConfig.baseUrl,
      model: this.currentConfig.model,
    });

    try {
      const { text } = await generateText({
        model: this.createModel(),
        prompt: 'Hello',
        maxOutputTokens: 10,
      });

      if (text) {
        return { success: true, message: `Connected! Model: ${this.currentConfig.model}` };
      }
      return { success: false, message: 'Connection failed: no response' };
    } catch (error) {
      logger.error('[AIService] Connection test failed', error);

      let message = describeProviderError(error);
      if (APICallError.isInstance(error)) {
        if (error.statusCode === 401) {
          message = `Auth failed (401): Check API Key. Base URL: ${error.url}`;
        } else if (error.statusCode === 404) {
          message = `Model not found (404): Check model name "${this.currentConfig.model}"`;
        }
      }
      return { success: false, message: `Connection failed: ${message}` };
    }
  }

  dispose(): void {
    this.stopGeneration();
  }
}

/**
 * @remarks Returns a fresh instance for ServiceContainer registration.
 */
export function createAIService(config?: AIConfig): IAIService {
  return new AIService(config);
}
