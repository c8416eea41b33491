/**
 * @file ChatOrchestrator - Query orchestration service
 * @description Runs one query as a small state machine:
 *   Idle → FetchingAndGenerating → ToneSelected → Streaming → Done, with Errored and Aborted
 *   as the other terminals. The auxiliary context fetch and the retrieval + grounded generation
 *   run concurrently; only their join is awaited, so the context fetch hides behind generation.
 * @depends IAIService, IRetriever, IContextProvider, ChatSessionStore, PromptBuilder, ToneSelector, ToneConverter
 * @implements IChatOrchestrator, IDisposable
 */

import { z } from 'zod';
import type {
  ChatMessage,
  QueryRequest,
  QueryRequestInput,
  QueryStreamChunk,
} from '../../../../shared/types/chat';
import {
  DEFAULT_CONTEXT_FETCH_TIMEOUT_MS,
  DEFAULT_MAX_CONTEXT_LENGTH,
  DEFAULT_SESSION_ID,
  DEFAULT_TOP_K,
  QA_TEMPERATURE,
} from '../../../../shared/types/defaults';
import { withTimeout } from '../../../../shared/utils/async';
import { LinkedAbortSource, isCancellationError } from '../../../../shared/utils/cancellation';
import { createLogger } from '../LoggerService';
import {
  ContextFetchTimeout,
  GenerationFailed,
  InvalidRequest,
  RetrievalUnavailable,
  toErrorPayload,
} from '../errors';
import type { IAIService } from '../interfaces/IAIService';
import type {
  IChatOrchestrator,
  OrchestratorState,
  QueryOptions,
} from '../interfaces/IChatOrchestrator';
import type { IContextProvider } from '../interfaces/IContextProvider';
import type { IRetriever } from '../interfaces/IRetriever';
import { ToneConverter } from '../tone/ToneConverter';
import { ToneSelector } from '../tone/ToneSelector';
import type { ChatSessionStore } from './ChatSessionStore';
import { PromptBuilder, processContext } from './PromptBuilder';

const logger = createLogger('ChatOrchestrator');

// ====== Request Validation ======

const queryRequestSchema = z.object({
  text: z.string().trim().min(1, 'text must not be empty'),
  sessionId: z.string().min(1).default(DEFAULT_SESSION_ID),
  includeHistory: z.boolean().default(true),
  auxiliaryContext: z.string().optional(),
  applyStyleConversion: z.boolean().default(true),
  topK: z.number().int().positive().optional(),
});

/**
 * @throws InvalidRequest listing every failed field
 */
export function parseQueryRequest(input: unknown): QueryRequest {
  const parsed = queryRequestSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || 'request'}: ${issue.message}`
    );
    throw new InvalidRequest(`Invalid query request: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

// ====== State Machine ======

const TRANSITIONS: Record<OrchestratorState, readonly OrchestratorState[]> = {
  Idle: ['FetchingAndGenerating', 'Errored', 'Aborted'],
  FetchingAndGenerating: ['ToneSelected', 'Errored', 'Aborted'],
  ToneSelected: ['Streaming', 'Errored', 'Aborted'],
  Streaming: ['Done', 'Errored', 'Aborted'],
  Done: [],
  Errored: [],
  Aborted: [],
};

class QueryStateMachine {
  private current: OrchestratorState = 'Idle';

  constructor(
    private readonly sessionId: string,
    private readonly onTransition?: QueryOptions['onTransition']
  ) {}

  get state(): OrchestratorState {
    return this.current;
  }

  isTerminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  /**
   * @throws Error on a transition the table does not allow
   */
  transition(to: OrchestratorState): void {
    const from = this.current;
    if (!TRANSITIONS[from].includes(to)) {
      throw new Error(`Illegal state transition: ${from} → ${to}`);
    }
    this.current = to;
    logger.debug(`[ChatOrchestrator] ${from} → ${to}`, { sessionId: this.sessionId });
    this.onTransition?.(from, to);
  }
}

// ====== Implementation ======

export interface ChatOrchestratorConfig {
  topK: number;
  contextFetchTimeoutMs: number;
  maxContextLength: number;
}

const DEFAULT_ORCHESTRATOR_CONFIG: ChatOrchestratorConfig = {
  topK: DEFAULT_TOP_K,
  contextFetchTimeoutMs: DEFAULT_CONTEXT_FETCH_TIMEOUT_MS,
  maxContextLength: DEFAULT_MAX_CONTEXT_LENGTH,
};

export interface ChatOrchestratorDeps {
  aiService: IAIService;
  retriever: IRetriever;
  contextProvider: IContextProvider;
  sessionStore: ChatSessionStore;
  promptBuilder?: PromptBuilder;
  toneSelector?: ToneSelector;
  toneConverter?: ToneConverter;
}

export class ChatOrchestrator implements IChatOrchestrator {
  private readonly aiService: IAIService;
  private readonly retriever: IRetriever;
  private readonly contextProvider: IContextProvider;
  private readonly sessionStore: ChatSessionStore;
  private readonly promptBuilder: PromptBuilder;
  private readonly toneSelector: ToneSelector;
  private readonly toneConverter: ToneConverter;
  private readonly config: ChatOrchestratorConfig;
  private readonly running = new Set<LinkedAbortSource>();

  constructor(deps: ChatOrchestratorDeps, config: Partial<ChatOrchestratorConfig> = {}) {
    this.aiService = deps.aiService;
    this.retriever = deps.retriever;
    this.contextProvider = deps.contextProvider;
    this.sessionStore = deps.sessionStore;
    this.promptBuilder = deps.promptBuilder ?? new PromptBuilder();
    this.toneSelector = deps.toneSelector ?? new ToneSelector();
    this.toneConverter = deps.toneConverter ?? new ToneConverter(deps.aiService);
    this.config = { ...DEFAULT_ORCHESTRATOR_CONFIG, ...config };

    logger.info('[ChatOrchestrator] Initialized', this.config);
  }

  async *query(
    input: QueryRequestInput,
    options: QueryOptions = {}
  ): AsyncGenerator<QueryStreamChunk> {
    const machine = new QueryStateMachine(input.sessionId ?? DEFAULT_SESSION_ID, options.onTransition);
    const source = new LinkedAbortSource(options.signal);
    this.running.add(source);

    try {
      const request = parseQueryRequest(input);
      if (source.aborted) {
        machine.transition('Aborted');
        return;
      }

      machine.transition('FetchingAndGenerating');
      // Read once, outside any critical section
      const history = await this.sessionStore.getHistory(request.sessionId);
      const explicitContext = request.auxiliaryContext?.trim() ?? '';

      const [fetchedContext, answer] = await Promise.all([
        explicitContext ? Promise.resolve('') : this.fetchAuxiliaryContext(request, source.signal),
        this.generateAnswer(request, history, source.signal),
      ]);
      if (source.aborted) {
        machine.transition('Aborted');
        return;
      }

      const userDescription = explicitContext || fetchedContext;
      const tone = this.toneSelector.select(userDescription);
      machine.transition('ToneSelected');
      logger.info('[ChatOrchestrator] Tone selected', {
        sessionId: request.sessionId,
        tone,
        contextSource: explicitContext ? 'request' : fetchedContext ? 'provider' : 'none',
      });

      machine.transition('Streaming');
      let finalAnswer = answer;

      if (request.applyStyleConversion) {
        let converted = '';
        const tokens = this.toneConverter.streamTokens(
          {
            text: answer,
            tone,
            userDescription,
            userMessage: request.text,
            isFirstMessage: history.length === 0,
          },
          source.signal
        );

        for await (const token of tokens) {
          converted += token;
          yield { type: 'token', content: token };
        }

        if (source.aborted) {
          machine.transition('Aborted');
          return;
        }
        if (!converted.trim()) {
          throw new GenerationFailed('Tone conversion returned an empty response');
        }
        finalAnswer = converted;
      } else {
        yield { type: 'token', content: answer };
      }

      if (source.aborted) {
        machine.transition('Aborted');
        return;
      }

      machine.transition('Done');
      await this.sessionStore.appendExchange(request.sessionId, request.text, finalAnswer);
      yield { type: 'end' };
    } catch (error) {
      if (machine.isTerminal()) {
        throw error;
      }
      if (source.aborted || isCancellationError(error)) {
        machine.transition('Aborted');
        logger.info('[ChatOrchestrator] Query aborted', { sessionId: input.sessionId });
        return;
      }

      machine.transition('Errored');
      logger.error('[ChatOrchestrator] Query failed', error);
      yield { type: 'error', error: toErrorPayload(error) };
    } finally {
      // Consumer stopped iterating before a terminal state
      if (!machine.isTerminal()) {
        machine.transition('Aborted');
        logger.info('[ChatOrchestrator] Consumer stopped reading', { sessionId: input.sessionId });
      }
      this.running.delete(source);
      source.dispose(true);
    }
  }

  // ====== Concurrent Tasks ======

  /** T1: never rejects; a miss, failure or timeout resolves to '' */
  private async fetchAuxiliaryContext(request: QueryRequest, signal: AbortSignal): Promise<string> {
    const timeoutMs = this.config.contextFetchTimeoutMs;
    try {
      // The deadline holds even for a provider that ignores its own timeout
      const context = await withTimeout(
        (fetchSignal) => this.contextProvider.getContext(request.sessionId, timeoutMs, fetchSignal),
        timeoutMs,
        () => new ContextFetchTimeout(timeoutMs),
        signal
      );
      return context.available ? context.text : '';
    } catch (error) {
      if (signal.aborted) {
        return '';
      }
      if (error instanceof ContextFetchTimeout) {
        logger.warn(
          `[ChatOrchestrator] Context fetch timed out after ${error.timeoutMs}ms, degraded to default tone`,
          { sessionId: request.sessionId }
        );
      } else {
        logger.warn('[ChatOrchestrator] Context fetch failed, degraded to default tone', {
          sessionId: request.sessionId,
          error: error instanceof Error ? error.message : String(error),
        });
      }
      return '';
    }
  }

  /** T2: retrieval, then one buffered grounded generation */
  private async generateAnswer(
    request: QueryRequest,
    history: ChatMessage[],
    signal: AbortSignal
  ): Promise<string> {
    const passages = await this.retrieve(request, signal);
    const context = processContext(passages, this.config.maxContextLength);

    const messages = this.promptBuilder.buildQaMessages({
      question: request.text,
      context,
      history: request.includeHistory ? history : [],
      userDescription: request.auxiliaryContext,
    });

    logger.debug('[ChatOrchestrator] Generating answer', {
      sessionId: request.sessionId,
      passages: passages.length,
      contextLength: context.length,
      historyMessages: request.includeHistory ? history.length : 0,
    });

    const answer = await this.aiService.generate(messages, { temperature: QA_TEMPERATURE, signal });
    const trimmed = answer.trim();
    if (!trimmed) {
      throw new GenerationFailed('QA response is empty');
    }
    return trimmed;
  }

  private async retrieve(request: QueryRequest, signal: AbortSignal): Promise<string[]> {
    if (!this.retriever.isReady()) {
      logger.warn('[ChatOrchestrator] No index loaded, answering without context');
      return [];
    }

    try {
      const results = await this.retriever.search(
        request.text,
        request.topK ?? this.config.topK,
        signal
      );
      return results.map((result) => result.text);
    } catch (error) {
      if (error instanceof RetrievalUnavailable) {
        logger.warn('[ChatOrchestrator] Retrieval unavailable, degraded to no context', {
          error: error.message,
        });
        return [];
      }
      throw error;
    }
  }

  // ====== Cleanup ======

  dispose(): void {
    for (const source of this.running) {
      source.abort();
    }
    this.running.clear();
    logger.info('[ChatOrchestrator] Disposed');
  }
}
