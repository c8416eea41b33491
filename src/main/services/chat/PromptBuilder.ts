/**
 * @file PromptBuilder - Grounded QA prompt assembly
 * @description Packs retrieved passages into a bounded context and builds the QA message list:
 *   system prompt, prior turns, then one user message carrying a JSON payload.
 * @depends resources/prompts.json
 */

import type { ChatMessage } from '../../../../shared/types/chat';
import { DEFAULT_MAX_CONTEXT_LENGTH } from '../../../../shared/types/defaults';
import { type PromptTemplates, fillTemplate, loadPromptTemplates } from '../../resources/prompts';
import type { AIMessage } from '../interfaces/IAIService';

export type ReplyLanguage = 'zh' | 'en';

const HAN_CHARACTER = /[\u4e00-\u9fff]/;

/** Any CJK ideograph means the reply should be in Chinese */
export function detectReplyLanguage(text: string): ReplyLanguage {
  return HAN_CHARACTER.test(text) ? 'zh' : 'en';
}

/**
 * Join passages in rank order until the next one would exceed `maxLength`.
 * A first passage that alone is too long is truncated rather than dropped.
 */
export function processContext(
  passages: readonly string[],
  maxLength = DEFAULT_MAX_CONTEXT_LENGTH
): string {
  const selected: string[] = [];
  let currentLength = 0;

  for (const passage of passages) {
    if (!passage.trim()) {
      continue;
    }
    if (currentLength + passage.length > maxLength) {
      if (selected.length === 0) {
        selected.push(passage.slice(0, maxLength));
      }
      break;
    }
    selected.push(passage);
    currentLength += passage.length;
  }

  return selected.join('\n\n');
}

/** Wire payload of the final user message */
export interface QaPayload {
  user_question: string;
  rag_reference: string;
  language_requirement: string;
  user_description?: string;
}

export interface QaPromptInput {
  question: string;
  /** Already packed with processContext */
  context: string;
  /** Prior turns, oldest first; empty when history is disabled */
  history: readonly ChatMessage[];
  userDescription?: string;
}

export class PromptBuilder {
  private readonly systemPrompt: string;

  constructor(private readonly templates: PromptTemplates = loadPromptTemplates()) {
    this.systemPrompt = templates.qaSystemPrompt.join('\n');
  }

  getSystemPrompt(): string {
    return this.systemPrompt;
  }

  languageName(language: ReplyLanguage): string {
    return this.templates.languageNames[language];
  }

  buildPayload(input: QaPromptInput): QaPayload {
    const language = this.languageName(detectReplyLanguage(input.question));
    const payload: QaPayload = {
      user_question: input.question,
      rag_reference: input.context,
      language_requirement: fillTemplate(this.templates.languageRequirement, { language }),
    };
    const description = input.userDescription?.trim();
    if (description) {
      payload.user_description = description;
    }
    return payload;
  }

  buildQaMessages(input: QaPromptInput): AIMessage[] {
    return [
      { role: 'system', content: this.systemPrompt },
      ...input.history.map((message) => ({ role: message.role, content: message.content })),
      { role: 'user', content: JSON.stringify(this.buildPayload(input)) },
    ];
  }
}
