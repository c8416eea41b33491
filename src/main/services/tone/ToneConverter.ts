/**
 * @file ToneConverter - Style pass over an answer
 * @description Rewrites text for a tone through the AI service, buffered or streamed.
 *   The target language follows the text being rewritten.
 * @depends IAIService, ToneProfiles, TonePrompts
 */

import { DEFAULT_APPEARANCE_PERCENTAGE, TONE_TEMPERATURE } from '../../../../shared/types/defaults';
import type { ToneId } from '../../../../shared/types/tone';
import { detectReplyLanguage } from '../chat/PromptBuilder';
import { GenerationFailed } from '../errors';
import type { AIMessage, IAIService, StreamChunk } from '../interfaces/IAIService';
import { type ToneProfiles, loadToneProfiles } from './ToneProfiles';
import { TonePrompts } from './TonePrompts';

export interface ToneConversionInput {
  text: string;
  tone: ToneId;
  userDescription?: string;
  userMessage?: string;
  isFirstMessage: boolean;
}

export class ToneConverter {
  constructor(
    private readonly aiService: IAIService,
    private readonly appearancePercentage = DEFAULT_APPEARANCE_PERCENTAGE,
    private readonly prompts: TonePrompts = new TonePrompts(),
    private readonly profiles: ToneProfiles = loadToneProfiles()
  ) {}

  buildMessages(input: ToneConversionInput): AIMessage[] {
    const profile = this.profiles[input.tone];
    const languageName = this.prompts.languageName(detectReplyLanguage(input.text));

    return [
      {
        role: 'system',
        content: this.prompts.buildSystemPrompt(profile, languageName, this.appearancePercentage),
      },
      {
        role: 'user',
        content: this.prompts.buildInstruction({
          text: input.text,
          profile,
          languageName,
          userDescription: input.userDescription,
          userMessage: input.userMessage,
          isFirstMessage: input.isFirstMessage,
          appearancePercentage: this.appearancePercentage,
        }),
      },
    ];
  }

  /** Chunks from the AI service; ends with `complete` or `error`, or nothing once aborted */
  stream(input: ToneConversionInput, signal?: AbortSignal): AsyncGenerator<StreamChunk> {
    return this.aiService.generateStream(this.buildMessages(input), {
      temperature: TONE_TEMPERATURE,
      signal,
    });
  }

  /**
   * Rewritten text, piece by piece. Returns quietly once `signal` aborts.
   * @throws GenerationFailed on a provider error, or when the stream stops without completing
   */
  async *streamTokens(input: ToneConversionInput, signal?: AbortSignal): AsyncGenerator<string> {
    let completed = false;

    for await (const chunk of this.stream(input, signal)) {
      if (chunk.type === 'chunk' && chunk.content) {
        yield chunk.content;
      } else if (chunk.type === 'error') {
        throw new GenerationFailed(chunk.error ?? 'Tone conversion failed');
      } else if (chunk.type === 'complete') {
        completed = true;
      }
    }

    // The AI service also ends a stream quietly when stopped from its own side
    if (!completed && !signal?.aborted) {
      throw new GenerationFailed('Tone conversion stopped before completing');
    }
  }

  /**
   * @throws GenerationFailed when the rewrite comes back empty
   */
  async convert(input: ToneConversionInput, signal?: AbortSignal): Promise<string> {
    const converted = await this.aiService.generate(this.buildMessages(input), {
      temperature: TONE_TEMPERATURE,
      signal,
    });
    const trimmed = converted.trim();
    if (!trimmed) {
      throw new GenerationFailed('Tone conversion returned an empty response');
    }
    return trimmed;
  }
}
