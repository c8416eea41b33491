/**
 * @file QuestionDetector - Is a query phrased as a question
 * @description Trailing question mark, a leading interrogative cue, or a trailing CJK particle.
 *   Cues come from question-cues.json.
 */

import { z } from 'zod';
import { loadResource } from '../../../resources';

const questionCuesSchema = z.object({
  leading: z.object({
    en: z.array(z.string().min(1)),
    zh: z.array(z.string().min(1)),
  }),
  trailingParticles: z.array(z.string().min(1)),
});

export type QuestionCues = z.infer<typeof questionCuesSchema>;

let cachedCues: QuestionCues | null = null;

export function loadQuestionCues(): QuestionCues {
  if (!cachedCues) {
    cachedCues = loadResource('question-cues.json', questionCuesSchema);
  }
  return cachedCues;
}

const TRAILING_PUNCTUATION = /[\s。.!！~～…]+$/u;

export class QuestionDetector {
  private readonly leadingEn: RegExp | null;

  constructor(private readonly cues: QuestionCues = loadQuestionCues()) {
    const words = cues.leading.en.map((cue) => cue.toLowerCase().replace(/\s+/g, '\\s+'));
    this.leadingEn = words.length > 0 ? new RegExp(`^(?:${words.join('|')})\\b`) : null;
  }

  isQuestion(query: string): boolean {
    const text = query.trim().toLowerCase();
    if (!text) {
      return false;
    }

    if (text.endsWith('?') || text.endsWith('？')) {
      return true;
    }
    if (this.leadingEn?.test(text)) {
      return true;
    }
    if (this.cues.leading.zh.some((cue) => text.startsWith(cue))) {
      return true;
    }

    const bare = text.replace(TRAILING_PUNCTUATION, '');
    return this.cues.trailingParticles.some((particle) => bare.endsWith(particle));
  }
}
