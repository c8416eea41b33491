/**
 * @file ToneSelector - Rule-based tone choice
 * @description Scores a user description against each profile's weighted cues.
 *   ASCII cues match whole words, CJK cues match as substrings. No winner means casualFriendly.
 * @depends ToneProfiles
 */

import { DEFAULT_TONE, TONE_IDS, TONE_WIRE_NAMES, type ToneId } from '../../../../shared/types/tone';
import { createLogger } from '../LoggerService';
import { InvalidRequest } from '../errors';
import { type ToneProfiles, loadToneProfiles } from './ToneProfiles';

const logger = createLogger('ToneSelector');

const ASCII_CUE = /^[\x20-\x7e]+$/;

interface CueMatcher {
  test(text: string): boolean;
  weight: number;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function createCueMatcher(term: string, weight: number): CueMatcher {
  const cue = term.trim().toLowerCase();
  if (!ASCII_CUE.test(cue)) {
    return { test: (text) => text.includes(cue), weight };
  }
  const body = cue.split(/\s+/).map(escapeRegExp).join('\\s+');
  const pattern = new RegExp(`(?<![\\p{L}\\p{N}])${body}(?![\\p{L}\\p{N}])`, 'u');
  return { test: (text) => pattern.test(text), weight };
}

export class ToneSelector {
  private readonly matchers: Array<{ tone: ToneId; cues: CueMatcher[] }>;

  constructor(profiles: ToneProfiles = loadToneProfiles()) {
    this.matchers = TONE_IDS.filter((tone) => tone !== DEFAULT_TONE).map((tone) => ({
      tone,
      cues: profiles[tone].cues.map((cue) => createCueMatcher(cue.term, cue.weight)),
    }));
  }

  /** Sum of matched cue weights per scored tone; each cue counts once */
  score(context: string): Map<ToneId, number> {
    const text = context.toLowerCase();
    const scores = new Map<ToneId, number>();
    for (const { tone, cues } of this.matchers) {
      scores.set(
        tone,
        cues.reduce((sum, cue) => (cue.test(text) ? sum + cue.weight : sum), 0)
      );
    }
    return scores;
  }

  select(auxiliaryContext?: string): ToneId {
    if (!auxiliaryContext?.trim()) {
      return DEFAULT_TONE;
    }

    let best: ToneId = DEFAULT_TONE;
    let bestScore = 0;
    let tied = false;
    const scores = this.score(auxiliaryContext);

    for (const [tone, score] of scores) {
      if (score > bestScore) {
        best = tone;
        bestScore = score;
        tied = false;
      } else if (score === bestScore && score > 0) {
        tied = true;
      }
    }

    const selected = tied ? DEFAULT_TONE : best;
    logger.debug('[ToneSelector] Tone selected', {
      selected,
      scores: Object.fromEntries(scores),
    });
    return selected;
  }
}

let defaultSelector: ToneSelector | null = null;

export function selectTone(auxiliaryContext?: string): ToneId {
  if (!defaultSelector) {
    defaultSelector = new ToneSelector();
  }
  return defaultSelector.select(auxiliaryContext);
}

// ====== Wire Names ======

function normalizeToneName(value: string): string {
  return value.trim().toLowerCase().replace(/[_\-\s]/g, '');
}

/**
 * Accepts `child_friendly`, `childFriendly`, `CHILD-FRIENDLY` and the like.
 * @throws InvalidRequest for an unknown tone
 */
export function parseTone(value: string): ToneId {
  const normalized = normalizeToneName(value);
  const tone = TONE_IDS.find((id) => normalizeToneName(id) === normalized);
  if (!tone) {
    throw new InvalidRequest(`Unknown tone: ${value}`, [
      `tone must be one of ${Object.values(TONE_WIRE_NAMES).join(', ')}`,
    ]);
  }
  return tone;
}
