/**
 * @file Tokenizer - Mixed CJK/Latin tokenizer for the sparse index
 * @description Lower-cases, keeps custom domain terms whole, segments Han runs with
 *   Intl.Segmenter and splits the rest into letter/digit words.
 * @depends resources/custom-terms.json
 */

import { z } from 'zod';
import { loadResource } from '../../../resources';

const HAN_RUN = /(\p{Script=Han}+)|([^\p{Script=Han}]+)/gu;
const WORD = /[\p{L}\p{N}]+/gu;
const NOT_WORD_OR_SPACE = /[^\p{L}\p{N}\s]/gu;
const ASCII_TERM = /^[\x20-\x7e]+$/;

let cachedCustomTerms: string[] | null = null;

/** Domain terms from custom-terms.json */
export function loadCustomTerms(): string[] {
  if (!cachedCustomTerms) {
    cachedCustomTerms = loadResource('custom-terms.json', z.array(z.string().min(1)));
  }
  return cachedCustomTerms;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export class Tokenizer {
  private readonly termPattern: RegExp | null;
  private readonly segmenter = new Intl.Segmenter('zh-Hant', { granularity: 'word' });

  /**
   * @param customTerms Terms emitted as single tokens; ASCII ones only match whole words
   */
  constructor(customTerms: readonly string[] = loadCustomTerms()) {
    const alternatives = [...new Set(customTerms.map((term) => term.toLowerCase()))]
      .sort((a, b) => b.length - a.length)
      .map((term) => {
        const escaped = escapeRegExp(term);
        return ASCII_TERM.test(term) ? `(?<![\\p{L}\\p{N}])${escaped}(?![\\p{L}\\p{N}])` : escaped;
      });
    this.termPattern = alternatives.length > 0 ? new RegExp(alternatives.join('|'), 'gu') : null;
  }

  tokenize(text: string): string[] {
    const lower = text.toLowerCase();
    if (!this.termPattern) {
      return this.tokenizePlain(lower);
    }

    const tokens: string[] = [];
    let cursor = 0;
    for (const match of lower.matchAll(this.termPattern)) {
      const start = match.index ?? 0;
      tokens.push(...this.tokenizePlain(lower.slice(cursor, start)), match[0]);
      cursor = start + match[0].length;
    }
    tokens.push(...this.tokenizePlain(lower.slice(cursor)));
    return tokens;
  }

  private tokenizePlain(text: string): string[] {
    const tokens: string[] = [];
    const cleaned = text.replace(NOT_WORD_OR_SPACE, ' ');

    for (const [, han, other] of cleaned.matchAll(HAN_RUN)) {
      if (han) {
        for (const segment of this.segmenter.segment(han)) {
          if (segment.isWordLike) {
            tokens.push(segment.segment);
          }
        }
      } else if (other) {
        for (const [word] of other.matchAll(WORD)) {
          if (word.length > 1) {
            tokens.push(word);
          }
        }
      }
    }
    return tokens;
  }
}
