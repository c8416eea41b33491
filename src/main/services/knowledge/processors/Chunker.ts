/**
 * @file Chunker - Sentence-respecting text chunker
 * @description Splits documents into sentence windows bounded by chunkSize, carrying trailing
 *   whole sentences as overlap. A sentence is never cut; an oversized one becomes its own chunk.
 * @depends types
 */

import { DEFAULT_CHUNK_OVERLAP, DEFAULT_CHUNK_SIZE } from '../../../../../shared/types/defaults';
import { InvalidRequest } from '../../errors';
import type { Chunk, ChunkLanguage, ChunkingConfig, SourceDocument } from '../types';

// ====== Sentence Splitting ======

const CJK_TERMINATORS = new Set(['。', '！', '？']);
const ASCII_TERMINATORS = new Set(['.', '!', '?']);
/** Closing quotes and brackets that stay with the sentence they close */
const CLOSERS = new Set(['"', "'", '”', '’', '」', '』', '）', ')']);

const CJK_ENDING = /[。！？][”’」』）]*$/;
const CJK_CHAR = /[㐀-䶿一-鿿豈-﫿]/u;
const LETTER_OR_DIGIT = /[\p{L}\p{N}]/u;

/** Threshold of CJK share among letters and digits for the 'zh' tag */
const CJK_LANGUAGE_RATIO = 0.3;

export function cleanText(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .replace(/[ \t\f\v ]+/g, ' ')
    .replace(/ *\n */g, '\n')
    .trim();
}

function isTerminator(char: string): boolean {
  return CJK_TERMINATORS.has(char) || ASCII_TERMINATORS.has(char);
}

/**
 * Split cleaned text into sentences.
 * CJK terminators always end a sentence; `.!?` only before whitespace or end of text,
 * so decimals and abbreviations inside a token survive. Newlines end a sentence too.
 */
export function splitSentences(text: string): string[] {
  const sentences: string[] = [];
  const chars = Array.from(text);
  let current = '';

  const flush = (): void => {
    const sentence = current.trim();
    if (sentence) {
      sentences.push(sentence);
    }
    current = '';
  };

  let i = 0;
  while (i < chars.length) {
    const char = chars[i];

    if (char === '\n') {
      flush();
      i++;
      continue;
    }

    current += char;
    i++;

    if (!isTerminator(char)) {
      continue;
    }

    let sawCjk = CJK_TERMINATORS.has(char);
    while (i < chars.length && (isTerminator(chars[i]) || CLOSERS.has(chars[i]))) {
      sawCjk = sawCjk || CJK_TERMINATORS.has(chars[i]);
      current += chars[i];
      i++;
    }

    const next = chars[i];
    if (sawCjk || next === undefined || /\s/.test(next)) {
      flush();
    }
  }

  flush();
  return sentences;
}

/** '' after a CJK-terminated sentence, ' ' otherwise */
function joinerAfter(sentence: string): string {
  return CJK_ENDING.test(sentence) ? '' : ' ';
}

export function joinSentences(sentences: readonly string[]): string {
  let text = '';
  for (let i = 0; i < sentences.length; i++) {
    text += i === 0 ? sentences[i] : joinerAfter(sentences[i - 1]) + sentences[i];
  }
  return text;
}

export function detectLanguage(text: string): ChunkLanguage {
  let cjk = 0;
  let letters = 0;
  for (const char of text) {
    if (LETTER_OR_DIGIT.test(char)) {
      letters++;
      if (CJK_CHAR.test(char)) {
        cjk++;
      }
    }
  }
  return letters > 0 && cjk / letters >= CJK_LANGUAGE_RATIO ? 'zh' : 'en';
}

// ====== Chunker ======

export interface ChunkerInput {
  text: string;
  sourceFile: string;
}

const DEFAULT_CHUNKING_CONFIG: ChunkingConfig = {
  chunkSize: DEFAULT_CHUNK_SIZE,
  chunkOverlap: DEFAULT_CHUNK_OVERLAP,
};

export class Chunker {
  private config: ChunkingConfig;

  constructor(config: Partial<ChunkingConfig> = {}) {
    this.config = { ...DEFAULT_CHUNKING_CONFIG, ...config };
  }

  /**
   * Chunk one document. Pure: identical input gives an identical chunk sequence.
   * @throws InvalidRequest for a non-positive size or an overlap not below the size
   */
  chunk(
    document: ChunkerInput,
    chunkSize = this.config.chunkSize,
    overlap = this.config.chunkOverlap
  ): Chunk[] {
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new InvalidRequest(`chunkSize must be a positive integer, got ${chunkSize}`);
    }
    if (!Number.isInteger(overlap) || overlap < 0 || overlap >= chunkSize) {
      throw new InvalidRequest(`overlap must be in [0, ${chunkSize}), got ${overlap}`);
    }

    const sentences = splitSentences(cleanText(document.text));
    const windows = this.fillWindows(sentences, chunkSize, overlap);

    return windows.map((window, index) => {
      const text = joinSentences(window);
      return {
        id: `${document.sourceFile}#${index}`,
        text,
        sourceFile: document.sourceFile,
        index,
        language: detectLanguage(text),
        metadata: {
          length: text.length,
          sentenceCount: window.length,
        },
      };
    });
  }

  /** Chunk text documents; pre-built chunks pass through unchanged */
  chunkAll(documents: readonly SourceDocument[]): Chunk[] {
    return documents.flatMap((document) =>
      document.kind === 'text' ? this.chunk(document) : document.chunks
    );
  }

  private fillWindows(sentences: string[], chunkSize: number, overlap: number): string[][] {
    const windows: string[][] = [];
    let window: string[] = [];

    for (const sentence of sentences) {
      if (sentence.length > chunkSize) {
        if (window.length > 0) {
          windows.push(window);
        }
        windows.push([sentence]);
        window = [];
        continue;
      }

      const extended = [...window, sentence];
      if (joinSentences(extended).length <= chunkSize) {
        window = extended;
        continue;
      }

      windows.push(window);
      const carried = [...this.trailingOverlap(window, overlap), sentence];
      window = joinSentences(carried).length <= chunkSize ? carried : [sentence];
    }

    if (window.length > 0) {
      windows.push(window);
    }
    return windows;
  }

  /** Longest run of trailing whole sentences whose joined length fits in `overlap` */
  private trailingOverlap(window: string[], overlap: number): string[] {
    let carry: string[] = [];
    for (let i = window.length - 1; i >= 0; i--) {
      const candidate = window.slice(i);
      if (joinSentences(candidate).length > overlap) {
        break;
      }
      carry = candidate;
    }
    return carry;
  }
}
