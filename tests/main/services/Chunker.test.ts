/**
 * @file Chunker.test.ts - Sentence-window chunker tests
 * @description Sentence splitting, window filling with overlap, oversized sentences,
 *   determinism and language tags.
 */

import { describe, expect, it } from 'vitest';
import {
  Chunker,
  cleanText,
  detectLanguage,
  joinSentences,
  splitSentences,
} from '../../../src/main/services/knowledge/processors/Chunker';
import { InvalidRequest } from '../../../src/main/services/errors';

const THREE_SENTENCES = 'First sentence. Second sentence. Third sentence.';

describe('splitSentences', () => {
  it('should split on ASCII terminators followed by whitespace', () => {
    expect(splitSentences(THREE_SENTENCES)).toEqual([
      'First sentence.',
      'Second sentence.',
      'Third sentence.',
    ]);
  });

  it('should not split inside a decimal number', () => {
    expect(splitSentences('Pi is 3.14 exactly. Next one.')).toEqual([
      'Pi is 3.14 exactly.',
      'Next one.',
    ]);
  });

  it('should keep consecutive terminators with their sentence', () => {
    expect(splitSentences('Really?! Yes.')).toEqual(['Really?!', 'Yes.']);
  });

  it('should always split after CJK terminators', () => {
    expect(splitSentences('工研院成立於1973年。總部位於新竹！真的嗎？')).toEqual([
      '工研院成立於1973年。',
      '總部位於新竹！',
      '真的嗎？',
    ]);
  });

  it('should keep a closing quote with the sentence it ends', () => {
    expect(splitSentences('他說：「好。」然後離開。')).toEqual(['他說：「好。」', '然後離開。']);
  });

  it('should treat newlines as sentence ends', () => {
    expect(splitSentences('Title\nBody text.')).toEqual(['Title', 'Body text.']);
  });
});

describe('cleanText', () => {
  it('should normalise line endings and collapse blanks', () => {
    expect(cleanText('  a\t\tb  \r\n  c \r d  ')).toBe('a b\nc\nd');
  });
});

describe('joinSentences', () => {
  it('should join without a space after CJK terminators', () => {
    expect(joinSentences(['第一句。', 'Second.', 'Third'])).toBe('第一句。Second. Third');
  });
});

describe('detectLanguage', () => {
  it('should tag mostly-CJK text as zh', () => {
    expect(detectLanguage('工研院成立於1973年。')).toBe('zh');
  });

  it('should tag Latin text as en', () => {
    expect(detectLanguage('ITRI was founded in 1973.')).toBe('en');
  });

  it('should tag text without letters as en', () => {
    expect(detectLanguage('... !!!')).toBe('en');
  });
});

describe('Chunker', () => {
  const chunker = new Chunker();

  it('should emit a window when the next sentence would overflow', () => {
    const chunks = chunker.chunk({ text: THREE_SENTENCES, sourceFile: 'doc.txt' }, 40, 0);

    expect(chunks.map((c) => c.text)).toEqual([
      'First sentence. Second sentence.',
      'Third sentence.',
    ]);
    expect(chunks.map((c) => c.id)).toEqual(['doc.txt#0', 'doc.txt#1']);
    expect(chunks[0].metadata).toEqual({ length: 32, sentenceCount: 2 });
  });

  it('should carry trailing whole sentences as overlap', () => {
    const chunks = chunker.chunk({ text: THREE_SENTENCES, sourceFile: 'doc.txt' }, 40, 20);

    expect(chunks.map((c) => c.text)).toEqual([
      'First sentence. Second sentence.',
      'Second sentence. Third sentence.',
    ]);
  });

  it('should emit an oversized sentence unmodified as its own chunk', () => {
    const long = 'This sentence is definitely longer than twenty characters.';
    const chunks = chunker.chunk(
      { text: `Short one. ${long} Tail.`, sourceFile: 'doc.txt' },
      20,
      5
    );

    expect(chunks.map((c) => c.text)).toEqual(['Short one.', long, 'Tail.']);
    expect(chunks[1].metadata.sentenceCount).toBe(1);
  });

  it('should join CJK sentences without spaces', () => {
    const text = '工研院成立於1973年。總部位於新竹。';
    const chunks = chunker.chunk({ text, sourceFile: 'zh.txt' });

    expect(chunks).toHaveLength(1);
    expect(chunks[0].text).toBe(text);
    expect(chunks[0].language).toBe('zh');
  });

  it('should return no chunks for blank text', () => {
    expect(chunker.chunk({ text: '  \n\t ', sourceFile: 'empty.txt' })).toEqual([]);
  });

  it('should be deterministic', () => {
    const text = Array.from({ length: 40 }, (_, i) => `Sentence number ${i} is here.`).join(' ');
    const first = chunker.chunk({ text, sourceFile: 'long.txt' }, 120, 40);
    const second = chunker.chunk({ text, sourceFile: 'long.txt' }, 120, 40);

    expect(second).toEqual(first);
  });

  it('should never split a sentence across chunks', () => {
    const text = Array.from(
      { length: 30 },
      (_, i) => `Item ${i} has value ${i * 1.5} today${i % 3 === 0 ? '!' : '.'}`
    ).join(' ');
    const sentences = new Set(splitSentences(text));
    const chunks = chunker.chunk({ text, sourceFile: 'items.txt' }, 100, 30);

    for (const chunk of chunks) {
      expect(chunk.text.length).toBeLessThanOrEqual(100);
      for (const sentence of splitSentences(chunk.text)) {
        expect(sentences.has(sentence)).toBe(true);
      }
    }
  });

  it('should use the constructor config as defaults', () => {
    const small = new Chunker({ chunkSize: 40, chunkOverlap: 0 });

    expect(small.chunk({ text: THREE_SENTENCES, sourceFile: 'doc.txt' })).toHaveLength(2);
  });

  it('should reject an overlap that is not below the chunk size', () => {
    expect(() => chunker.chunk({ text: 'a.', sourceFile: 'x' }, 10, 10)).toThrow(InvalidRequest);
  });

  it('should reject a non-positive chunk size', () => {
    expect(() => chunker.chunk({ text: 'a.', sourceFile: 'x' }, 0, 0)).toThrow(InvalidRequest);
  });
});
