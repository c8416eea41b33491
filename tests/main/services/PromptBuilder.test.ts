/**
 * @file PromptBuilder.test.ts
 * @description Context packing, reply language detection and the QA message list
 */

import { describe, expect, it } from 'vitest';
import {
  PromptBuilder,
  detectReplyLanguage,
  processContext,
} from '../../../src/main/services/chat/PromptBuilder';
import type { PromptTemplates } from '../../../src/main/resources/prompts';

const TEMPLATES: PromptTemplates = {
  languageNames: { zh: 'Chinese', en: 'English' },
  qaSystemPrompt: ['You are a docent.', 'Be brief.'],
  languageRequirement: 'Answer in {language}.',
  toneSystemPrompt: { intro: 'x', expressionTags: [], appearanceRules: [], outputRules: [] },
};

describe('detectReplyLanguage', () => {
  it('should pick Chinese when any CJK ideograph appears', () => {
    expect(detectReplyLanguage('What does 工研院 mean?')).toBe('zh');
    expect(detectReplyLanguage('When was ITRI founded?')).toBe('en');
    expect(detectReplyLanguage('')).toBe('en');
  });
});

describe('processContext', () => {
  it('should join passages in order while they fit', () => {
    expect(processContext(['aaaa', 'bbb', 'cc'], 9)).toBe('aaaa\n\nbbb\n\ncc');
  });

  it('should stop at the first passage that would overflow', () => {
    expect(processContext(['aaaa', 'bbbbbb', 'c'], 9)).toBe('aaaa');
  });

  it('should truncate a first passage that alone is too long', () => {
    expect(processContext(['abcdefghij', 'x'], 4)).toBe('abcd');
  });

  it('should skip blank passages', () => {
    expect(processContext(['  ', 'aa', '', 'bb'], 10)).toBe('aa\n\nbb');
  });

  it('should return an empty string for no passages', () => {
    expect(processContext([])).toBe('');
  });
});

describe('PromptBuilder', () => {
  const builder = new PromptBuilder(TEMPLATES);

  it('should join the system prompt lines', () => {
    expect(builder.getSystemPrompt()).toBe('You are a docent.\nBe brief.');
  });

  it('should put history between the system prompt and the JSON payload', () => {
    const messages = builder.buildQaMessages({
      question: 'When was ITRI founded?',
      context: 'ITRI was founded in 1973.',
      history: [
        { role: 'user', content: 'Hello' },
        { role: 'assistant', content: 'Hi there' },
      ],
    });

    expect(messages).toEqual([
      { role: 'system', content: 'You are a docent.\nBe brief.' },
      { role: 'user', content: 'Hello' },
      { role: 'assistant', content: 'Hi there' },
      {
        role: 'user',
        content: JSON.stringify({
          user_question: 'When was ITRI founded?',
          rag_reference: 'ITRI was founded in 1973.',
          language_requirement: 'Answer in English.',
        }),
      },
    ]);
  });

  it('should add a trimmed user description only when one is given', () => {
    expect(
      builder.buildPayload({ question: '工研院在哪？', context: '', history: [], userDescription: ' a boy ' })
    ).toEqual({
      user_question: '工研院在哪？',
      rag_reference: '',
      language_requirement: 'Answer in Chinese.',
      user_description: 'a boy',
    });
    expect(
      builder.buildPayload({ question: 'Hi', context: '', history: [], userDescription: '  ' })
    ).not.toHaveProperty('user_description');
  });
});
