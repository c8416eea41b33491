/**
 * @file TonePrompts - Style pass prompts
 * @description Tone system prompt per profile and language, and the rewrite instruction that
 *   carries the answer, the user's appearance and the original question.
 * @depends ToneProfiles, resources/prompts.json
 */

import { DEFAULT_APPEARANCE_PERCENTAGE } from '../../../../shared/types/defaults';
import { type PromptTemplates, fillTemplate, loadPromptTemplates } from '../../resources/prompts';
import type { ReplyLanguage } from '../chat/PromptBuilder';
import type { ToneProfile } from './ToneProfiles';

const LANGUAGE_LABELS: Record<ReplyLanguage, string> = { zh: 'Chinese', en: 'English' };

export interface ToneInstructionInput {
  text: string;
  profile: ToneProfile;
  languageName: string;
  userDescription?: string;
  userMessage?: string;
  /** No prior turns in the session */
  isFirstMessage: boolean;
  appearancePercentage?: number;
}

export class TonePrompts {
  constructor(private readonly templates: PromptTemplates = loadPromptTemplates()) {}

  languageName(language: ReplyLanguage): string {
    return this.templates.languageNames[language];
  }

  buildSystemPrompt(
    profile: ToneProfile,
    languageName: string,
    appearancePercentage = DEFAULT_APPEARANCE_PERCENTAGE
  ): string {
    const { intro, expressionTags, appearanceRules, outputRules } = this.templates.toneSystemPrompt;
    const values = {
      persona: profile.persona,
      language: languageName,
      percentage: appearancePercentage,
      outputStyle: profile.outputStyle,
    };

    const particles = (['zh', 'en'] as const)
      .filter((language) => profile.particles[language].length > 0)
      .map(
        (language) =>
          `${profile.particles[language].map((p) => `"${p}"`).join(', ')} for ${LANGUAGE_LABELS[language]}`
      )
      .join('; ');
    const guidelines = particles
      ? [...profile.guidelines, `Add natural particles and expressions (e.g., ${particles})`]
      : profile.guidelines;

    const sections = [
      fillTemplate(intro, values),
      `TARGET LANGUAGE: ${languageName}`,
      ['EXPRESSION TAGS AVAILABLE:', ...expressionTags].join('\n'),
      ['STYLE GUIDELINES:', ...guidelines.map((line, i) => `${i + 1}. ${line}`)].join('\n'),
    ];

    if (profile.examples.length > 0) {
      sections.push(
        [
          'EXAMPLES WITH EXPRESSION TAGS:',
          ...profile.examples.map(
            (example) =>
              `${LANGUAGE_LABELS[example.language]}: "${example.original}" → "${example.rewritten}"`
          ),
        ].join('\n')
      );
    }

    sections.push(
      [
        'USER APPEARANCE INTEGRATION:',
        ...appearanceRules.map((rule) => fillTemplate(rule, values)),
        'Examples for FIRST MESSAGE (mandatory appearance reference):',
        ...profile.appearanceExamples.first.map((line) => `- "${line}"`),
        `Examples for SUBSEQUENT MESSAGES (${appearancePercentage}% chance):`,
        ...profile.appearanceExamples.subsequent.map((line) => `- "${line}"`),
      ].join('\n'),
      [
        'STRICT OUTPUT FORMAT REQUIREMENTS:',
        ...outputRules.map((rule) => `- ${fillTemplate(rule, values)}`),
      ].join('\n')
    );

    return sections.join('\n\n');
  }

  /**
   * `Rewrite this text to speak to {audience} in {lang}:{contextInfo}\n---\n{text}\n---`
   */
  buildInstruction(input: ToneInstructionInput): string {
    const percentage = input.appearancePercentage ?? DEFAULT_APPEARANCE_PERCENTAGE;
    const description = input.userDescription?.trim();
    const question = input.userMessage?.trim();

    let contextInfo = '';
    if (description) {
      contextInfo += `\nUser Appearance: ${description}`;
    }
    if (question) {
      contextInfo += `\nUser Question: ${question}`;
    }
    if (description) {
      contextInfo += input.isFirstMessage
        ? '\nFirst Message: YES (MUST reference user appearance to grab attention)'
        : `\nFirst Message: NO (${percentage}% chance to reference appearance for variety)`;
    }

    return (
      `Rewrite this text to speak to ${input.profile.audience} in ${input.languageName}:${contextInfo}\n` +
      `---\n${input.text}\n---`
    );
  }
}
