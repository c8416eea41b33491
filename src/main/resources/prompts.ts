/**
 * @file prompts - Prompt templates
 * @description Schema and loader for prompts.json, plus `{placeholder}` substitution
 * @depends zod
 */

import { z } from 'zod';
import { loadResource } from './index';

const lines = z.array(z.string());

const promptTemplatesSchema = z.object({
  languageNames: z.object({ zh: z.string().min(1), en: z.string().min(1) }),
  qaSystemPrompt: lines.nonempty(),
  languageRequirement: z.string().min(1),
  toneSystemPrompt: z.object({
    intro: z.string().min(1),
    expressionTags: lines,
    appearanceRules: lines,
    outputRules: lines,
  }),
});

export type PromptTemplates = z.infer<typeof promptTemplatesSchema>;

let cachedTemplates: PromptTemplates | null = null;

export function loadPromptTemplates(): PromptTemplates {
  if (!cachedTemplates) {
    cachedTemplates = loadResource('prompts.json', promptTemplatesSchema);
  }
  return cachedTemplates;
}

/**
 * Replace `{name}` placeholders. Unknown placeholders are left as they are.
 */
export function fillTemplate(template: string, values: Record<string, string | number>): string {
  return template.replace(/\{(\w+)\}/g, (placeholder, name: string) =>
    Object.hasOwn(values, name) ? String(values[name]) : placeholder
  );
}
