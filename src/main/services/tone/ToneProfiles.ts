/**
 * @file ToneProfiles - Reply style catalogue
 * @description Loads tone-profiles.json. Every ToneId must have a profile whose wire name matches.
 * @depends zod, resources/tone-profiles.json
 */

import { z } from 'zod';
import { TONE_IDS, TONE_WIRE_NAMES, type ToneId } from '../../../../shared/types/tone';
import { loadResource } from '../../resources';

const languageLexicon = z.object({
  zh: z.array(z.string().min(1)),
  en: z.array(z.string().min(1)),
});

const toneProfileSchema = z.object({
  wireName: z.string().min(1),
  audience: z.string().min(1),
  persona: z.string().min(1),
  guidelines: z.array(z.string().min(1)).nonempty(),
  outputStyle: z.string().min(1),
  particles: languageLexicon,
  examples: z.array(
    z.object({
      language: z.enum(['zh', 'en']),
      original: z.string().min(1),
      rewritten: z.string().min(1),
    })
  ),
  appearanceExamples: z.object({
    first: z.array(z.string().min(1)),
    subsequent: z.array(z.string().min(1)),
  }),
  cues: z.array(
    z.object({
      term: z.string().min(1),
      weight: z.number().positive(),
    })
  ),
});

export type ToneProfile = z.infer<typeof toneProfileSchema>;
export type ToneCue = ToneProfile['cues'][number];

export type ToneProfiles = Record<ToneId, ToneProfile>;

const toneProfilesSchema = z
  .object({
    childFriendly: toneProfileSchema,
    elderFriendly: toneProfileSchema,
    professionalFriendly: toneProfileSchema,
    casualFriendly: toneProfileSchema,
  })
  .superRefine((profiles, ctx) => {
    for (const id of TONE_IDS) {
      if (profiles[id].wireName !== TONE_WIRE_NAMES[id]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [id, 'wireName'],
          message: `Expected "${TONE_WIRE_NAMES[id]}"`,
        });
      }
    }
  });

let cachedProfiles: ToneProfiles | null = null;

/**
 * @throws ZodError when a profile is missing or malformed
 */
export function loadToneProfiles(): ToneProfiles {
  if (!cachedProfiles) {
    cachedProfiles = loadResource('tone-profiles.json', toneProfilesSchema);
  }
  return cachedProfiles;
}

export function parseToneProfiles(raw: unknown): ToneProfiles {
  return toneProfilesSchema.parse(raw);
}
