/**
 * @file Tone Types
 * @description Closed set of reply styles and their wire names
 * @depends None (pure type definitions)
 */

export const TONE_IDS = [
  'childFriendly',
  'elderFriendly',
  'professionalFriendly',
  'casualFriendly',
] as const;

export type ToneId = (typeof TONE_IDS)[number];

/** Snake-case names accepted and reported by the caller surface */
export const TONE_WIRE_NAMES = {
  childFriendly: 'child_friendly',
  elderFriendly: 'elder_friendly',
  professionalFriendly: 'professional_friendly',
  casualFriendly: 'casual_friendly',
} as const satisfies Record<ToneId, string>;

export type ToneWireName = (typeof TONE_WIRE_NAMES)[ToneId];

export const DEFAULT_TONE: ToneId = 'casualFriendly';
