/**
 * @file Tone Module Entry
 * @description Tone profiles, rule-based selection and the style pass
 */

export { ToneConverter, type ToneConversionInput } from './ToneConverter';
export {
  type ToneCue,
  type ToneProfile,
  type ToneProfiles,
  loadToneProfiles,
  parseToneProfiles,
} from './ToneProfiles';
export { TonePrompts, type ToneInstructionInput } from './TonePrompts';
export { ToneSelector, parseTone, selectTone } from './ToneSelector';
