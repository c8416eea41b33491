/**
 * @file ToneSelector.test.ts
 * @description Cue scoring against the bundled profiles, tie handling, wire-name parsing
 */

import { describe, expect, it } from 'vitest';
import { InvalidRequest } from '../../../src/main/services/errors';
import { loadToneProfiles } from '../../../src/main/services/tone/ToneProfiles';
import { ToneSelector, parseTone, selectTone } from '../../../src/main/services/tone/ToneSelector';

describe('ToneSelector', () => {
  const selector = new ToneSelector();

  it.each([undefined, '', '   \n'])('should fall back to casual for %j', (context) => {
    expect(selector.select(context)).toBe('casualFriendly');
  });

  it.each([
    ['A young boy in a school uniform holding a balloon', 'childFriendly'],
    ['一位穿著校服的小朋友', 'childFriendly'],
    ['An elderly woman with gray hair and a walking stick', 'elderFriendly'],
    ['一位白髮的老爺爺拄著拐杖', 'elderFriendly'],
    ['A man in a dark business suit with a necktie', 'professionalFriendly'],
    ['穿著西裝的商務人士', 'professionalFriendly'],
  ])('should pick the tone whose cues dominate: %s', (context, expected) => {
    expect(selector.select(context)).toBe(expected);
  });

  it('should fall back to casual when nothing matches', () => {
    expect(selector.select('A person wearing a hoodie and sneakers')).toBe('casualFriendly');
  });

  it('should match ASCII cues on whole words only', () => {
    const scores = selector.score('A kidney-shaped pool near the oldest building');

    expect(scores.get('childFriendly')).toBe(0);
    expect(scores.get('elderFriendly')).toBe(0);
  });

  it('should count each cue once however often it appears', () => {
    expect(selector.score('boy boy boy').get('childFriendly')).toBe(2);
  });

  it('should sum the weights of every matched cue', () => {
    // elderly 3 + grey hair 2 + wrinkles 2
    expect(selector.score('Elderly man, grey  hair, wrinkles').get('elderFriendly')).toBe(7);
  });

  it('should fall back to casual on a tie at the top', () => {
    // child 3 vs suit 3
    expect(selector.score('a child in a suit').get('childFriendly')).toBe(3);
    expect(selector.score('a child in a suit').get('professionalFriendly')).toBe(3);
    expect(selector.select('a child in a suit')).toBe('casualFriendly');
  });

  it('should use the cues it is given', () => {
    const profiles = loadToneProfiles();
    const custom = new ToneSelector({
      ...profiles,
      childFriendly: { ...profiles.childFriendly, cues: [{ term: 'cape', weight: 1 }] },
    });

    expect(custom.select('a hero in a cape')).toBe('childFriendly');
    expect(custom.select('a little boy')).toBe('casualFriendly');
  });

  it('should expose a shared default selector', () => {
    expect(selectTone('a toddler')).toBe('childFriendly');
    expect(selectTone()).toBe('casualFriendly');
  });
});

describe('parseTone', () => {
  it.each([
    ['child_friendly', 'childFriendly'],
    ['elderFriendly', 'elderFriendly'],
    ['PROFESSIONAL-FRIENDLY', 'professionalFriendly'],
    [' casual friendly ', 'casualFriendly'],
  ])('should accept %j', (value, expected) => {
    expect(parseTone(value)).toBe(expected);
  });

  it('should reject an unknown tone with the accepted names', () => {
    let caught: unknown;
    try {
      parseTone('pirate');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InvalidRequest);
    expect(caught).toMatchObject({
      message: 'Unknown tone: pirate',
      issues: [
        'tone must be one of child_friendly, elder_friendly, professional_friendly, casual_friendly',
      ],
    });
  });
});
