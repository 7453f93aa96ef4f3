/**
 * Native → canonical emotion mapping
 *
 * The classifier speaks Ekman's six basic emotions; the rest of the system
 * speaks the six canonical labels. Both sides are closed sets, so the map is a
 * plain table. A small cue table refines a route when the message itself
 * carries a telling phrase: sadness with "hopeless" is depression, anger or
 * disgust with "fed up" is frustration, surprise with "excited" is happiness.
 */

import cueData from '../data/emotion-cues.json';
import { PhraseMatcher } from '../utils/phrases';
import { CanonicalEmotion, NativeEmotion } from './types';

export type EmotionCue = 'depression' | 'frustration' | 'happiness';

export const NATIVE_TO_CANONICAL: Readonly<Record<NativeEmotion, CanonicalEmotion>> = {
  joy: 'happiness',
  sadness: 'sadness',
  anger: 'anger',
  fear: 'anxiety',
  surprise: 'anxiety',
  disgust: 'anger',
};

/**
 * Routes that replace the base mapping when the cue is present.
 */
export const CUE_ROUTES: Readonly<Record<EmotionCue, Partial<Record<NativeEmotion, CanonicalEmotion>>>> = {
  depression: { sadness: 'depression' },
  frustration: { anger: 'frustration', disgust: 'frustration' },
  happiness: { surprise: 'happiness' },
};

export const CUE_PHRASES: Readonly<Record<EmotionCue, readonly string[]>> = {
  depression: cueData.depression,
  frustration: cueData.frustration,
  happiness: cueData.happiness,
};

const CUES: readonly EmotionCue[] = ['depression', 'frustration', 'happiness'];

const CUE_MATCHERS: Readonly<Record<EmotionCue, PhraseMatcher>> = {
  depression: new PhraseMatcher(CUE_PHRASES.depression),
  frustration: new PhraseMatcher(CUE_PHRASES.frustration),
  happiness: new PhraseMatcher(CUE_PHRASES.happiness),
};

/**
 * Cues present in the text
 */
export function detectCues(text: string): Set<EmotionCue> {
  const found = new Set<EmotionCue>();
  for (const cue of CUES) {
    if (CUE_MATCHERS[cue].test(text)) {
      found.add(cue);
    }
  }
  return found;
}

export function mapNativeLabel(native: NativeEmotion, cues: ReadonlySet<EmotionCue> = new Set()): CanonicalEmotion {
  for (const cue of CUES) {
    const routed = cues.has(cue) ? CUE_ROUTES[cue][native] : undefined;
    if (routed) return routed;
  }
  return NATIVE_TO_CANONICAL[native];
}
