/**
 * LexiconEmotionModel - offline keyword scorer over the native label set
 *
 * Counts lexicon phrase hits per native label and turns the counts into
 * exponential weights. Text with no hits at all scores zero everywhere, which
 * the classifier reports as a uniform, low-confidence result.
 */

import lexicon from '../../data/native-lexicon.json';
import { PhraseMatcher } from '../../utils/phrases';
import { NATIVE_EMOTIONS, NativeEmotion, NativeEmotionModel, NativeScores } from '../types';

const HIT_WEIGHT = 1.5;

export const NATIVE_LEXICON: Readonly<Record<NativeEmotion, readonly string[]>> = lexicon;

export class LexiconEmotionModel implements NativeEmotionModel {
  readonly name = 'lexicon';
  private readonly matchers: Readonly<Record<NativeEmotion, PhraseMatcher>>;

  constructor(lexiconByLabel: Readonly<Record<NativeEmotion, readonly string[]>> = NATIVE_LEXICON) {
    this.matchers = {
      joy: new PhraseMatcher(lexiconByLabel.joy),
      sadness: new PhraseMatcher(lexiconByLabel.sadness),
      anger: new PhraseMatcher(lexiconByLabel.anger),
      fear: new PhraseMatcher(lexiconByLabel.fear),
      surprise: new PhraseMatcher(lexiconByLabel.surprise),
      disgust: new PhraseMatcher(lexiconByLabel.disgust),
    };
  }

  isAvailable(): boolean {
    return true;
  }

  async predict(text: string): Promise<NativeScores> {
    const hits = this.countHits(text);
    const scores: NativeScores = { joy: 0, sadness: 0, anger: 0, fear: 0, surprise: 0, disgust: 0 };
    if (NATIVE_EMOTIONS.every((label) => hits[label] === 0)) {
      return scores;
    }
    for (const label of NATIVE_EMOTIONS) {
      scores[label] = Math.exp(hits[label] * HIT_WEIGHT);
    }
    return scores;
  }

  /**
   * Number of distinct lexicon phrases per label found in the text
   */
  countHits(text: string): NativeScores {
    const hits: NativeScores = { joy: 0, sadness: 0, anger: 0, fear: 0, surprise: 0, disgust: 0 };
    for (const label of NATIVE_EMOTIONS) {
      hits[label] = this.matchers[label].matches(text).length;
    }
    return hits;
  }
}
