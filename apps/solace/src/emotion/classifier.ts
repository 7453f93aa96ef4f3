/**
 * EmotionClassifier - adapter from a native-label model to canonical results
 *
 * Folds the model's native scores through the label map into a canonical
 * distribution, then derives primary label, confidence and top-k. Nothing is
 * carried between calls.
 */

import {
  CANONICAL_EMOTIONS,
  CanonicalEmotion,
  EmotionDistribution,
  EmotionResult,
  EmotionScore,
  NATIVE_EMOTIONS,
  NativeEmotion,
  NativeEmotionModel,
  NativeScores,
  NEUTRAL_LABEL,
} from './types';
import { detectCues, mapNativeLabel } from './label-map';
import { ClassificationError, ClassificationUnavailable, isSolaceError, errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('EmotionClassifier');

export const TOP_K = 3;

const PRIORITY: Readonly<Record<CanonicalEmotion, number>> = {
  happiness: 0,
  sadness: 1,
  anger: 2,
  anxiety: 3,
  frustration: 4,
  depression: 5,
};

export interface EmotionClassifierOptions {
  lowConfidenceThreshold?: number;
}

const emptyDistribution = (): EmotionDistribution => ({
  happiness: 0,
  sadness: 0,
  anger: 0,
  anxiety: 0,
  frustration: 0,
  depression: 0,
});

const uniformDistribution = (): EmotionDistribution => {
  const distribution = emptyDistribution();
  for (const label of CANONICAL_EMOTIONS) {
    distribution[label] = 1 / CANONICAL_EMOTIONS.length;
  }
  return distribution;
};

/**
 * Sort descending by probability, ties by canonical priority, keep `k`
 */
export function rankDistribution(distribution: EmotionDistribution, k: number = TOP_K): EmotionScore[] {
  return CANONICAL_EMOTIONS
    .map((label) => ({ label, probability: distribution[label] }))
    .sort((a, b) => b.probability - a.probability || PRIORITY[a.label] - PRIORITY[b.label])
    .slice(0, k);
}

/**
 * Native label with the highest score; first in native order on ties
 */
export function topNativeLabel(scores: NativeScores): NativeEmotion {
  let best: NativeEmotion = NATIVE_EMOTIONS[0];
  for (const label of NATIVE_EMOTIONS) {
    if (scores[label] > scores[best]) best = label;
  }
  return best;
}

/**
 * Canonical distribution for native scores and the text that produced them
 */
export function toCanonicalDistribution(scores: NativeScores, text: string): EmotionDistribution {
  const cues = detectCues(text);
  const distribution = emptyDistribution();
  let total = 0;

  for (const native of NATIVE_EMOTIONS) {
    const score = Number.isFinite(scores[native]) ? Math.max(0, scores[native]) : 0;
    distribution[mapNativeLabel(native, cues)] += score;
    total += score;
  }

  if (total <= 0) {
    return uniformDistribution();
  }

  for (const label of CANONICAL_EMOTIONS) {
    distribution[label] = distribution[label] / total;
  }
  return distribution;
}

/**
 * Default result used when classification is unavailable or fails
 */
export function neutralEmotionResult(): EmotionResult {
  const distribution = uniformDistribution();
  return {
    primaryLabel: NEUTRAL_LABEL,
    confidence: 0,
    distribution,
    topK: rankDistribution(distribution),
    nativeLabel: null,
    lowConfidence: true,
  };
}

export class EmotionClassifier {
  private readonly lowConfidenceThreshold: number;

  constructor(
    private readonly model: NativeEmotionModel,
    options: EmotionClassifierOptions = {}
  ) {
    this.lowConfidenceThreshold = options.lowConfidenceThreshold ?? 0.35;
  }

  get modelName(): string {
    return this.model.name;
  }

  isAvailable(): boolean {
    return this.model.isAvailable();
  }

  /**
   * Classify one message. Short or neutral text yields a low-confidence
   * result rather than an error.
   *
   * @throws ClassificationUnavailable when the model cannot be invoked
   * @throws ClassificationError for any other model failure
   */
  async classify(text: string): Promise<EmotionResult> {
    if (!this.model.isAvailable()) {
      throw new ClassificationUnavailable(`Emotion model '${this.model.name}' is not available`);
    }

    let scores: NativeScores;
    try {
      scores = await this.model.predict(text);
    } catch (error) {
      if (error instanceof ClassificationUnavailable || error instanceof ClassificationError) {
        throw error;
      }
      throw new ClassificationError(`Emotion model '${this.model.name}' failed: ${errorMessage(error)}`, {
        originalError: isSolaceError(error) ? error.code : undefined,
      });
    }

    const distribution = toCanonicalDistribution(scores, text);
    const topK = rankDistribution(distribution);
    const [primary] = topK;

    const result: EmotionResult = {
      primaryLabel: primary.label,
      confidence: primary.probability,
      distribution,
      topK,
      nativeLabel: topNativeLabel(scores),
      lowConfidence: primary.probability < this.lowConfidenceThreshold,
    };

    logger.debug('Classified message', {
      model: this.model.name,
      primaryLabel: result.primaryLabel,
      confidence: Number(result.confidence.toFixed(3)),
      nativeLabel: result.nativeLabel,
    });

    return result;
  }
}
