/**
 * Emotion Classification Type Definitions
 */

/**
 * Labels emitted by the underlying classifier model
 */
export const NATIVE_EMOTIONS = ['joy', 'sadness', 'anger', 'fear', 'surprise', 'disgust'] as const;

export type NativeEmotion = (typeof NATIVE_EMOTIONS)[number];

/**
 * Labels exposed downstream, listed in tie-break priority order
 */
export const CANONICAL_EMOTIONS = [
  'happiness',
  'sadness',
  'anger',
  'anxiety',
  'frustration',
  'depression',
] as const;

export type CanonicalEmotion = (typeof CANONICAL_EMOTIONS)[number];

/**
 * Designated label for the synthesized result when classification fails
 */
export const NEUTRAL_LABEL = 'neutral';

export type EmotionLabel = CanonicalEmotion | typeof NEUTRAL_LABEL;

export type EmotionDistribution = Record<CanonicalEmotion, number>;

export type NativeScores = Record<NativeEmotion, number>;

export interface EmotionScore {
  label: CanonicalEmotion;
  probability: number;
}

/**
 * Structured classification output, created fresh for every message
 */
export interface EmotionResult {
  /** Argmax of `distribution`, or `neutral` for the fallback result */
  primaryLabel: EmotionLabel;

  /** Probability of the primary label (0.0 to 1.0) */
  confidence: number;

  /** Probability per canonical label, summing to 1.0 */
  distribution: EmotionDistribution;

  /** Three highest labels, descending, ties by canonical priority */
  topK: EmotionScore[];

  /** Highest-scoring native label, `null` when no model ran */
  nativeLabel: NativeEmotion | null;

  /** Confidence fell below the configured threshold */
  lowConfidence: boolean;
}

/**
 * Backend that produces native label scores for a piece of text
 */
export interface NativeEmotionModel {
  readonly name: string;

  /** Whether the backend can be invoked at all (dependency loaded, credential present) */
  isAvailable(): boolean;

  /** Non-negative score per native label; need not be normalized */
  predict(text: string): Promise<NativeScores>;
}
