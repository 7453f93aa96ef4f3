/**
 * Emotion Module
 * Classifier adapter, label mapping and native model backends
 */

export { EmotionClassifier, neutralEmotionResult, rankDistribution, toCanonicalDistribution, TOP_K } from './classifier';
export { NATIVE_TO_CANONICAL, CUE_ROUTES, detectCues, mapNativeLabel } from './label-map';
export type { EmotionCue } from './label-map';
export { LexiconEmotionModel } from './models/lexicon-model';
export { HuggingFaceEmotionModel } from './models/huggingface-model';
export type { HuggingFaceModelOptions } from './models/huggingface-model';

export { CANONICAL_EMOTIONS, NATIVE_EMOTIONS, NEUTRAL_LABEL } from './types';
export type {
  CanonicalEmotion,
  EmotionDistribution,
  EmotionLabel,
  EmotionResult,
  EmotionScore,
  NativeEmotion,
  NativeEmotionModel,
  NativeScores,
} from './types';
