/**
 * Solace CLI - Emotion Display
 *
 * Badge for the detected emotion plus the runners-up.
 */

import chalk from 'chalk';
import { EmotionLabel, EmotionResult, NEUTRAL_LABEL } from '../../emotion/types';

const EMOTION_EMOJI: Readonly<Record<EmotionLabel, string>> = {
  happiness: '😊',
  sadness: '😔',
  anger: '😠',
  anxiety: '😟',
  frustration: '😤',
  depression: '😞',
  neutral: '😐',
};

const EMOTION_COLOR: Readonly<Record<EmotionLabel, chalk.Chalk>> = {
  happiness: chalk.green,
  sadness: chalk.blue,
  anger: chalk.red,
  anxiety: chalk.yellow,
  frustration: chalk.magenta,
  depression: chalk.cyan,
  neutral: chalk.gray,
};

export function emotionEmoji(label: EmotionLabel): string {
  return EMOTION_EMOJI[label];
}

const percent = (probability: number): string => `${Math.round(probability * 100)}%`;

/**
 * e.g. `😔  SADNESS (82% confidence)`
 */
export function formatEmotionBadge(emotion: EmotionResult): string {
  const color = EMOTION_COLOR[emotion.primaryLabel];
  const label = color.bold(emotion.primaryLabel.toUpperCase());
  if (emotion.primaryLabel === NEUTRAL_LABEL) {
    return `${emotionEmoji(emotion.primaryLabel)}  ${label} ${chalk.gray('(emotion not detected)')}`;
  }
  return `${emotionEmoji(emotion.primaryLabel)}  ${label} ${chalk.gray(`(${percent(emotion.confidence)} confidence)`)}`;
}

/**
 * Remaining top-k labels, or null when there is nothing worth showing
 */
export function formatAlsoDetected(emotion: EmotionResult): string | null {
  if (emotion.primaryLabel === NEUTRAL_LABEL) return null;

  const others = emotion.topK
    .slice(1)
    .filter((score) => score.probability > 0)
    .map((score) => `${score.label} ${percent(score.probability)}`);

  return others.length > 0 ? `Also detected: ${others.join(', ')}` : null;
}

/**
 * Display detected emotion
 */
export function displayEmotion(emotion: EmotionResult): void {
  console.log(`\n   ${formatEmotionBadge(emotion)}`);

  const alsoDetected = formatAlsoDetected(emotion);
  if (alsoDetected) {
    console.log(chalk.gray(`   ${alsoDetected}`));
  }
  if (emotion.lowConfidence && emotion.primaryLabel !== NEUTRAL_LABEL) {
    console.log(chalk.gray('   (low confidence: the message could be read several ways)'));
  }
}
