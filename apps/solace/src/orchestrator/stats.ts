/**
 * Session statistics, always derived from the turn log and emotion log
 */

import { Turn, Roles } from '../conversation/types';
import { CANONICAL_EMOTIONS, EmotionLabel, NEUTRAL_LABEL } from '../emotion/types';
import { EmotionRecord, SessionStats } from './types';

const LABEL_ORDER: readonly EmotionLabel[] = [...CANONICAL_EMOTIONS, NEUTRAL_LABEL];

export function emptyEmotionCounts(): Record<EmotionLabel, number> {
  return {
    happiness: 0,
    sadness: 0,
    anger: 0,
    anxiety: 0,
    frustration: 0,
    depression: 0,
    neutral: 0,
  };
}

/**
 * Recompute statistics from scratch. Emotion records whose user turn is not
 * in `turns` are ignored.
 */
export function computeSessionStats(turns: readonly Turn[], emotions: readonly EmotionRecord[]): SessionStats {
  const userTurns = new Set(
    turns.filter((turn) => turn.role === Roles.USER).map((turn) => turn.timestamp)
  );

  const emotionCounts = emptyEmotionCounts();
  for (const record of emotions) {
    if (userTurns.has(record.turnTimestamp)) {
      emotionCounts[record.result.primaryLabel] += 1;
    }
  }

  let dominantEmotion: EmotionLabel | null = null;
  for (const label of LABEL_ORDER) {
    if (emotionCounts[label] > 0 && (dominantEmotion === null || emotionCounts[label] > emotionCounts[dominantEmotion])) {
      dominantEmotion = label;
    }
  }

  return {
    totalTurns: userTurns.size,
    messageCount: turns.length,
    emotionCounts,
    dominantEmotion,
  };
}
