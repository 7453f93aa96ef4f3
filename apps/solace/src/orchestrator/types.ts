/**
 * Orchestrator Type Definitions
 */

import { Turn } from '../conversation/types';
import { EmotionLabel, EmotionResult } from '../emotion/types';
import { SuggestionResult } from '../suggestion/types';

/**
 * Emotion detected for one recorded user turn
 */
export interface EmotionRecord {
  /** Timestamp of the USER turn this emotion belongs to */
  turnTimestamp: number;
  result: EmotionResult;
}

export interface SessionStats {
  /** Number of USER turns recorded */
  totalTurns: number;

  /** Number of turns of either role */
  messageCount: number;

  emotionCounts: Record<EmotionLabel, number>;

  /** Most frequent primary label, `null` before the first turn */
  dominantEmotion: EmotionLabel | null;
}

export interface EmbeddingSummary {
  available: boolean;
  dims: number | null;
  model: string | null;
}

export interface TurnResult {
  /** Timestamp of the USER turn, `null` when the message was blank and not recorded */
  turnId: number | null;
  emotion: EmotionResult;
  suggestion: SuggestionResult;
  embedding: EmbeddingSummary;
  stats: SessionStats;
}

export interface ProcessTurnOptions {
  signal?: AbortSignal;
}

/**
 * Read-only snapshot of a session
 */
export interface SessionSnapshot {
  history: readonly Turn[];
  emotions: readonly EmotionRecord[];
  stats: SessionStats;
}
