/**
 * Orchestrator Module
 */

export { ChatSession } from './chat-session';
export type { ChatSessionDependencies, ChatSessionOptions, ReplySuggester, TextClassifier } from './chat-session';
export { computeSessionStats, emptyEmotionCounts } from './stats';
export type {
  EmbeddingSummary,
  EmotionRecord,
  ProcessTurnOptions,
  SessionSnapshot,
  SessionStats,
  TurnResult,
} from './types';
