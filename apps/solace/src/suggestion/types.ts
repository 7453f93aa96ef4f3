/**
 * Suggestion Pipeline Type Definitions
 */

import { ChatMessage, Turn } from '../conversation/types';
import { EmotionLabel, EmotionResult } from '../emotion/types';
import { SuggestionTierFailure, TierFailureReason } from '../utils/errors';

export const SourceTiers = {
  PRIMARY_API: 'PRIMARY_API',
  SECONDARY_API: 'SECONDARY_API',
  FALLBACK_RULE: 'FALLBACK_RULE',
} as const;

export type SourceTier = (typeof SourceTiers)[keyof typeof SourceTiers];

/**
 * Everything a tier needs to produce one reply
 */
export interface SuggestionRequest {
  text: string;
  emotion: EmotionResult;

  /** Turns recorded before the current user message, oldest first */
  context: readonly Turn[];
}

/**
 * Request shape for chat-completion style providers
 */
export interface ChatRequest {
  systemInstruction: string;

  /** Strictly alternating, starts and ends with a user message */
  messages: ChatMessage[];

  emotionLabel: EmotionLabel;
}

export type TierOutcome =
  | { ok: true; text: string }
  | { ok: false; failure: SuggestionTierFailure };

export interface TierAttempt {
  tier: SourceTier;
  outcome: 'success' | 'skipped' | 'failed';
  reason?: TierFailureReason;
  message?: string;
  durationMs: number;
}

export interface SuggestionResult {
  text: string;
  sourceTier: SourceTier;

  /** Every tier considered for this reply, in order */
  attempts: TierAttempt[];
}

/**
 * One stage of the fallback chain
 */
export interface SuggestionTier {
  readonly tier: SourceTier;

  /** Capability predicate, evaluated once per attempt */
  isAvailable(): boolean;

  attempt(request: SuggestionRequest, signal?: AbortSignal): Promise<TierOutcome>;
}

/**
 * Remote chat-completion backend behind an API tier
 */
export interface ChatProvider {
  readonly name: string;
  readonly modelId: string;
  isConfigured(): boolean;

  /**
   * Resolve with the raw reply text. Failures that already know their
   * reason are thrown as SuggestionTierFailure.
   */
  complete(chat: ChatRequest, signal: AbortSignal): Promise<string>;
}
