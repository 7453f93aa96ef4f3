/**
 * ChatSession - per-session turn orchestrator
 *
 * Sequences embedding → classification → suggestion for each message, owns
 * the session's ConversationState and emotion log, and returns a complete
 * TurnResult even when every remote dependency is down. Turns run one at a
 * time: a call made while another is in flight waits for it.
 */

import { ConversationState } from '../conversation/state';
import { Roles, Turn } from '../conversation/types';
import { neutralEmotionResult } from '../emotion/classifier';
import { EmotionResult } from '../emotion/types';
import { EmbeddingProvider } from '../embedding/types';
import { SAFETY_NET_REPLY } from '../suggestion/pipeline';
import { SourceTiers, SuggestionRequest, SuggestionResult } from '../suggestion/types';
import {
  ClassificationError,
  ClassificationUnavailable,
  EmbeddingUnavailable,
  TurnAbortedError,
  errorMessage,
} from '../utils/errors';
import { Logger, createLogger } from '../utils/logger';
import { computeSessionStats } from './stats';
import {
  EmbeddingSummary,
  EmotionRecord,
  ProcessTurnOptions,
  SessionSnapshot,
  SessionStats,
  TurnResult,
} from './types';

export interface TextClassifier {
  classify(text: string): Promise<EmotionResult>;
}

export interface ReplySuggester {
  suggest(request: SuggestionRequest, signal?: AbortSignal): Promise<SuggestionResult>;
}

export interface ChatSessionDependencies {
  classifier: TextClassifier;
  suggester: ReplySuggester;
  embeddingProvider?: EmbeddingProvider | null;
}

export interface ChatSessionOptions {
  id?: string;
  logger?: Logger;
}

const NO_EMBEDDING: EmbeddingSummary = { available: false, dims: null, model: null };

export class ChatSession {
  readonly id: string;
  readonly createdAt: Date;
  private lastActivity: Date;

  private readonly state = new ConversationState();
  private emotions: EmotionRecord[] = [];
  private queue: Promise<void> = Promise.resolve();
  private pending = 0;
  private readonly logger: Logger;

  constructor(
    private readonly deps: ChatSessionDependencies,
    options: ChatSessionOptions = {}
  ) {
    this.id = options.id ?? 'default';
    this.createdAt = new Date();
    this.lastActivity = this.createdAt;
    this.logger = options.logger ?? createLogger('ChatSession', { sessionId: this.id });
  }

  /**
   * Run one conversational turn.
   *
   * Rejects only with TurnAbortedError, when `options.signal` aborts before
   * the reply is recorded.
   */
  processTurn(userText: string, options: ProcessTurnOptions = {}): Promise<TurnResult> {
    return this.enqueue(() => this.runTurn(userText, options.signal));
  }

  /**
   * Clear history and statistics once any in-flight turn has finished
   */
  resetSession(): Promise<void> {
    return this.enqueue(async () => {
      this.state.reset();
      this.emotions = [];
      this.touch();
      this.logger.info('Session reset');
    });
  }

  getHistory(): readonly Turn[] {
    return this.state.getTurns();
  }

  getEmotionLog(): readonly EmotionRecord[] {
    return [...this.emotions];
  }

  getStats(): SessionStats {
    return computeSessionStats(this.state.getTurns(), this.emotions);
  }

  snapshot(): SessionSnapshot {
    return {
      history: this.getHistory(),
      emotions: this.getEmotionLog(),
      stats: this.getStats(),
    };
  }

  /**
   * Turns queued or running
   */
  get pendingTurns(): number {
    return this.pending;
  }

  get lastActivityAt(): Date {
    return this.lastActivity;
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    this.pending += 1;
    const run = this.queue.then(task).finally(() => {
      this.pending -= 1;
    });
    // The next task waits for this one to settle; its outcome belongs to the caller
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private touch(): void {
    this.lastActivity = new Date();
  }

  private async runTurn(text: string, signal?: AbortSignal): Promise<TurnResult> {
    if (signal?.aborted) {
      throw new TurnAbortedError();
    }
    this.touch();

    const context = this.state.getTurns();
    const blank = text.trim().length === 0;
    const userTurn = blank ? null : this.state.append(Roles.USER, text);
    if (blank) {
      this.logger.warn('Blank message: generating a reply without recording turns');
    }

    const embedding = blank ? NO_EMBEDDING : await this.embedBestEffort(text, signal);
    const emotion = await this.classifyOrDefault(text);
    if (userTurn) {
      this.emotions.push({ turnTimestamp: userTurn.timestamp, result: emotion });
    }

    const suggestion = await this.suggestOrDefault({ text, emotion, context }, signal);
    if (signal?.aborted) {
      throw new TurnAbortedError();
    }

    if (userTurn) {
      this.state.append(Roles.ASSISTANT, suggestion.text);
    }
    this.touch();

    this.logger.info('Turn complete', {
      turnId: userTurn?.timestamp ?? null,
      emotion: emotion.primaryLabel,
      confidence: Number(emotion.confidence.toFixed(3)),
      sourceTier: suggestion.sourceTier,
    });

    return {
      turnId: userTurn?.timestamp ?? null,
      emotion,
      suggestion,
      embedding,
      stats: this.getStats(),
    };
  }

  private async embedBestEffort(text: string, signal?: AbortSignal): Promise<EmbeddingSummary> {
    const provider = this.deps.embeddingProvider;
    if (!provider || !provider.isAvailable()) {
      return NO_EMBEDDING;
    }

    try {
      const vector = await provider.embed(text, signal);
      return { available: true, dims: vector.dims, model: vector.model };
    } catch (error) {
      if (error instanceof EmbeddingUnavailable) {
        this.logger.warn('Embedding unavailable, continuing without it', { reason: error.message });
      } else {
        this.logger.warn('Embedding failed, continuing without it', { reason: errorMessage(error) });
      }
      return NO_EMBEDDING;
    }
  }

  private async classifyOrDefault(text: string): Promise<EmotionResult> {
    try {
      return await this.deps.classifier.classify(text);
    } catch (error) {
      if (error instanceof ClassificationUnavailable || error instanceof ClassificationError) {
        this.logger.warn('Classification failed, using neutral emotion', {
          code: error.code,
          reason: error.message,
        });
      } else {
        this.logger.error('Unexpected classifier failure, using neutral emotion', error);
      }
      return neutralEmotionResult();
    }
  }

  private async suggestOrDefault(request: SuggestionRequest, signal?: AbortSignal): Promise<SuggestionResult> {
    try {
      return await this.deps.suggester.suggest(request, signal);
    } catch (error) {
      if (error instanceof TurnAbortedError) {
        throw error;
      }
      this.logger.error('Suggestion pipeline failed, using safety-net reply', error);
      return { text: SAFETY_NET_REPLY, sourceTier: SourceTiers.FALLBACK_RULE, attempts: [] };
    }
  }
}
