/**
 * ServiceContainer - Singleton for dependency injection
 * Builds the classifier, embedding provider and suggestion tiers from
 * configuration, and hands out chat sessions wired to them.
 */

import { EmotionClassifier } from '../emotion/classifier';
import { HuggingFaceEmotionModel } from '../emotion/models/huggingface-model';
import { LexiconEmotionModel } from '../emotion/models/lexicon-model';
import { NativeEmotionModel } from '../emotion/types';
import { EmbeddingProvider } from '../embedding/types';
import { VoyageEmbeddingProvider } from '../embedding/voyage-client';
import { ChatSession } from '../orchestrator/chat-session';
import { SessionRegistry } from '../sessions/registry';
import { SuggestionPipeline } from '../suggestion/pipeline';
import { ChatCompletionsProvider } from '../suggestion/providers/chat-completions-provider';
import { GeminiChatProvider, GeminiModelFactory } from '../suggestion/providers/gemini-provider';
import { RemoteChatTier } from '../suggestion/remote-tier';
import { RuleBasedTier } from '../suggestion/rule-tier';
import { SourceTier, SourceTiers, SuggestionTier } from '../suggestion/types';
import { AppConfig, getConfig, hasCredential, validateConfig } from '../utils/config';
import { createLogger } from '../utils/logger';

const logger = createLogger('ServiceContainer');

/**
 * Replacements for the configured backends, mainly for tests
 */
export interface ServiceOverrides {
  emotionModel?: NativeEmotionModel;
  embeddingProvider?: EmbeddingProvider;
  tiers?: SuggestionTier[];
  geminiClient?: GeminiModelFactory;
  fetchImpl?: typeof fetch;
}

export interface CapabilityReport {
  classifier: { model: string; available: boolean };
  embedding: boolean;
  suggestionTiers: Array<{ tier: SourceTier; available: boolean }>;
}

export class ServiceContainer {
  private static instance: ServiceContainer | null = null;

  public readonly config: AppConfig;
  public readonly classifier: EmotionClassifier;
  public readonly embeddingProvider: EmbeddingProvider;
  public readonly tiers: readonly SuggestionTier[];
  public readonly pipeline: SuggestionPipeline;
  public readonly sessions: SessionRegistry;

  constructor(config: AppConfig = getConfig(), overrides: ServiceOverrides = {}) {
    validateConfig(config);
    this.config = config;

    // Step 1: Emotion classifier over the configured native model
    const model = overrides.emotionModel ?? ServiceContainer.buildEmotionModel(config, overrides.fetchImpl);
    this.classifier = new EmotionClassifier(model, {
      lowConfidenceThreshold: config.emotion.lowConfidenceThreshold,
    });

    // Step 2: Embeddings
    this.embeddingProvider = overrides.embeddingProvider ?? new VoyageEmbeddingProvider({
      apiKey: config.credentials.voyageApiKey,
      baseUrl: config.embedding.baseUrl,
      model: config.embedding.model,
      timeoutMs: config.embedding.timeoutMs,
      fetchImpl: overrides.fetchImpl,
    });

    // Step 3: Suggestion fallback chain
    this.tiers = overrides.tiers ?? ServiceContainer.buildTiers(config, overrides);
    this.pipeline = new SuggestionPipeline(this.tiers);

    // Step 4: Session registry for the HTTP host
    this.sessions = new SessionRegistry((sessionId) => this.createSession(sessionId), {
      idleMs: config.api.sessionIdleMs,
    });
  }

  private static buildEmotionModel(config: AppConfig, fetchImpl?: typeof fetch): NativeEmotionModel {
    if (config.emotion.model === 'huggingface') {
      return new HuggingFaceEmotionModel({
        apiKey: config.credentials.huggingFaceApiKey,
        ...config.emotion.huggingFace,
        fetchImpl,
      });
    }
    return new LexiconEmotionModel();
  }

  private static buildTiers(config: AppConfig, overrides: ServiceOverrides): SuggestionTier[] {
    const { suggestion, conversation } = config;

    const primary = new GeminiChatProvider(
      {
        apiKey: config.credentials.geminiApiKey,
        model: suggestion.primary.model,
        temperature: suggestion.primary.temperature,
        maxOutputTokens: suggestion.primary.maxOutputTokens,
        timeoutMs: suggestion.primary.timeoutMs,
      },
      overrides.geminiClient
    );

    const secondary = new ChatCompletionsProvider({
      apiKey: config.credentials.togetherApiKey,
      baseUrl: suggestion.secondary.baseUrl,
      model: suggestion.secondary.model,
      temperature: suggestion.secondary.temperature,
      maxOutputTokens: suggestion.secondary.maxOutputTokens,
      topP: suggestion.secondary.topP,
      fetchImpl: overrides.fetchImpl,
    });

    return [
      new RemoteChatTier(SourceTiers.PRIMARY_API, primary, {
        contextWindowTurns: conversation.contextWindowTurns,
        timeoutMs: suggestion.primary.timeoutMs,
        minReplyLength: suggestion.minReplyLength,
        genericReplyPhrases: suggestion.genericReplyPhrases,
      }),
      new RemoteChatTier(SourceTiers.SECONDARY_API, secondary, {
        contextWindowTurns: conversation.contextWindowTurns,
        timeoutMs: suggestion.secondary.timeoutMs,
        minReplyLength: suggestion.minReplyLength,
        genericReplyPhrases: suggestion.genericReplyPhrases,
      }),
      new RuleBasedTier(),
    ];
  }

  /**
   * New, empty chat session sharing this container's backends
   */
  public createSession(sessionId?: string): ChatSession {
    return new ChatSession(
      {
        classifier: this.classifier,
        suggester: this.pipeline,
        embeddingProvider: this.embeddingProvider,
      },
      { id: sessionId }
    );
  }

  /**
   * Which capabilities are usable right now
   */
  public capabilities(): CapabilityReport {
    return {
      classifier: { model: this.classifier.modelName, available: this.classifier.isAvailable() },
      embedding: this.embeddingProvider.isAvailable(),
      suggestionTiers: this.tiers.map((tier) => ({ tier: tier.tier, available: tier.isAvailable() })),
    };
  }

  /**
   * Log which capabilities are configured, and which are not
   */
  public logCapabilities(): void {
    const report = this.capabilities();
    logger.info('Solace services ready', report);

    if (!hasCredential(this.config, 'voyageApiKey')) {
      logger.warn('VOYAGE_API_KEY not set: turns run without embeddings');
    }
    if (!report.classifier.available) {
      logger.warn(`Emotion model '${report.classifier.model}' unavailable: every turn is classified neutral`);
    }
    const remote = report.suggestionTiers.filter((tier) => tier.tier !== SourceTiers.FALLBACK_RULE);
    if (remote.every((tier) => !tier.available)) {
      logger.warn('No chat API credentials set: replies come from offline templates');
    }
  }

  public static getInstance(): ServiceContainer {
    if (!ServiceContainer.instance) {
      ServiceContainer.instance = new ServiceContainer();
    }
    return ServiceContainer.instance;
  }

  public static resetInstance(): void {
    ServiceContainer.instance?.sessions.stop();
    ServiceContainer.instance = null;
  }
}

export const getServices = () => ServiceContainer.getInstance();
