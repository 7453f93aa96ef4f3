/**
 * Solace Configuration
 *
 * Central configuration for provider endpoints, timeouts, context sizing and logging.
 * Credentials are never part of the defaults; they are read from the environment.
 */

import { ConfigurationError } from './errors';

export type EmotionModelName = 'lexicon' | 'huggingface';

const DEFAULT_EMOTION_MODEL: EmotionModelName = 'lexicon';

/**
 * Main configuration object
 */
export const CONFIG = {
  /**
   * Conversation window
   */
  conversation: {
    contextWindowTurns: 4,   // Most recent turns sent to a chat API
  },

  /**
   * Emotion classification
   */
  emotion: {
    model: DEFAULT_EMOTION_MODEL,
    lowConfidenceThreshold: 0.35,
    huggingFace: {
      baseUrl: 'https://api-inference.huggingface.co/models',
      model: 'j-hartmann/emotion-english-distilroberta-base',
      timeoutMs: 15000,
    },
  },

  /**
   * Voyage AI embeddings
   */
  embedding: {
    baseUrl: 'https://api.voyageai.com/v1',
    model: 'voyage-lite-02-instruct',
    timeoutMs: 15000,
  },

  /**
   * Suggestion tiers
   */
  suggestion: {
    minReplyLength: 20,      // Shorter completions count as empty
    genericReplyPhrases: ['thank you for sharing', 'as an ai language model'],
    primary: {
      model: 'gemini-1.5-flash',
      temperature: 0.9,
      maxOutputTokens: 600,
      timeoutMs: 30000,
    },
    secondary: {
      baseUrl: 'https://api.together.xyz/v1',
      model: 'mistralai/Mixtral-8x7B-Instruct-v0.1',
      temperature: 0.9,
      maxOutputTokens: 600,
      topP: 0.95,
      timeoutMs: 45000,
    },
  },

  /**
   * API Server Configuration
   */
  api: {
    port: 3000,
    host: '0.0.0.0',
    sessionIdleMs: 30 * 60 * 1000,  // Sessions expire after 30 idle minutes
    maxMessageLength: 4000,
  },

  /**
   * Logging Configuration
   */
  logging: {
    level: process.env.LOG_LEVEL || 'info',  // Log level: debug, info, warn, error
    pretty: process.env.NODE_ENV !== 'production',  // Pretty print logs in dev
  },
} as const;

/**
 * Named credentials. A missing credential disables the capability it unlocks.
 */
export interface Credentials {
  voyageApiKey: string | null;
  geminiApiKey: string | null;
  togetherApiKey: string | null;
  huggingFaceApiKey: string | null;
}

export type CredentialName = keyof Credentials;

type Env = Record<string, string | undefined>;

const readCredential = (value: string | undefined): string | null => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
};

const readList = (value: string | undefined, fallback: readonly string[]): string[] => {
  if (value === undefined) return [...fallback];
  return value.split(',').map((item) => item.trim()).filter((item) => item.length > 0);
};

const readInt = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new ConfigurationError(`Expected an integer but got '${value}'`);
  }
  return parsed;
};

const readModelName = (value: string | undefined): EmotionModelName => {
  if (value === undefined || value === '') return CONFIG.emotion.model;
  if (value === 'lexicon' || value === 'huggingface') return value;
  throw new ConfigurationError(`Unknown EMOTION_MODEL '${value}' (expected lexicon or huggingface)`);
};

/**
 * Environment-specific configuration overrides
 */
export const getConfig = (env: Env = process.env) => {
  const credentials: Credentials = {
    voyageApiKey: readCredential(env.VOYAGE_API_KEY),
    geminiApiKey: readCredential(env.GEMINI_API_KEY),
    togetherApiKey: readCredential(env.TOGETHER_API_KEY),
    huggingFaceApiKey: readCredential(env.HF_API_KEY),
  };

  const requestTimeout = readInt(env.REQUEST_TIMEOUT_MS, 0);

  const conversation = {
    contextWindowTurns: readInt(env.CONTEXT_WINDOW_TURNS, CONFIG.conversation.contextWindowTurns),
  };

  const emotion = {
    ...CONFIG.emotion,
    model: readModelName(env.EMOTION_MODEL),
    huggingFace: {
      ...CONFIG.emotion.huggingFace,
      timeoutMs: requestTimeout || CONFIG.emotion.huggingFace.timeoutMs,
    },
  };

  const embedding = {
    ...CONFIG.embedding,
    model: env.VOYAGE_MODEL || CONFIG.embedding.model,
    timeoutMs: requestTimeout || CONFIG.embedding.timeoutMs,
  };

  const suggestion = {
    minReplyLength: readInt(env.MIN_REPLY_LENGTH, CONFIG.suggestion.minReplyLength),
    genericReplyPhrases: readList(env.GENERIC_REPLY_PHRASES, CONFIG.suggestion.genericReplyPhrases),
    primary: {
      ...CONFIG.suggestion.primary,
      model: env.GEMINI_MODEL || CONFIG.suggestion.primary.model,
      timeoutMs: requestTimeout || CONFIG.suggestion.primary.timeoutMs,
    },
    secondary: {
      ...CONFIG.suggestion.secondary,
      baseUrl: env.TOGETHER_API_URL || CONFIG.suggestion.secondary.baseUrl,
      model: env.TOGETHER_MODEL || CONFIG.suggestion.secondary.model,
      timeoutMs: requestTimeout || CONFIG.suggestion.secondary.timeoutMs,
    },
  };

  const api = {
    ...CONFIG.api,
    port: readInt(env.PORT, CONFIG.api.port),
    host: env.HOST || CONFIG.api.host,
    sessionIdleMs: readInt(env.SESSION_IDLE_MS, CONFIG.api.sessionIdleMs),
  };

  return {
    ...CONFIG,
    credentials,
    conversation,
    emotion,
    embedding,
    suggestion,
    api,
  };
};

/**
 * Type-safe configuration access
 */
export type AppConfig = ReturnType<typeof getConfig>;

/**
 * Capability availability predicate. Evaluated at call time, never cached.
 */
export const hasCredential = (config: AppConfig, name: CredentialName): boolean => {
  return config.credentials[name] !== null;
};

/**
 * Validate configuration on startup
 */
export const validateConfig = (config: AppConfig): void => {
  if (config.conversation.contextWindowTurns < 0) {
    throw new ConfigurationError('CONTEXT_WINDOW_TURNS must not be negative');
  }

  const timeouts = [
    config.embedding.timeoutMs,
    config.emotion.huggingFace.timeoutMs,
    config.suggestion.primary.timeoutMs,
    config.suggestion.secondary.timeoutMs,
  ];
  if (timeouts.some((ms) => !Number.isFinite(ms) || ms <= 0)) {
    throw new ConfigurationError('Request timeouts must be finite and positive');
  }

  if (config.emotion.lowConfidenceThreshold < 0 || config.emotion.lowConfidenceThreshold > 1) {
    throw new ConfigurationError('Low confidence threshold must be between 0 and 1');
  }

  if (config.suggestion.minReplyLength < 1) {
    throw new ConfigurationError('MIN_REPLY_LENGTH must be at least 1');
  }

  if (config.api.port < 1024 || config.api.port > 65535) {
    throw new ConfigurationError('API port must be between 1024 and 65535');
  }
};
