/**
 * Solace - emotion-aware supportive chat
 *
 * Library entry point. `ServiceContainer` builds everything from the
 * environment; the pieces are exported for callers that wire their own.
 */

export { ChatSession, computeSessionStats } from './orchestrator';
export type {
  ChatSessionDependencies,
  ProcessTurnOptions,
  SessionSnapshot,
  SessionStats,
  TurnResult,
} from './orchestrator';

export { ConversationState } from './conversation/state';
export { assembleAlternatingHistory, isStrictlyAlternating, repairAlternation } from './conversation/alternation';
export { Roles } from './conversation/types';
export type { ChatMessage, Role, Turn } from './conversation/types';

export * from './emotion';
export * from './suggestion';

export { VoyageEmbeddingProvider } from './embedding/voyage-client';
export type { EmbeddingProvider, EmbeddingVector } from './embedding/types';

export { SessionRegistry } from './sessions/registry';
export { ServiceContainer, getServices } from './services/index';
export type { CapabilityReport, ServiceOverrides } from './services/index';
export { createApp } from './api/index';

export { CONFIG, getConfig, validateConfig, hasCredential } from './utils/config';
export type { AppConfig, Credentials } from './utils/config';
export * from './utils/errors';
export { Logger, LogLevel, createLogger } from './utils/logger';
