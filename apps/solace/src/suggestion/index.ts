/**
 * Suggestion Module
 * Tiered reply generation: primary API, secondary API, offline templates
 */

export { SuggestionPipeline, SAFETY_NET_REPLY } from './pipeline';
export { RemoteChatTier } from './remote-tier';
export type { RemoteChatTierOptions } from './remote-tier';
export { RuleBasedTier, composeRuleReply, excerptOf, renderTemplate, selectTemplate } from './rule-tier';
export type { TemplateCatalog, TemplateChoice } from './rule-tier';
export { buildChatRequest, buildSystemInstruction, formatUserPrompt } from './prompt';
export { GeminiChatProvider } from './providers/gemini-provider';
export type { GeminiModelFactory, GeminiProviderOptions } from './providers/gemini-provider';
export { ChatCompletionsProvider } from './providers/chat-completions-provider';
export type { ChatCompletionsProviderOptions } from './providers/chat-completions-provider';

export { SourceTiers } from './types';
export type {
  ChatProvider,
  ChatRequest,
  SourceTier,
  SuggestionRequest,
  SuggestionResult,
  SuggestionTier,
  TierAttempt,
  TierOutcome,
} from './types';
