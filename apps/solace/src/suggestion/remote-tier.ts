/**
 * RemoteChatTier - one API tier of the suggestion fallback chain
 *
 * Wraps a ChatProvider with request assembly, a bounded timeout and a reply
 * quality gate. Never throws: every failure comes back as a TierOutcome.
 */

import { isStrictlyAlternating } from '../conversation/alternation';
import { SuggestionTierFailure, errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { PhraseMatcher } from '../utils/phrases';
import { TimeoutError, withTimeout } from '../utils/timeout';
import { buildChatRequest } from './prompt';
import { ChatProvider, SourceTier, SuggestionRequest, SuggestionTier, TierOutcome } from './types';

const logger = createLogger('RemoteChatTier');

export interface RemoteChatTierOptions {
  contextWindowTurns: number;
  timeoutMs: number;
  minReplyLength: number;
  /** Stock phrases that disqualify a reply */
  genericReplyPhrases?: readonly string[];
}

export class RemoteChatTier implements SuggestionTier {
  private readonly genericReplies: PhraseMatcher;

  constructor(
    readonly tier: SourceTier,
    private readonly provider: ChatProvider,
    private readonly options: RemoteChatTierOptions
  ) {
    this.genericReplies = new PhraseMatcher(options.genericReplyPhrases ?? []);
  }

  get providerName(): string {
    return this.provider.name;
  }

  isAvailable(): boolean {
    return this.provider.isConfigured();
  }

  async attempt(request: SuggestionRequest, signal?: AbortSignal): Promise<TierOutcome> {
    if (!this.provider.isConfigured()) {
      return this.fail('unavailable', `${this.provider.name} credential not configured`);
    }

    const chat = buildChatRequest(request, this.options.contextWindowTurns);
    if (!isStrictlyAlternating(chat.messages)) {
      return this.fail('provider_error', 'Assembled history does not alternate');
    }

    logger.debug('Requesting reply', {
      tier: this.tier,
      provider: this.provider.name,
      model: this.provider.modelId,
      messages: chat.messages.length,
    });

    let reply: string;
    try {
      reply = await withTimeout(
        (timeoutSignal) => this.provider.complete(chat, timeoutSignal),
        this.options.timeoutMs,
        signal
      );
    } catch (error) {
      if (error instanceof SuggestionTierFailure) {
        return { ok: false, failure: error };
      }
      if (error instanceof TimeoutError) {
        return this.fail('timeout', error.message, { timeoutMs: error.timeoutMs });
      }
      return this.fail('provider_error', errorMessage(error));
    }

    const text = reply.trim();
    if (text.length < this.options.minReplyLength) {
      return this.fail('empty_completion', `Reply shorter than ${this.options.minReplyLength} characters`, {
        length: text.length,
      });
    }

    const stock = this.genericReplies.matches(text);
    if (stock.length > 0) {
      return this.fail('generic_reply', `Reply leans on stock phrasing: ${stock.join(', ')}`, { phrases: stock });
    }

    return { ok: true, text };
  }

  private fail(reason: SuggestionTierFailure['reason'], message: string, details?: unknown): TierOutcome {
    return {
      ok: false,
      failure: new SuggestionTierFailure(this.tier, reason, `${this.provider.name}: ${message}`, details),
    };
  }
}
