import { RemoteChatTier } from '../../../src/suggestion/remote-tier';
import { formatUserPrompt } from '../../../src/suggestion/prompt';
import { ChatProvider, SourceTiers, SuggestionRequest } from '../../../src/suggestion/types';
import { SuggestionTierFailure } from '../../../src/utils/errors';
import { StubChatProvider, emotionOf, turnsOf } from '../../helpers/fakes';

const OPTIONS = { contextWindowTurns: 4, timeoutMs: 1000, minReplyLength: 20 };

describe('RemoteChatTier', () => {
  const request: SuggestionRequest = {
    text: 'I feel lonely tonight',
    emotion: emotionOf('sadness', 0.7),
    context: turnsOf('user', 'assistant'),
  };

  it('should be available only when the provider is configured', () => {
    const provider = new StubChatProvider('stub', 'unused');
    const tier = new RemoteChatTier(SourceTiers.PRIMARY_API, provider, OPTIONS);

    expect(tier.isAvailable()).toBe(true);
    provider.configured = false;
    expect(tier.isAvailable()).toBe(false);
  });

  it('should return the trimmed reply', async () => {
    const provider = new StubChatProvider('stub', "  That sounds hard. I'm here with you.  \n");
    const outcome = await new RemoteChatTier(SourceTiers.PRIMARY_API, provider, OPTIONS).attempt(request);

    expect(outcome).toEqual({ ok: true, text: "That sounds hard. I'm here with you." });
    expect(provider.requests).toHaveLength(1);
    expect(provider.requests[0].messages.map((message) => message.text)).toEqual([
      'user 1',
      'assistant 2',
      formatUserPrompt('I feel lonely tonight', request.emotion),
    ]);
  });

  it('should fail as unavailable without calling an unconfigured provider', async () => {
    const provider = new StubChatProvider('stub', 'A perfectly long enough reply.');
    provider.configured = false;

    const outcome = await new RemoteChatTier(SourceTiers.SECONDARY_API, provider, OPTIONS).attempt(request);

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.failure.reason).toBe('unavailable');
      expect(outcome.failure.tier).toBe('SECONDARY_API');
    }
    expect(provider.requests).toHaveLength(0);
  });

  it('should reject replies below the minimum length', async () => {
    const provider = new StubChatProvider('stub', '   ok   ');
    const outcome = await new RemoteChatTier(SourceTiers.PRIMARY_API, provider, OPTIONS).attempt(request);

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.failure.reason).toBe('empty_completion');
      expect(outcome.failure.details).toEqual({ length: 2 });
    }
  });

  it('should reject replies that lean on a stock phrase', async () => {
    const provider = new StubChatProvider('stub', 'Thank you for sharing. That sounds really hard.');
    const tier = new RemoteChatTier(SourceTiers.PRIMARY_API, provider, {
      ...OPTIONS,
      genericReplyPhrases: ['thank you for sharing', 'as an ai language model'],
    });

    const outcome = await tier.attempt(request);

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.failure.reason).toBe('generic_reply');
      expect(outcome.failure.message).toBe('stub: Reply leans on stock phrasing: thank you for sharing');
      expect(outcome.failure.details).toEqual({ phrases: ['thank you for sharing'] });
    }
  });

  it('should accept any long enough reply when no stock phrases are configured', async () => {
    const provider = new StubChatProvider('stub', 'Thank you for sharing. That sounds really hard.');
    const outcome = await new RemoteChatTier(SourceTiers.PRIMARY_API, provider, OPTIONS).attempt(request);

    expect(outcome).toEqual({ ok: true, text: 'Thank you for sharing. That sounds really hard.' });
  });

  it('should pass provider failures through', async () => {
    const failure = new SuggestionTierFailure(SourceTiers.PRIMARY_API, 'http_error', 'stub API error: 500');
    const provider = new StubChatProvider('stub', failure);

    const outcome = await new RemoteChatTier(SourceTiers.PRIMARY_API, provider, OPTIONS).attempt(request);

    expect(outcome).toEqual({ ok: false, failure });
  });

  it('should report unexpected errors as provider errors', async () => {
    const provider = new StubChatProvider('stub', new Error('socket hang up'));
    const outcome = await new RemoteChatTier(SourceTiers.PRIMARY_API, provider, OPTIONS).attempt(request);

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.failure.reason).toBe('provider_error');
      expect(outcome.failure.message).toBe('stub: socket hang up');
    }
  });

  it('should give up after the timeout', async () => {
    const slow: ChatProvider = {
      name: 'slow',
      modelId: 'slow-model',
      isConfigured: () => true,
      complete: () => new Promise<string>(() => undefined),
    };

    const outcome = await new RemoteChatTier(SourceTiers.SECONDARY_API, slow, { ...OPTIONS, timeoutMs: 20 }).attempt(request);

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.failure.reason).toBe('timeout');
      expect(outcome.failure.message).toBe('slow: Request timed out after 20ms');
    }
  });

  it('should hand the provider a signal that aborts on timeout', async () => {
    const received: AbortSignal[] = [];
    const slow: ChatProvider = {
      name: 'slow',
      modelId: 'slow-model',
      isConfigured: () => true,
      complete: (_chat, signal) => {
        received.push(signal);
        return new Promise<string>(() => undefined);
      },
    };

    await new RemoteChatTier(SourceTiers.PRIMARY_API, slow, { ...OPTIONS, timeoutMs: 20 }).attempt(request);

    expect(received).toHaveLength(1);
    expect(received[0].aborted).toBe(true);
  });
});
