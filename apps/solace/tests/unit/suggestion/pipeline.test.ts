import { SAFETY_NET_REPLY, SuggestionPipeline } from '../../../src/suggestion/pipeline';
import { RemoteChatTier } from '../../../src/suggestion/remote-tier';
import { RuleBasedTier } from '../../../src/suggestion/rule-tier';
import { SourceTiers, SuggestionRequest, SuggestionTier } from '../../../src/suggestion/types';
import { TurnAbortedError } from '../../../src/utils/errors';
import { StubChatProvider, emotionOf } from '../../helpers/fakes';

const OPTIONS = { contextWindowTurns: 4, timeoutMs: 1000, minReplyLength: 20 };

describe('SuggestionPipeline', () => {
  let primary: StubChatProvider;
  let secondary: StubChatProvider;

  const request: SuggestionRequest = {
    text: 'I just lost my job today',
    emotion: emotionOf('sadness', 0.82),
    context: [],
  };

  const pipeline = (rule: SuggestionTier = new RuleBasedTier()) =>
    new SuggestionPipeline([
      new RemoteChatTier(SourceTiers.PRIMARY_API, primary, OPTIONS),
      new RemoteChatTier(SourceTiers.SECONDARY_API, secondary, OPTIONS),
      rule,
    ]);

  beforeEach(() => {
    primary = new StubChatProvider('primary', 'Primary reply: losing a job is a lot to carry.');
    secondary = new StubChatProvider('secondary', 'Secondary reply: I am here with you through this.');
  });

  it('should use the primary tier when it succeeds', async () => {
    const result = await pipeline().suggest(request);

    expect(result.sourceTier).toBe('PRIMARY_API');
    expect(result.text).toBe('Primary reply: losing a job is a lot to carry.');
    expect(result.attempts.map((attempt) => attempt.outcome)).toEqual(['success']);
    expect(secondary.requests).toHaveLength(0);
  });

  it('should fall back to the secondary tier when the primary fails', async () => {
    primary.reply = new Error('quota exceeded');

    const result = await pipeline().suggest(request);

    expect(result.sourceTier).toBe('SECONDARY_API');
    expect(result.text).toBe('Secondary reply: I am here with you through this.');
    expect(result.attempts).toHaveLength(2);
    expect(result.attempts[0]).toMatchObject({
      tier: 'PRIMARY_API',
      outcome: 'failed',
      reason: 'provider_error',
      message: 'primary: quota exceeded',
    });
    expect(result.attempts[1]).toMatchObject({ tier: 'SECONDARY_API', outcome: 'success' });
  });

  it('should skip unconfigured tiers and reply from templates', async () => {
    primary.configured = false;
    secondary.configured = false;

    const result = await pipeline().suggest(request);

    expect(result.sourceTier).toBe('FALLBACK_RULE');
    expect(result.text.length).toBeGreaterThan(0);
    expect(result.attempts).toEqual([
      { tier: 'PRIMARY_API', outcome: 'skipped', reason: 'unavailable', durationMs: 0 },
      { tier: 'SECONDARY_API', outcome: 'skipped', reason: 'unavailable', durationMs: 0 },
      expect.objectContaining({ tier: 'FALLBACK_RULE', outcome: 'success' }),
    ]);
    expect(primary.requests).toHaveLength(0);
    expect(secondary.requests).toHaveLength(0);
  });

  it('should return the safety-net reply when even the rule tier throws', async () => {
    primary.configured = false;
    secondary.reply = 'too short';
    const broken: SuggestionTier = {
      tier: SourceTiers.FALLBACK_RULE,
      isAvailable: () => true,
      attempt: () => Promise.reject(new Error('template catalog missing')),
    };

    const result = await pipeline(broken).suggest(request);

    expect(result).toEqual({
      text: SAFETY_NET_REPLY,
      sourceTier: 'FALLBACK_RULE',
      attempts: [
        { tier: 'PRIMARY_API', outcome: 'skipped', reason: 'unavailable', durationMs: 0 },
        expect.objectContaining({ tier: 'SECONDARY_API', outcome: 'failed', reason: 'empty_completion' }),
        expect.objectContaining({
          tier: 'FALLBACK_RULE',
          outcome: 'failed',
          reason: 'provider_error',
          message: 'template catalog missing',
        }),
      ],
    });
  });

  it('should stop when the caller aborts', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(pipeline().suggest(request, controller.signal)).rejects.toBeInstanceOf(TurnAbortedError);
    expect(primary.requests).toHaveLength(0);
  });

  it('should list the tiers in the order they are tried', () => {
    expect(pipeline().order).toEqual(['PRIMARY_API', 'SECONDARY_API', 'FALLBACK_RULE']);
  });

  it('should require at least one tier', () => {
    expect(() => new SuggestionPipeline([])).toThrow('SuggestionPipeline needs at least one tier');
  });
});
