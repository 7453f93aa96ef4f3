import chalk from 'chalk';
import { emotionEmoji, formatAlsoDetected, formatEmotionBadge } from '../../../src/cli/display/emotion';
import { describeSourceTier, formatDegradedNotice } from '../../../src/cli/display/reply';
import { statsRows } from '../../../src/cli/display/stats';
import { neutralEmotionResult } from '../../../src/emotion/classifier';
import { emptyEmotionCounts } from '../../../src/orchestrator/stats';
import { SourceTiers, SuggestionResult } from '../../../src/suggestion/types';
import { emotionOf } from '../../helpers/fakes';

describe('CLI display', () => {
  let previousLevel: typeof chalk.level;

  beforeAll(() => {
    previousLevel = chalk.level;
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = previousLevel;
  });

  describe('emotion', () => {
    const sadness = {
      ...emotionOf('sadness', 0.82),
      topK: [
        { label: 'sadness' as const, probability: 0.82 },
        { label: 'anxiety' as const, probability: 0.12 },
        { label: 'happiness' as const, probability: 0.03 },
      ],
    };

    it('should show label and confidence', () => {
      expect(formatEmotionBadge(sadness)).toBe('😔  SADNESS (82% confidence)');
    });

    it('should say when no emotion was detected', () => {
      expect(formatEmotionBadge(neutralEmotionResult())).toBe('😐  NEUTRAL (emotion not detected)');
    });

    it('should list the runners-up', () => {
      expect(formatAlsoDetected(sadness)).toBe('Also detected: anxiety 12%, happiness 3%');
    });

    it('should leave out runners-up with no probability', () => {
      const certain = {
        ...sadness,
        topK: [
          { label: 'sadness' as const, probability: 1 },
          { label: 'happiness' as const, probability: 0 },
        ],
      };

      expect(formatAlsoDetected(certain)).toBeNull();
      expect(formatAlsoDetected(neutralEmotionResult())).toBeNull();
    });

    it('should have an emoji for every label', () => {
      expect(emotionEmoji('frustration')).toBe('😤');
      expect(emotionEmoji('neutral')).toBe('😐');
    });
  });

  describe('reply', () => {
    const fallback = (failed: number): SuggestionResult => ({
      text: 'Template reply',
      sourceTier: SourceTiers.FALLBACK_RULE,
      attempts: [
        ...Array.from({ length: failed }, () => ({
          tier: SourceTiers.PRIMARY_API,
          outcome: 'failed' as const,
          reason: 'timeout' as const,
          durationMs: 10,
        })),
        { tier: SourceTiers.FALLBACK_RULE, outcome: 'success' as const, durationMs: 0 },
      ],
    });

    it('should name each source tier', () => {
      expect(describeSourceTier('PRIMARY_API')).toBe('Gemini');
      expect(describeSourceTier('SECONDARY_API')).toBe('Together AI');
      expect(describeSourceTier('FALLBACK_RULE')).toBe('offline templates');
    });

    it('should not flag replies from a chat API', () => {
      expect(formatDegradedNotice({ ...fallback(0), sourceTier: SourceTiers.SECONDARY_API })).toBeNull();
    });

    it('should count failed chat APIs', () => {
      expect(formatDegradedNotice(fallback(1))).toBe('⚠ Offline mode: 1 chat API failed, reply built from templates');
      expect(formatDegradedNotice(fallback(2))).toBe('⚠ Offline mode: 2 chat APIs failed, reply built from templates');
    });

    it('should explain when no chat API is configured', () => {
      expect(formatDegradedNotice(fallback(0))).toBe('⚠ Offline mode: no chat API configured, reply built from templates');
    });
  });

  describe('stats', () => {
    it('should list seen emotions, most frequent first', () => {
      const rows = statsRows({
        totalTurns: 3,
        messageCount: 6,
        emotionCounts: { ...emptyEmotionCounts(), happiness: 1, anxiety: 2 },
        dominantEmotion: 'anxiety',
      });

      expect(rows).toEqual([
        ['😟 anxiety', '2', '67%'],
        ['😊 happiness', '1', '33%'],
      ]);
    });

    it('should be empty before the first turn', () => {
      expect(statsRows({ totalTurns: 0, messageCount: 0, emotionCounts: emptyEmotionCounts(), dominantEmotion: null })).toEqual([]);
    });
  });
});
