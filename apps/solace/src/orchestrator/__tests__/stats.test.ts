import { computeSessionStats, emptyEmotionCounts } from '../stats';
import { emotionOf, turnsOf } from '../../../tests/helpers/fakes';

describe('computeSessionStats', () => {
  it('should report an empty session', () => {
    expect(computeSessionStats([], [])).toEqual({
      totalTurns: 0,
      messageCount: 0,
      emotionCounts: emptyEmotionCounts(),
      dominantEmotion: null,
    });
  });

  it('should count user turns and their emotions', () => {
    const turns = turnsOf('user', 'assistant', 'user', 'assistant', 'user');
    const stats = computeSessionStats(turns, [
      { turnTimestamp: 1, result: emotionOf('anxiety', 0.6) },
      { turnTimestamp: 3, result: emotionOf('anxiety', 0.7) },
      { turnTimestamp: 5, result: emotionOf('happiness', 0.9) },
    ]);

    expect(stats.totalTurns).toBe(3);
    expect(stats.messageCount).toBe(5);
    expect(stats.emotionCounts).toEqual({ ...emptyEmotionCounts(), anxiety: 2, happiness: 1 });
    expect(stats.dominantEmotion).toBe('anxiety');
  });

  it('should ignore emotions whose user turn is not in the log', () => {
    const stats = computeSessionStats(turnsOf('user', 'assistant'), [
      { turnTimestamp: 1, result: emotionOf('sadness', 0.8) },
      { turnTimestamp: 7, result: emotionOf('anger', 0.8) },
    ]);

    expect(stats.emotionCounts.anger).toBe(0);
    expect(stats.emotionCounts.sadness).toBe(1);
  });

  it('should break ties in label order', () => {
    const stats = computeSessionStats(turnsOf('user', 'assistant', 'user'), [
      { turnTimestamp: 1, result: emotionOf('anger', 0.8) },
      { turnTimestamp: 3, result: emotionOf('sadness', 0.8) },
    ]);

    expect(stats.dominantEmotion).toBe('sadness');
  });

  it('should count a dangling user turn', () => {
    const stats = computeSessionStats(turnsOf('user'), [{ turnTimestamp: 1, result: emotionOf('depression', 0.5) }]);

    expect(stats.totalTurns).toBe(1);
    expect(stats.messageCount).toBe(1);
    expect(stats.dominantEmotion).toBe('depression');
  });
});
