import { NATIVE_TO_CANONICAL, detectCues, mapNativeLabel } from '../../../src/emotion/label-map';
import { CANONICAL_EMOTIONS, NATIVE_EMOTIONS } from '../../../src/emotion/types';

describe('NATIVE_TO_CANONICAL', () => {
  it('should map every native label to a canonical label', () => {
    for (const native of NATIVE_EMOTIONS) {
      expect(CANONICAL_EMOTIONS).toContain(NATIVE_TO_CANONICAL[native]);
    }
  });

  it('should use the fixed routes', () => {
    expect(NATIVE_TO_CANONICAL).toEqual({
      joy: 'happiness',
      sadness: 'sadness',
      anger: 'anger',
      fear: 'anxiety',
      surprise: 'anxiety',
      disgust: 'anger',
    });
  });
});

describe('detectCues', () => {
  it('should find depression and frustration cues', () => {
    expect(detectCues("I'm fed up and I feel hopeless")).toEqual(new Set(['depression', 'frustration']));
  });

  it('should match stems', () => {
    expect(detectCues('So frustrating. I feel depressed.')).toEqual(new Set(['depression', 'frustration']));
  });

  it('should ignore case and typographic apostrophes', () => {
    expect(detectCues('I CAN’T GET OUT OF BED')).toEqual(new Set(['depression']));
  });

  it('should find happiness cues', () => {
    expect(detectCues('Great news, I am so excited')).toEqual(new Set(['happiness']));
  });

  it('should not match inside other words', () => {
    expect(detectCues('The numbers are unstuck now')).toEqual(new Set());
  });
});

describe('mapNativeLabel', () => {
  it('should use the base table without cues', () => {
    expect(mapNativeLabel('sadness')).toBe('sadness');
    expect(mapNativeLabel('fear')).toBe('anxiety');
  });

  it('should route sadness to depression with a depression cue', () => {
    expect(mapNativeLabel('sadness', new Set(['depression']))).toBe('depression');
  });

  it('should route anger to frustration with a frustration cue', () => {
    expect(mapNativeLabel('anger', new Set(['frustration']))).toBe('frustration');
  });

  it('should map disgust to anger, or to frustration with a frustration cue', () => {
    expect(mapNativeLabel('disgust')).toBe('anger');
    expect(mapNativeLabel('disgust', new Set(['frustration']))).toBe('frustration');
  });

  it('should route surprise to happiness with a happiness cue', () => {
    expect(mapNativeLabel('surprise')).toBe('anxiety');
    expect(mapNativeLabel('surprise', new Set(['happiness']))).toBe('happiness');
  });

  it('should leave labels without a cue route alone', () => {
    expect(mapNativeLabel('anger', new Set(['depression']))).toBe('anger');
    expect(mapNativeLabel('joy', new Set(['depression', 'frustration', 'happiness']))).toBe('happiness');
    expect(mapNativeLabel('fear', new Set(['happiness']))).toBe('anxiety');
  });
});
