import { describe, it, expect } from 'vitest';
import { diceSimilarity, jaccardSimilarity, normalizeName, round, tokenize, truncate } from './text.js';

describe('normalizeName', () => {
  it('folds case, accents and punctuation', () => {
    expect(normalizeName('  Zoë  O\'Brien-Hale ')).toBe('zoe o brien hale');
  });

  it('keeps # so tags survive', () => {
    expect(normalizeName('#Rain, #neon')).toBe('#rain #neon');
  });
});

describe('tokenize', () => {
  it('drops one-letter tokens and tag markers', () => {
    expect(tokenize('A #rain-soaked alley')).toEqual(['rain', 'soaked', 'alley']);
  });
});

describe('similarity', () => {
  it('jaccard is intersection over union', () => {
    expect(jaccardSimilarity(['a', 'b', 'c'], ['b', 'c', 'd'])).toBe(0.5);
    expect(jaccardSimilarity([], [])).toBe(0);
  });

  it('dice is 1 for names equal after normalization', () => {
    expect(diceSimilarity('Ada', 'ADA')).toBe(1);
  });

  it('dice stays low for unrelated names', () => {
    expect(diceSimilarity('ADA', 'BEN')).toBe(0);
  });
});

describe('truncate / round', () => {
  it('truncates with an ellipsis inside the limit', () => {
    expect(truncate('abcdefghij', 8)).toBe('abcde...');
    expect(truncate('short', 8)).toBe('short');
  });

  it('rounds to four places by default', () => {
    expect(round(0.123456)).toBe(0.1235);
  });
});
