import { describe, it, expect } from 'vitest';
import { analyzeKeywords } from '../analysis/keyword-analysis.js';

describe('analyzeKeywords', () => {
  it('counts words after removing punctuation and stopwords', () => {
    const stats = analyzeKeywords('The data, the DATA and data-driven pipelines. Pipelines!');

    expect(stats).toEqual({
      keywords: [['data', 2], ['pipelines', 2], ['datadriven', 1]],
      word_count: 8,
      unique_words: 3,
    });
  });

  it('returns at most the requested number of keywords', () => {
    const text = Array.from({ length: 15 }, (_, i) => `skill${i}`).join(' ');

    expect(analyzeKeywords(text).keywords).toHaveLength(10);
    expect(analyzeKeywords(text, 3).keywords).toEqual([['skill0', 1], ['skill1', 1], ['skill2', 1]]);
  });

  it('handles empty text', () => {
    expect(analyzeKeywords('')).toEqual({ keywords: [], word_count: 0, unique_words: 0 });
  });
});
