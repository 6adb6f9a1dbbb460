const PUNCTUATION = /[!"#$%&'()*+,\-./:;<=>?@[\\\]^_`{|}~]/g;

const STOPWORDS = new Set([
  'the', 'and', 'is', 'in', 'to', 'of', 'a', 'that',
  'with', 'for', 'as', 'on', 'are', 'by', 'this', 'be',
]);

export interface KeywordStats {
  /** Most frequent non-stopword words, ties in first-seen order. */
  keywords: Array<[word: string, count: number]>;
  word_count: number;
  unique_words: number;
}

export function analyzeKeywords(text: string, limit = 10): KeywordStats {
  const words = text
    .toLowerCase()
    .replace(PUNCTUATION, '')
    .split(/\s+/)
    .filter((word) => word.length > 0);

  const counts = new Map<string, number>();
  for (const word of words) {
    if (STOPWORDS.has(word)) continue;
    counts.set(word, (counts.get(word) ?? 0) + 1);
  }

  const keywords = [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit);

  return {
    keywords,
    word_count: words.length,
    unique_words: counts.size,
  };
}
