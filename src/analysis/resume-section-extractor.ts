import logger from '../lib/logger.js';

export function countWords(text: string): number {
  return splitWords(text).length;
}

function splitWords(text: string): string[] {
  return text.split(/\s+/).filter((word) => word.length > 0);
}

export function findStopPhrase(line: string, stopPhrases: readonly string[]): string | null {
  const lower = line.toLowerCase().trim();
  for (const phrase of stopPhrases) {
    if (lower.includes(phrase.toLowerCase())) return phrase;
  }
  return null;
}

/**
 * Keeps the genuine resume part of a sanitized document.
 *
 * Resumes are often followed in the same PDF by certificates or reference
 * letters; extraction stops at the first line containing a stop phrase
 * (case-insensitive substring) and never exceeds `maxWords` words, cutting
 * the last kept line mid-way when needed. A stop phrase on the first line
 * yields '' — callers treat that as "no usable content".
 */
export function extractCore(doc: string, maxWords: number, stopPhrases: readonly string[]): string {
  if (!Number.isInteger(maxWords) || maxWords <= 0) {
    throw new RangeError(`maxWords must be a positive integer, got ${maxWords}`);
  }

  const kept: string[] = [];
  let wordCount = 0;

  for (const line of doc.split('\n')) {
    const phrase = findStopPhrase(line, stopPhrases);
    if (phrase) {
      logger.debug({ phrase, line: line.slice(0, 50) }, 'Stopping at non-resume section');
      break;
    }

    const words = splitWords(line);
    if (wordCount + words.length > maxWords) {
      const remaining = maxWords - wordCount;
      kept.push(words.slice(0, remaining).join(' '));
      wordCount = maxWords;
      logger.debug({ maxWords }, 'Resume text truncated at word ceiling');
      break;
    }

    kept.push(line);
    wordCount += words.length;
  }

  return kept.join('\n').trim();
}
