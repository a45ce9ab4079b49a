import { createLogger } from '../logger.js';

const log = createLogger('Readability');

export type ReadabilityStats = Record<string, number>;

/** Scripts written without spaces between words. */
const UNSPACED_LANGUAGES = new Set(['zh', 'ja', 'th', 'lo', 'km', 'my']);

const SENTENCE_SPLIT = /[.!?。！？]/;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function countSentences(text: string): number {
  return text.split(SENTENCE_SPLIT).filter(sentence => sentence.trim()).length;
}

function extractWords(text: string): string[] {
  return text
    .split(/\s+/)
    .map(word => word.replace(/^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu, ''))
    .filter(Boolean);
}

/** Vowel-group syllable estimate; short words count as one syllable. */
export function countSyllables(word: string): number {
  const letters = word.toLowerCase().replace(/[^a-z]/g, '');
  if (letters.length === 0) return 0;
  if (letters.length <= 3) return 1;

  const trimmed = letters.replace(/(?:[^laeiouy]es|ed|[^laeiouy]e)$/, '').replace(/^y/, '');
  const groups = trimmed.match(/[aeiouy]{1,2}/g);
  return Math.max(1, groups ? groups.length : 0);
}

function indexStats(text: string): ReadabilityStats {
  const words = extractWords(text);
  const sentenceCount = Math.max(1, countSentences(text));
  if (words.length === 0) return {};

  const syllables = words.map(countSyllables);
  const syllableCount = syllables.reduce((sum, n) => sum + n, 0);
  const complexWords = syllables.filter(n => n >= 3).length;
  const letterCount = words.reduce((sum, word) => sum + word.length, 0);

  const wordsPerSentence = words.length / sentenceCount;
  const syllablesPerWord = syllableCount / words.length;
  const lettersPer100 = (letterCount / words.length) * 100;
  const sentencesPer100 = (sentenceCount / words.length) * 100;

  return {
    fleschReadingEase: round2(206.835 - 1.015 * wordsPerSentence - 84.6 * syllablesPerWord),
    fleschKincaidGrade: round2(0.39 * wordsPerSentence + 11.8 * syllablesPerWord - 15.59),
    gunningFog: round2(0.4 * (wordsPerSentence + 100 * (complexWords / words.length))),
    automatedReadabilityIndex: round2(4.71 * (letterCount / words.length) + 0.5 * wordsPerSentence - 21.43),
    colemanLiauIndex: round2(0.0588 * lettersPer100 - 0.296 * sentencesPer100 - 15.8),
  };
}

function basicStats(text: string): ReadabilityStats {
  const sentenceCount = countSentences(text);
  const wordCount = text.split(/\s+/).filter(Boolean).length;
  const characterCount = text.length;
  if (sentenceCount === 0 || wordCount === 0) return {};

  return {
    avgSentenceLength: wordCount / sentenceCount,
    avgWordLength: characterCount / wordCount,
    sentenceCount,
    wordCount,
    characterCount,
  };
}

/**
 * Readability side-channel for a translated text. Whitespace-delimited
 * languages get the standard indices; others get plain averages.
 */
export function calculateReadability(text: string, language: string = 'en'): ReadabilityStats {
  if (!text) return {};

  try {
    return UNSPACED_LANGUAGES.has(language) ? basicStats(text) : indexStats(text);
  } catch (error) {
    log.error('Readability analysis failed', { error: error instanceof Error ? error.message : String(error) });
    return {};
  }
}
