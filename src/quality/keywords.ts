import stopWordList from '../data/stop-words.json';
import { createLogger } from '../logger.js';

const log = createLogger('Keywords');

const STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);

/** Most frequent non-stop-word tokens, ties kept in first-seen order. */
export function extractKeywords(text: string, maxKeywords: number = 10): string[] {
  if (!text) return [];

  try {
    const words = text.toLowerCase().match(/[\p{L}\p{N}_]+/gu) ?? [];
    const frequency = new Map<string, number>();

    for (const word of words) {
      if ([...word].length > 2 && !STOP_WORDS.has(word)) {
        frequency.set(word, (frequency.get(word) ?? 0) + 1);
      }
    }

    return Array.from(frequency.entries())
      .sort((a, b) => b[1] - a[1])
      .slice(0, maxKeywords)
      .map(([word]) => word);
  } catch (error) {
    log.error('Keyword extraction failed', { error: error instanceof Error ? error.message : String(error) });
    return [];
  }
}
