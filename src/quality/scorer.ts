import { createLogger, Logger } from '../logger.js';

export const QUALITY_FALLBACK_SCORE = 75;

export const QUALITY_WEIGHTS = {
  lengthRatio: 0.2,
  completeness: 0.25,
  fluency: 0.25,
  formatPreservation: 0.15,
  specialCharacters: 0.15,
} as const;

export type RatioRange = readonly [min: number, max: number];

export const DEFAULT_RATIO_RANGE: RatioRange = [0.5, 2.0];

/** Expected translated/source length ratios, keyed `source:target`. */
export const EXPECTED_LENGTH_RATIOS: Readonly<Record<string, RatioRange>> = {
  'en:zh': [0.3, 0.8],
  'zh:en': [1.2, 2.5],
  'ja:zh': [0.6, 1.2],
  'ko:zh': [0.6, 1.2],
  'fr:en': [0.8, 1.3],
  'de:en': [0.7, 1.2],
};

export interface QualityBreakdown {
  lengthRatio: number;
  completeness: number;
  fluency: number;
  formatPreservation: number;
  specialCharacters: number;
  total: number;
}

const SENTENCE_SPLIT = /[.!?。！？]/;
const PUNCTUATION = /[.!?。！？,，;；:：]/g;

const MALFORMATION_PATTERNS: RegExp[] = [
  // whitespace before terminal punctuation
  /\s+[.!?。！？]/,
  // three or more terminal marks in a row
  /[.!?。！？]{3,}/,
  // three single-character tokens in a row
  /(?<![\p{L}\p{N}_])[\p{L}\p{N}_]\s+[\p{L}\p{N}_]\s+[\p{L}\p{N}_](?![\p{L}\p{N}_])/u,
];

const FORMAT_MARKERS: RegExp[] = [
  /\*\*.*?\*\*/g, // bold
  /\*.*?\*/g, // italic
  /`.*?`/g, // code
  /\[.*?\]/g, // link text
  /\(.*?\)/g, // parentheses
];

const NUMBER_PATTERN = /\d+(?:\.\d+)?/g;
const URL_PATTERN = /https?:\/\/[^\s]+/g;
const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Z|a-z]{2,}\b/g;

function clamp(score: number): number {
  return Math.min(100, Math.max(0, score));
}

function tokens(text: string): string[] {
  return text.split(/\s+/).filter(Boolean);
}

function countMatches(text: string, pattern: RegExp): number {
  return (text.match(pattern) ?? []).length;
}

/** Share of distinct source matches that also occur in the translation. */
function preservationRatio(source: string, translated: string, pattern: RegExp): number | null {
  const sourceSet = new Set(source.match(pattern) ?? []);
  if (sourceSet.size === 0) return null;
  const translatedSet = new Set(translated.match(pattern) ?? []);
  let kept = 0;
  sourceSet.forEach(item => {
    if (translatedSet.has(item)) kept++;
  });
  return kept / sourceSet.size;
}

/**
 * Heuristic translation quality on a 0-100 scale, built from five weighted
 * checks. It estimates; it does not measure.
 */
export class QualityScorer {
  private readonly log: Logger;

  constructor(
    private readonly ratios: Readonly<Record<string, RatioRange>> = EXPECTED_LENGTH_RATIOS,
    logger?: Logger
  ) {
    this.log = logger ?? createLogger('QualityScorer');
  }

  score(sourceText: string, translatedText: string, sourceLang: string, targetLang: string): number {
    try {
      return this.breakdown(sourceText, translatedText, sourceLang, targetLang).total;
    } catch (error) {
      this.log.error('Text quality analysis failed', { error: error instanceof Error ? error.message : String(error) });
      return QUALITY_FALLBACK_SCORE;
    }
  }

  breakdown(sourceText: string, translatedText: string, sourceLang: string, targetLang: string): QualityBreakdown {
    const lengthRatio = clamp(this.lengthRatioScore(sourceText, translatedText, sourceLang, targetLang));
    const completeness = clamp(this.completenessScore(sourceText, translatedText));
    const fluency = clamp(this.fluencyScore(translatedText, targetLang));
    const formatPreservation = clamp(this.formatPreservationScore(sourceText, translatedText));
    const specialCharacters = clamp(this.specialCharacterScore(sourceText, translatedText));

    const total = lengthRatio * QUALITY_WEIGHTS.lengthRatio
      + completeness * QUALITY_WEIGHTS.completeness
      + fluency * QUALITY_WEIGHTS.fluency
      + formatPreservation * QUALITY_WEIGHTS.formatPreservation
      + specialCharacters * QUALITY_WEIGHTS.specialCharacters;

    return { lengthRatio, completeness, fluency, formatPreservation, specialCharacters, total: clamp(total) };
  }

  expectedRatio(sourceLang: string, targetLang: string): RatioRange {
    return this.ratios[`${sourceLang}:${targetLang}`] ?? DEFAULT_RATIO_RANGE;
  }

  lengthRatioScore(sourceText: string, translatedText: string, sourceLang: string, targetLang: string): number {
    if (!sourceText || !translatedText) return 0;

    const ratio = translatedText.length / sourceText.length;
    const [minRatio, maxRatio] = this.expectedRatio(sourceLang, targetLang);

    if (ratio >= minRatio && ratio <= maxRatio) return 100;
    if (ratio < minRatio) return 100 * (ratio / minRatio);
    return 100 * (maxRatio / ratio);
  }

  completenessScore(sourceText: string, translatedText: string): number {
    if (!sourceText || !translatedText) return 0;

    let score = 100;

    if (translatedText.endsWith('...') || translatedText.endsWith('…')) {
      score -= 30;
    }

    // Heavy word overlap with the source suggests the text was passed through untranslated
    if (sourceText.length > 20) {
      const sourceWords = new Set(tokens(sourceText.toLowerCase()));
      const translatedWords = new Set(tokens(translatedText.toLowerCase()));
      let overlap = 0;
      sourceWords.forEach(word => {
        if (translatedWords.has(word)) overlap++;
      });
      if (overlap > sourceWords.size * 0.7) {
        score -= 40;
      }
    }

    if (translatedText.trim().length < sourceText.trim().length * 0.1) {
      score -= 50;
    }

    return score;
  }

  fluencyScore(text: string, _language: string): number {
    if (!text) return 0;

    try {
      let score = 100;
      const words = tokens(text);

      if (words.length > 1) {
        const repetitionRatio = words.length / new Set(words).size;
        if (repetitionRatio > 2.0) score -= 20;
      }

      const sentences = text.split(SENTENCE_SPLIT).filter(sentence => sentence.trim());
      if (sentences.length > 0) {
        const totalTokens = sentences.reduce((sum, sentence) => sum + tokens(sentence).length, 0);
        const avgSentenceLength = totalTokens / sentences.length;
        if (avgSentenceLength < 3) {
          score -= 15;
        } else if (avgSentenceLength > 50) {
          score -= 10;
        }
      }

      if (words.length > 0) {
        const punctRatio = countMatches(text, PUNCTUATION) / words.length;
        if (punctRatio > 0.3) {
          score -= 10;
        } else if (punctRatio < 0.05 && words.length > 10) {
          score -= 15;
        }
      }

      for (const pattern of MALFORMATION_PATTERNS) {
        if (pattern.test(text)) score -= 5;
      }

      return score;
    } catch (error) {
      this.log.error('Fluency analysis failed', { error: error instanceof Error ? error.message : String(error) });
      return QUALITY_FALLBACK_SCORE;
    }
  }

  formatPreservationScore(sourceText: string, translatedText: string): number {
    if (!sourceText || !translatedText) return 0;

    let score = 100;

    const sourceLines = countMatches(sourceText, /\n/g);
    const translatedLines = countMatches(translatedText, /\n/g);
    if (sourceLines > 0 && Math.abs(sourceLines - translatedLines) / sourceLines > 0.5) {
      score -= 20;
    }

    for (const marker of FORMAT_MARKERS) {
      const sourceMatches = countMatches(sourceText, marker);
      if (sourceMatches > 0 && countMatches(translatedText, marker) / sourceMatches < 0.8) {
        score -= 10;
      }
    }

    return score;
  }

  specialCharacterScore(sourceText: string, translatedText: string): number {
    if (!sourceText || !translatedText) return 0;

    let score = 100;

    const numbers = preservationRatio(sourceText, translatedText, NUMBER_PATTERN);
    if (numbers !== null && numbers < 0.8) score -= 20;

    const urls = preservationRatio(sourceText, translatedText, URL_PATTERN);
    if (urls !== null && urls < 0.9) score -= 15;

    const emails = preservationRatio(sourceText, translatedText, EMAIL_PATTERN);
    if (emails !== null && emails < 0.9) score -= 15;

    return score;
  }
}
