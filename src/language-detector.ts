import { detectAll } from 'tinyld';
import languages from './data/languages.json';
import { createLogger, Logger } from './logger.js';
import { DetectionResult } from './types.js';

export const FALLBACK_LANGUAGE = 'en';

const LANGUAGE_ALIASES: Readonly<Record<string, string>> = languages.aliases;
const LANGUAGE_NAMES: Readonly<Record<string, string>> = languages.supported;

/** Candidate languages, most probable first. */
export type DetectFn = (text: string) => DetectionResult[] | Promise<DetectionResult[]>;

export const tinyldDetect: DetectFn = text =>
  detectAll(text).map(candidate => ({ language: candidate.lang, probability: candidate.accuracy }));

export interface LanguageDetectorOptions {
  detect?: DetectFn;
  timeoutMs?: number;
  fallback?: string;
  logger?: Logger;
}

export function normalizeLanguageCode(code: string): string {
  const lower = code.trim().toLowerCase().replace(/_/g, '-');
  const alias = LANGUAGE_ALIASES[lower];
  if (alias) return alias;
  return lower.split('-')[0];
}

export function isSupportedLanguage(code: string): boolean {
  return Object.prototype.hasOwnProperty.call(LANGUAGE_NAMES, code);
}

export function getLanguageName(code: string): string {
  return isSupportedLanguage(code) ? LANGUAGE_NAMES[code] : code;
}

/**
 * Collapses whitespace and keeps the first 500 characters.
 */
export function preprocessForDetection(text: string): string {
  const collapsed = text.split(/\s+/).filter(Boolean).join(' ');
  return collapsed.length > 500 ? collapsed.slice(0, 500) : collapsed;
}

export class LanguageDetector {
  private detectFn: DetectFn;
  private timeoutMs: number;
  private fallback: string;
  private log: Logger;

  constructor(options: LanguageDetectorOptions = {}) {
    this.detectFn = options.detect ?? tinyldDetect;
    this.timeoutMs = options.timeoutMs ?? 2000;
    this.fallback = options.fallback ?? FALLBACK_LANGUAGE;
    this.log = options.logger ?? createLogger('LanguageDetector');
  }

  async detect(text: string): Promise<string> {
    const { language } = await this.detectWithConfidence(text);
    return language;
  }

  async detectWithConfidence(text: string): Promise<DetectionResult> {
    const fallback: DetectionResult = { language: this.fallback, probability: 0 };
    if (!text || !text.trim()) {
      return fallback;
    }

    const sample = preprocessForDetection(text);
    try {
      const candidates = await this.runBounded(sample);
      const best = candidates[0];
      if (!best) {
        this.log.warn('Language detection returned no candidates', { textPreview: sample.slice(0, 50) });
        return fallback;
      }

      const language = normalizeLanguageCode(best.language);
      const probability = Math.min(1, Math.max(0, best.probability));
      this.log.debug('Language detected', {
        textPreview: sample.slice(0, 50),
        detectedLanguage: best.language,
        mappedLanguage: language,
        probability,
      });
      return { language, probability };
    } catch (error) {
      this.log.warn('Language detection failed', {
        textPreview: sample.slice(0, 50),
        error: error instanceof Error ? error.message : String(error),
      });
      return fallback;
    }
  }

  /**
   * Runs detection on a later turn of the event loop. The timeout only cuts
   * short an asynchronous detector: a synchronous one such as tinyld runs to
   * the end once started, and is bounded by the 500-character sample from
   * `preprocessForDetection` instead.
   */
  private runBounded(sample: string): Promise<DetectionResult[]> {
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new Error(`Language detection timed out after ${this.timeoutMs}ms`));
      }, this.timeoutMs);

      setImmediate(() => {
        Promise.resolve()
          .then(() => this.detectFn(sample))
          .then(
            candidates => {
              clearTimeout(timer);
              resolve(candidates);
            },
            error => {
              clearTimeout(timer);
              reject(error);
            }
          );
      });
    });
  }
}
