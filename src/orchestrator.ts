import { fingerprint, TranslationCache } from './cache.js';
import { DEFAULT_SETTINGS, SUPPORTED_LANGUAGES } from './config.js';
import { errorMessage, NoProviderAvailableError, ProviderError, ValidationError } from './errors.js';
import { LanguageDetector } from './language-detector.js';
import { createLogger, Logger } from './logger.js';
import { extractKeywords } from './quality/keywords.js';
import { calculateReadability } from './quality/readability.js';
import { QualityScorer } from './quality/scorer.js';
import { TranslationProvider } from './translators/base.js';
import {
  CompareOptions,
  ComparisonResult,
  DetectionResult,
  TranslateOptions,
  TranslationRequest,
  TranslationResult,
  UnscoredTranslation,
} from './types.js';

export interface OrchestratorSettings {
  maxTranslationLength: number;
  translationCacheTtl: number;
  compareTimeoutMs: number;
}

export interface OrchestratorDeps {
  providers: Map<string, TranslationProvider>;
  cache: TranslationCache;
  scorer?: QualityScorer;
  detector?: LanguageDetector;
  settings?: Partial<OrchestratorSettings>;
  logger?: Logger;
}

/** The single operation the document pipeline needs from an orchestrator. */
export interface Translator {
  translate(request: TranslationRequest): Promise<TranslationResult>;
}

const TIMEOUT = Symbol('timeout');

type ProviderOutcome =
  | { ok: true; result: TranslationResult }
  | { ok: false; error: string };

export class TranslationOrchestrator implements Translator {
  private readonly providers: Map<string, TranslationProvider>;
  private readonly cache: TranslationCache;
  private readonly scorer: QualityScorer;
  private readonly detector: LanguageDetector;
  private readonly settings: OrchestratorSettings;
  private readonly log: Logger;

  constructor(deps: OrchestratorDeps) {
    this.providers = deps.providers;
    this.cache = deps.cache;
    this.scorer = deps.scorer ?? new QualityScorer();
    this.detector = deps.detector ?? new LanguageDetector();
    this.settings = {
      maxTranslationLength: deps.settings?.maxTranslationLength ?? DEFAULT_SETTINGS.maxTranslationLength,
      translationCacheTtl: deps.settings?.translationCacheTtl ?? DEFAULT_SETTINGS.translationCacheTtl,
      compareTimeoutMs: deps.settings?.compareTimeoutMs ?? DEFAULT_SETTINGS.compareTimeoutMs,
    };
    this.log = deps.logger ?? createLogger('Orchestrator');
  }

  async translate(request: TranslationRequest): Promise<TranslationResult> {
    this.validateText(request.text);

    const sourceLang = await this.resolveSourceLang(request.text, request.sourceLang);
    const [providerId, provider] = this.resolveProvider(request.providerId);

    const options: TranslateOptions = {
      ...request.options,
      model: request.model ?? request.options?.model ?? provider.model,
      style: request.style ?? request.options?.style ?? 'natural',
    };

    return this.runProvider(providerId, provider, request.text, sourceLang, request.targetLang, options);
  }

  async compare(
    text: string,
    sourceLang: string,
    targetLang: string,
    providerIds?: string[],
    compareOptions: CompareOptions = {}
  ): Promise<ComparisonResult> {
    this.validateText(text);

    // One detection for every provider, so they are all judged against the same source
    const resolvedSourceLang = await this.resolveSourceLang(text, sourceLang);
    const selected: Array<[string, TranslationProvider]> = [];
    for (const id of providerIds ?? this.providers.keys()) {
      const provider = this.providers.get(id);
      if (provider) {
        selected.push([id, provider]);
      } else {
        this.log.debug(`Skipping unconfigured provider '${id}'`);
      }
    }

    const timeoutMs = compareOptions.timeoutMs ?? this.settings.compareTimeoutMs;
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<typeof TIMEOUT>(resolve => {
      timer = setTimeout(() => resolve(TIMEOUT), timeoutMs);
    });

    let outcomes: Array<ProviderOutcome | typeof TIMEOUT>;
    try {
      outcomes = await Promise.all(selected.map(([id, provider]) => {
        const task = this.runProvider(id, provider, text, resolvedSourceLang, targetLang, {
          ...compareOptions.options,
          model: compareOptions.options?.model ?? provider.model,
          style: compareOptions.options?.style ?? 'natural',
        }).then(
          (result): ProviderOutcome => ({ ok: true, result }),
          (error: unknown): ProviderOutcome => ({ ok: false, error: errorMessage(error) })
        );
        return Promise.race([task, deadline]);
      }));
    } finally {
      clearTimeout(timer);
    }

    const results: Record<string, TranslationResult> = {};
    const errors: Record<string, string> = {};
    selected.forEach(([id], index) => {
      const outcome = outcomes[index];
      if (outcome === TIMEOUT) {
        errors[id] = 'timeout';
        this.log.warn(`Translation timed out for provider ${id}`, { timeoutMs });
      } else if (outcome.ok) {
        results[id] = outcome.result;
      } else {
        errors[id] = outcome.error;
        this.log.error(`Translation failed for provider ${id}`, { error: outcome.error });
      }
    });

    return {
      sourceText: text,
      resolvedSourceLang,
      targetLang,
      results,
      errors,
      best: selectBestTranslation(results),
    };
  }

  getAvailableProviders(): string[] {
    return Array.from(this.providers.keys());
  }

  getSupportedLanguages(): Readonly<Record<string, string>> {
    return SUPPORTED_LANGUAGES;
  }

  detectLanguage(text: string): Promise<DetectionResult> {
    return this.detector.detectWithConfidence(text);
  }

  private validateText(text: string): void {
    if (!text || !text.trim()) {
      throw new ValidationError('Text to translate must not be empty');
    }
    if (text.length > this.settings.maxTranslationLength) {
      throw new ValidationError(`Text length exceeds the limit of ${this.settings.maxTranslationLength} characters`);
    }
  }

  private async resolveSourceLang(text: string, sourceLang: string): Promise<string> {
    return sourceLang === 'auto' ? this.detector.detect(text) : sourceLang;
  }

  private resolveProvider(requested: string): [string, TranslationProvider] {
    const provider = this.providers.get(requested);
    if (provider) return [requested, provider];

    const fallback = this.providers.entries().next();
    if (fallback.done) {
      throw new NoProviderAvailableError();
    }
    this.log.warn(`Provider '${requested}' is not available, falling back to '${fallback.value[0]}'`);
    return fallback.value;
  }

  private async runProvider(
    providerId: string,
    provider: TranslationProvider,
    text: string,
    sourceLang: string,
    targetLang: string,
    options: TranslateOptions
  ): Promise<TranslationResult> {
    const key = fingerprint(text, sourceLang, targetLang, providerId, options);
    const cached = await this.cache.get(key);
    if (cached) {
      this.log.debug('Cache hit', { providerId, key });
      return freezeResult(cached);
    }

    let output: UnscoredTranslation;
    try {
      output = await provider.translate(text, sourceLang, targetLang, options);
    } catch (error) {
      throw error instanceof ProviderError ? error : new ProviderError(providerId, error);
    }

    const qualityScore = this.scorer.score(text, output.translatedText, output.resolvedSourceLang, targetLang);
    const result = freezeResult({
      ...output,
      qualityScore,
      metadata: {
        ...output.metadata,
        readability: calculateReadability(output.translatedText, targetLang),
        keywords: extractKeywords(output.translatedText),
      },
    });

    await this.cache.put(key, result, this.settings.translationCacheTtl);
    return result;
  }
}

function freezeResult(result: TranslationResult): TranslationResult {
  return Object.freeze({ ...result, metadata: Object.freeze({ ...result.metadata }) });
}

/**
 * Highest quality score wins; an equal score never displaces the earlier
 * entry, so ties go to the first provider in iteration order.
 */
export function selectBestTranslation(results: Record<string, TranslationResult>): TranslationResult | null {
  let best: TranslationResult | null = null;
  for (const result of Object.values(results)) {
    if (best === null || result.qualityScore > best.qualityScore) {
      best = result;
    }
  }
  return best;
}
