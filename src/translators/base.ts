import fetch from 'node-fetch';
import { performance } from 'perf_hooks';
import { ProviderError } from '../errors.js';
import { countWords } from '../helpers.js';
import { getLanguageName } from '../language-detector.js';
import { createLogger } from '../logger.js';
import { TranslateOptions, TranslationStyle, UnscoredTranslation } from '../types.js';

const log = createLogger('Translator');

export interface TranslationProvider {
  readonly id: string;
  readonly name: string;
  /** Static self-reported confidence, not a measured probability */
  readonly confidence: number;
  readonly model: string;
  translate(text: string, sourceLang: string, targetLang: string, options?: TranslateOptions): Promise<UnscoredTranslation>;
  isAvailable?(): Promise<boolean>;
}

export interface HttpRequestInit {
  method: string;
  headers: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

export interface HttpResponse {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
  text(): Promise<string>;
}

export type HttpClient = (url: string, init: HttpRequestInit) => Promise<HttpResponse>;

export const defaultHttpClient: HttpClient = (url, init) => fetch(url, init);

/** What a concrete adapter extracts from its backend's reply. */
export interface ProviderTranslation {
  translatedText: string;
  model: string;
  resolvedSourceLang?: string;
  metadata?: Record<string, unknown>;
}

export const STYLE_PROMPTS: Record<TranslationStyle, string> = {
  natural: 'natural and fluent',
  formal: 'formal and rigorous',
  casual: 'relaxed and casual',
  technical: 'precise, using professional technical terminology',
  literary: 'elegant and literary',
};

export const SYSTEM_PROMPT = 'You are a professional translation assistant that provides high-quality translations between many languages.';

export abstract class BaseTranslator implements TranslationProvider {
  abstract readonly id: string;
  abstract readonly name: string;
  abstract readonly confidence: number;

  constructor(public readonly model: string) {}

  async translate(text: string, sourceLang: string, targetLang: string, options: TranslateOptions = {}): Promise<UnscoredTranslation> {
    const startTime = performance.now();
    let output: ProviderTranslation;
    try {
      output = await this.requestTranslation(text, sourceLang, targetLang, options);
    } catch (error) {
      log.error(`${this.name} translation failed`, { error: error instanceof Error ? error.message : String(error) });
      throw error instanceof ProviderError ? error : new ProviderError(this.id, error);
    }

    this.validateResponse(text, output.translatedText);

    return {
      providerId: this.id,
      model: output.model,
      translatedText: output.translatedText,
      resolvedSourceLang: output.resolvedSourceLang ?? sourceLang,
      targetLang,
      confidenceScore: this.confidence,
      processingTimeMs: performance.now() - startTime,
      wordCount: countWords(text),
      characterCount: text.length,
      metadata: output.metadata ?? {},
    };
  }

  protected abstract requestTranslation(
    text: string,
    sourceLang: string,
    targetLang: string,
    options: TranslateOptions
  ): Promise<ProviderTranslation>;

  async isAvailable(): Promise<boolean> {
    return true;
  }

  protected resolveModel(options: TranslateOptions): string {
    return options.model || this.model;
  }

  protected buildPrompt(text: string, sourceLang: string, targetLang: string, options: TranslateOptions): string {
    const style = STYLE_PROMPTS[options.style ?? 'natural'];
    const contextInstructions = options.context
      ? `\n\nAdditional translation context and instructions:\n${options.context}`
      : '';

    return `Translate the following ${getLanguageName(sourceLang)} text into ${getLanguageName(targetLang)}. The translation should be ${style} and faithful to the original meaning.${contextInstructions}

${text}

Return ONLY the translation. Do not add any explanation or additional text.`;
  }

  protected validateResponse(text: string, translated: string): void {
    if (!translated || translated.trim() === '') {
      throw new ProviderError(this.id, new Error(`Empty translation for input "${text.slice(0, 50)}"`));
    }

    // Identical output for a multi-word input usually means the backend passed it through
    if (text.includes(' ') && translated === text) {
      log.warn(`${this.name} returned the input unchanged`, { text: text.slice(0, 50) });
    }
  }
}
