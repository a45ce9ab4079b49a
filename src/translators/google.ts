import { BaseTranslator, defaultHttpClient, HttpClient, ProviderTranslation } from './base.js';
import { TranslateOptions } from '../types.js';

interface GoogleTranslateResponse {
  data?: {
    translations?: Array<{
      translatedText: string;
      detectedSourceLanguage?: string;
    }>;
  };
  error?: {
    code: number;
    message: string;
  };
}

export interface GoogleTranslateConfig {
  apiKey: string;
  baseUrl?: string;
  http?: HttpClient;
}

/** Cloud Translation v2 (Basic) over REST. */
export class GoogleTranslateTranslator extends BaseTranslator {
  readonly id = 'google';
  readonly name = 'Google Translate';
  readonly confidence = 0.85;
  private apiKey: string;
  private baseUrl: string;
  private http: HttpClient;

  constructor(config: GoogleTranslateConfig) {
    super('translate-v2');
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl || 'https://translation.googleapis.com/language/translate/v2';
    this.http = config.http || defaultHttpClient;
  }

  protected async requestTranslation(text: string, sourceLang: string, targetLang: string, _options: TranslateOptions): Promise<ProviderTranslation> {
    const body: Record<string, string> = {
      q: text,
      target: targetLang,
      format: 'text',
    };
    if (sourceLang !== 'auto') {
      body.source = sourceLang;
    }

    const response = await this.http(`${this.baseUrl}?key=${encodeURIComponent(this.apiKey)}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });

    const data = await response.json() as GoogleTranslateResponse;
    if (!response.ok || data.error) {
      throw new Error(`Google Translate API error: ${data.error?.code ?? response.status} - ${data.error?.message ?? 'request failed'}`);
    }

    const translation = data.data?.translations?.[0];
    if (!translation) {
      throw new Error('Unexpected response format: no translations returned');
    }

    const detected = translation.detectedSourceLanguage;
    return {
      translatedText: translation.translatedText,
      model: this.model,
      resolvedSourceLang: detected ?? sourceLang,
      metadata: detected ? { detectedLanguage: detected } : {},
    };
  }
}
