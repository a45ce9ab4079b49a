import { BaseTranslator, defaultHttpClient, HttpClient, ProviderTranslation, SYSTEM_PROMPT } from './base.js';
import { TranslateOptions } from '../types.js';

interface AnthropicResponse {
  content?: Array<{ type: string; text?: string }>;
  usage?: {
    input_tokens: number;
    output_tokens: number;
  };
}

export interface AnthropicConfig {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  http?: HttpClient;
}

export class AnthropicTranslator extends BaseTranslator {
  readonly id = 'anthropic';
  readonly name = 'Claude';
  readonly confidence = 0.88;
  private apiKey: string;
  private baseUrl: string;
  private http: HttpClient;

  constructor(config: AnthropicConfig) {
    super(config.model || 'claude-3-haiku-20240307');
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl || 'https://api.anthropic.com/v1';
    this.http = config.http || defaultHttpClient;
  }

  protected async requestTranslation(text: string, sourceLang: string, targetLang: string, options: TranslateOptions): Promise<ProviderTranslation> {
    const model = this.resolveModel(options);

    const response = await this.http(`${this.baseUrl}/messages`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': this.apiKey,
        'anthropic-version': '2023-06-01',
      },
      body: JSON.stringify({
        model,
        system: SYSTEM_PROMPT,
        max_tokens: Math.max(256, text.length * 3),
        temperature: 0.3,
        messages: [{ role: 'user', content: this.buildPrompt(text, sourceLang, targetLang, options) }],
      }),
    });

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`Anthropic API error: ${response.status} - ${error}`);
    }

    const data = await response.json() as AnthropicResponse;
    const translated = (data.content ?? [])
      .filter(block => block.type === 'text' && typeof block.text === 'string')
      .map(block => block.text)
      .join('');

    return {
      translatedText: translated.trim(),
      model,
      metadata: {
        style: options.style ?? 'natural',
        usage: data.usage
          ? { inputTokens: data.usage.input_tokens, outputTokens: data.usage.output_tokens }
          : null,
      },
    };
  }
}
