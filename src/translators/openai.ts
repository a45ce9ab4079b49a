import { BaseTranslator, defaultHttpClient, HttpClient, ProviderTranslation, SYSTEM_PROMPT } from './base.js';
import { TranslateOptions } from '../types.js';

interface OpenAIMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

interface OpenAIResponse {
  choices?: Array<{
    message?: {
      content?: string;
    };
  }>;
  usage?: {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
  };
}

export interface OpenAIConfig {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  http?: HttpClient;
}

export class OpenAITranslator extends BaseTranslator {
  readonly id = 'openai';
  readonly name = 'OpenAI';
  readonly confidence = 0.9;
  private apiKey: string;
  private baseUrl: string;
  private http: HttpClient;

  constructor(config: OpenAIConfig) {
    super(config.model || 'gpt-4o-mini');
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl || 'https://api.openai.com/v1';
    this.http = config.http || defaultHttpClient;
  }

  protected async requestTranslation(text: string, sourceLang: string, targetLang: string, options: TranslateOptions): Promise<ProviderTranslation> {
    const model = this.resolveModel(options);
    const messages: OpenAIMessage[] = [
      { role: 'system', content: SYSTEM_PROMPT },
      { role: 'user', content: this.buildPrompt(text, sourceLang, targetLang, options) },
    ];

    const response = await this.http(`${this.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        model,
        messages,
        temperature: 0.3,
        max_tokens: Math.max(256, text.length * 3),
      }),
    });

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`OpenAI API error: ${response.status} - ${error}`);
    }

    const data = await response.json() as OpenAIResponse;
    const content = data.choices?.[0]?.message?.content;
    if (typeof content !== 'string') {
      throw new Error('Unexpected response format: missing message content');
    }

    return {
      translatedText: content.trim(),
      model,
      metadata: {
        style: options.style ?? 'natural',
        usage: data.usage ?? null,
      },
    };
  }
}
