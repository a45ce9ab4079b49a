import { BaseTranslator, defaultHttpClient, HttpClient, ProviderTranslation, SYSTEM_PROMPT } from './base.js';
import { delay } from '../helpers.js';
import { createLogger } from '../logger.js';
import { TranslateOptions } from '../types.js';

const log = createLogger('Ollama');

interface OllamaGenerateResponse {
  response?: string;
  eval_count?: number;
  prompt_eval_count?: number;
}

interface OllamaTagsResponse {
  models?: Array<{ name: string }>;
}

export interface OllamaConfig {
  baseUrl?: string;
  model?: string;
  timeout?: number;
  maxRetries?: number;
  /** Base of the exponential backoff between attempts */
  retryDelayMs?: number;
  http?: HttpClient;
}

export class OllamaTranslator extends BaseTranslator {
  readonly id = 'ollama';
  readonly name = 'Ollama (Local)';
  readonly confidence = 0.75;
  private baseUrl: string;
  private timeout: number;
  private maxRetries: number;
  private retryDelayMs: number;
  private http: HttpClient;

  constructor(config: OllamaConfig = {}) {
    super(config.model || 'llama3.1:8b');
    this.baseUrl = config.baseUrl || 'http://localhost:11434';
    this.timeout = config.timeout || 60000;
    this.maxRetries = config.maxRetries || 3;
    this.retryDelayMs = config.retryDelayMs ?? 1000;
    this.http = config.http || defaultHttpClient;
  }

  protected async requestTranslation(text: string, sourceLang: string, targetLang: string, options: TranslateOptions): Promise<ProviderTranslation> {
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        return await this.attemptTranslation(text, sourceLang, targetLang, options);
      } catch (error) {
        lastError = error;
        log.debug(`Attempt ${attempt}/${this.maxRetries} failed: ${error instanceof Error ? error.message : String(error)}`);

        if (attempt < this.maxRetries) {
          // Exponential backoff with jitter
          const baseWaitTime = Math.min(this.retryDelayMs * Math.pow(2, attempt - 1), 10000);
          const waitTime = baseWaitTime + Math.random() * (this.retryDelayMs / 2);
          log.debug(`Waiting ${Math.round(waitTime)}ms before retry...`);
          await delay(waitTime);
        }
      }
    }

    throw new Error(`Translation failed after ${this.maxRetries} attempts: ${lastError instanceof Error ? lastError.message : String(lastError)}`);
  }

  private async attemptTranslation(text: string, sourceLang: string, targetLang: string, options: TranslateOptions): Promise<ProviderTranslation> {
    const model = this.resolveModel(options);
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      log.debug('Sending request', { model, sourceLang, targetLang });

      const response = await this.http(`${this.baseUrl}/api/generate`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model,
          system: SYSTEM_PROMPT,
          prompt: this.buildPrompt(text, sourceLang, targetLang, options),
          stream: false,
          options: {
            temperature: 0.3,
            top_p: 0.95,
          },
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new Error(`Ollama API error: ${response.status}`);
      }

      const data = await response.json() as OllamaGenerateResponse;
      if (typeof data.response !== 'string') {
        throw new Error('Unexpected response format: missing response text');
      }

      // Reasoning models wrap their chain of thought in <think> tags
      const translatedText = data.response
        .replace(/<think>[\s\S]*?<\/think>/g, '')
        .replace(/<｜end▁of▁sentence｜>/g, '')
        .trim();

      return {
        translatedText,
        model,
        metadata: {
          style: options.style ?? 'natural',
          usage: { inputTokens: data.prompt_eval_count ?? null, outputTokens: data.eval_count ?? null },
        },
      };
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new Error(`Ollama request timed out after ${this.timeout}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  async isAvailable(): Promise<boolean> {
    try {
      const models = await this.listModels();
      return models.includes(this.model);
    } catch {
      return false;
    }
  }

  async listModels(): Promise<string[]> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), 5000);
    try {
      const response = await this.http(`${this.baseUrl}/api/tags`, {
        method: 'GET',
        headers: {},
        signal: controller.signal,
      });
      if (!response.ok) {
        throw new Error(`Failed to list Ollama models: ${response.status}`);
      }
      const data = await response.json() as OllamaTagsResponse;
      return (data.models ?? []).map(m => m.name);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
