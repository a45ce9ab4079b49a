import { TranslationProvider } from './base.js';
import { AnthropicTranslator } from './anthropic.js';
import { BaiduTranslator } from './baidu.js';
import { GeminiTranslator } from './gemini.js';
import { GoogleTranslateTranslator } from './google.js';
import { OllamaTranslator } from './ollama.js';
import { OpenAITranslator } from './openai.js';
import { configuredProviderIds, hasCredentials, Settings } from '../config.js';
import { NoProviderAvailableError } from '../errors.js';
import { createLogger } from '../logger.js';
import { PROVIDER_IDS, ProviderId } from '../types.js';

const log = createLogger('TranslatorFactory');

export class TranslatorFactory {
  static create(id: ProviderId, settings: Settings): TranslationProvider {
    const provider = settings.providers[id];
    if (!hasCredentials(id, provider)) {
      throw new NoProviderAvailableError(`Provider '${id}' is not configured. ${TranslatorFactory.credentialHint(id)}`);
    }

    switch (id) {
      case 'openai':
        return new OpenAITranslator({ apiKey: provider.apiKey ?? '', model: provider.defaultModel });
      case 'anthropic':
        return new AnthropicTranslator({ apiKey: provider.apiKey ?? '', model: provider.defaultModel });
      case 'gemini':
        return new GeminiTranslator(provider.apiKey ?? '', provider.defaultModel);
      case 'google':
        return new GoogleTranslateTranslator({ apiKey: provider.apiKey ?? '' });
      case 'baidu':
        return new BaiduTranslator({ appId: provider.appId ?? '', secretKey: provider.secretKey ?? '' });
      case 'ollama':
        return new OllamaTranslator({
          baseUrl: provider.baseUrl,
          model: provider.defaultModel,
          timeout: provider.timeoutMs,
        });
    }
  }

  /**
   * Builds the provider map once at startup. Providers without credentials
   * are left out rather than added in a broken state.
   */
  static createAvailable(settings: Settings): Map<string, TranslationProvider> {
    const providers = new Map<string, TranslationProvider>();
    for (const id of configuredProviderIds(settings)) {
      providers.set(id, TranslatorFactory.create(id, settings));
    }
    log.debug('Providers initialized', { providers: Array.from(providers.keys()) });
    return providers;
  }

  static async listAvailableProviders(settings: Settings): Promise<string[]> {
    const available: string[] = [];
    for (const id of PROVIDER_IDS) {
      if (!hasCredentials(id, settings.providers[id])) continue;

      if (id === 'ollama') {
        const ollama = TranslatorFactory.create(id, settings);
        const reachable = ollama.isAvailable ? await ollama.isAvailable() : true;
        available.push(reachable ? 'ollama (local)' : 'ollama (configured, model not reachable)');
      } else {
        available.push(`${id} (credentials found)`);
      }
    }
    return available;
  }

  static credentialHint(id: ProviderId): string {
    switch (id) {
      case 'baidu':
        return 'Set BAIDU_APP_ID and BAIDU_SECRET_KEY.';
      case 'ollama':
        return 'Set OLLAMA_BASE_URL (e.g. http://localhost:11434) with Ollama running.';
      default:
        return `Set ${id.toUpperCase()}_API_KEY.`;
    }
  }
}
