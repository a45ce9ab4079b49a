import { configuredProviderIds, DEFAULT_SETTINGS, hasCredentials, isProviderId, loadSettings } from '../../src/config';
import { NoProviderAvailableError, normalizeError, ProviderError, ValidationError } from '../../src/errors';
import { TranslatorFactory } from '../../src/translators/factory';

describe('Configuration', () => {
  describe('loadSettings', () => {
    it('should fall back to defaults for an empty environment', () => {
      const settings = loadSettings({});

      expect(settings.maxTranslationLength).toBe(DEFAULT_SETTINGS.maxTranslationLength);
      expect(settings.translationCacheTtl).toBe(86400);
      expect(settings.chunkSize).toBe(1000);
      expect(settings.compareTimeoutMs).toBe(60000);
      expect(settings.defaultSourceLanguage).toBe('auto');
      expect(settings.defaultTargetLanguage).toBe('zh');
      expect(settings.providers.openai).toEqual({ enabled: true, apiKey: undefined, defaultModel: 'gpt-4o-mini' });
      expect(settings.providers.ollama.timeoutMs).toBe(60000);
    });

    it('should read numbers and ignore invalid ones', () => {
      const settings = loadSettings({ MAX_TRANSLATION_LENGTH: '500', CHUNK_SIZE: 'lots', TRANSLATION_CACHE_TTL: '-5' });

      expect(settings.maxTranslationLength).toBe(500);
      expect(settings.chunkSize).toBe(1000);
      expect(settings.translationCacheTtl).toBe(86400);
    });

    it('should take model overrides and disable flags', () => {
      const settings = loadSettings({ OPENAI_MODEL: 'gpt-4o', ANTHROPIC_ENABLED: 'false' });

      expect(settings.providers.openai.defaultModel).toBe('gpt-4o');
      expect(settings.providers.anthropic.enabled).toBe(false);
      expect(settings.providers.gemini.enabled).toBe(true);
    });
  });

  describe('hasCredentials', () => {
    it('should require both Baidu credentials', () => {
      expect(hasCredentials('baidu', { enabled: true, defaultModel: 'baidu-translate', appId: 'test-app' })).toBe(false);
      expect(hasCredentials('baidu', {
        enabled: true,
        defaultModel: 'baidu-translate',
        appId: 'test-app',
        secretKey: 'test-secret',
      })).toBe(true);
    });

    it('should require a base URL for Ollama', () => {
      expect(hasCredentials('ollama', { enabled: true, defaultModel: 'llama3.1:8b' })).toBe(false);
      expect(hasCredentials('ollama', { enabled: true, defaultModel: 'llama3.1:8b', baseUrl: 'http://localhost:11434' })).toBe(true);
    });

    it('should treat disabled providers as unconfigured', () => {
      expect(hasCredentials('openai', { enabled: false, defaultModel: 'gpt-4o-mini', apiKey: 'test-secret' })).toBe(false);
    });
  });

  it('should list configured providers in registration order', () => {
    const settings = loadSettings({
      GOOGLE_API_KEY: 'test-secret',
      OPENAI_API_KEY: 'test-secret',
      GEMINI_API_KEY: 'test-secret',
      GEMINI_ENABLED: 'false',
      BAIDU_APP_ID: 'test-app',
    });

    expect(configuredProviderIds(settings)).toEqual(['openai', 'google']);
  });

  it('should recognise provider ids', () => {
    expect(isProviderId('anthropic')).toBe(true);
    expect(isProviderId('deepl')).toBe(false);
  });
});

describe('TranslatorFactory', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should build only the configured providers', () => {
    const providers = TranslatorFactory.createAvailable(loadSettings({
      OPENAI_API_KEY: 'test-secret',
      BAIDU_APP_ID: 'test-app',
      BAIDU_SECRET_KEY: 'test-secret',
    }));

    expect(Array.from(providers.keys())).toEqual(['openai', 'baidu']);
    expect(providers.get('openai')?.model).toBe('gpt-4o-mini');
    expect(providers.get('baidu')?.name).toBe('Baidu Translate');
  });

  it('should refuse to create an unconfigured provider', () => {
    expect(() => TranslatorFactory.create('anthropic', loadSettings({}))).toThrow(NoProviderAvailableError);
    expect(() => TranslatorFactory.create('anthropic', loadSettings({}))).toThrow(
      "Provider 'anthropic' is not configured. Set ANTHROPIC_API_KEY."
    );
  });

  it('should report credentialed providers without network calls', async () => {
    const available = await TranslatorFactory.listAvailableProviders(loadSettings({ GOOGLE_API_KEY: 'test-secret' }));
    expect(available).toEqual(['google (credentials found)']);
  });

  it('should describe the credentials each provider needs', () => {
    expect(TranslatorFactory.credentialHint('baidu')).toBe('Set BAIDU_APP_ID and BAIDU_SECRET_KEY.');
    expect(TranslatorFactory.credentialHint('gemini')).toBe('Set GEMINI_API_KEY.');
  });
});

describe('normalizeError', () => {
  it('should keep the code of known errors', () => {
    expect(normalizeError(new ValidationError('bad input'))).toEqual({
      code: 'VALIDATION_ERROR',
      message: 'bad input',
      retryable: false,
    });
    expect(normalizeError(new ProviderError('openai', new Error('timeout')))).toEqual({
      code: 'PROVIDER_ERROR',
      message: 'openai translation failed: timeout',
      retryable: true,
    });
  });

  it('should map anything else to an internal error', () => {
    expect(normalizeError('boom')).toEqual({ code: 'INTERNAL_ERROR', message: 'boom', retryable: false });
  });
});
