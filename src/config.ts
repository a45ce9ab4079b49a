import languages from './data/languages.json';
import { PROVIDER_IDS, ProviderId } from './types.js';

export interface ProviderSettings {
  enabled: boolean;
  defaultModel: string;
  apiKey?: string;
  appId?: string;
  secretKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
}

export interface Settings {
  maxTranslationLength: number;
  /** Seconds a cached translation stays valid */
  translationCacheTtl: number;
  chunkSize: number;
  compareTimeoutMs: number;
  detectionTimeoutMs: number;
  defaultSourceLanguage: string;
  defaultTargetLanguage: string;
  providers: Record<ProviderId, ProviderSettings>;
}

export interface EngineInfo {
  name: string;
  models: string[];
  defaultModel: string;
}

export const ENGINES: Record<ProviderId, EngineInfo> = languages.engines;

export const SUPPORTED_LANGUAGES: Readonly<Record<string, string>> = languages.supported;

export const DEFAULT_SETTINGS = {
  maxTranslationLength: 10000,
  translationCacheTtl: 86400,
  chunkSize: 1000,
  compareTimeoutMs: 60000,
  detectionTimeoutMs: 2000,
  defaultSourceLanguage: 'auto',
  defaultTargetLanguage: 'zh',
} as const;

function readInt(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function readEnabled(env: NodeJS.ProcessEnv, id: ProviderId): boolean {
  return env[`${id.toUpperCase()}_ENABLED`] !== 'false';
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  return {
    maxTranslationLength: readInt(env.MAX_TRANSLATION_LENGTH, DEFAULT_SETTINGS.maxTranslationLength),
    translationCacheTtl: readInt(env.TRANSLATION_CACHE_TTL, DEFAULT_SETTINGS.translationCacheTtl),
    chunkSize: readInt(env.CHUNK_SIZE, DEFAULT_SETTINGS.chunkSize),
    compareTimeoutMs: readInt(env.COMPARE_TIMEOUT_MS, DEFAULT_SETTINGS.compareTimeoutMs),
    detectionTimeoutMs: readInt(env.DETECTION_TIMEOUT_MS, DEFAULT_SETTINGS.detectionTimeoutMs),
    defaultSourceLanguage: env.DEFAULT_SOURCE_LANGUAGE || DEFAULT_SETTINGS.defaultSourceLanguage,
    defaultTargetLanguage: env.DEFAULT_TARGET_LANGUAGE || DEFAULT_SETTINGS.defaultTargetLanguage,
    providers: {
      openai: {
        enabled: readEnabled(env, 'openai'),
        apiKey: env.OPENAI_API_KEY,
        defaultModel: env.OPENAI_MODEL || ENGINES.openai.defaultModel,
      },
      anthropic: {
        enabled: readEnabled(env, 'anthropic'),
        apiKey: env.ANTHROPIC_API_KEY,
        defaultModel: env.ANTHROPIC_MODEL || ENGINES.anthropic.defaultModel,
      },
      gemini: {
        enabled: readEnabled(env, 'gemini'),
        apiKey: env.GEMINI_API_KEY,
        defaultModel: env.GEMINI_MODEL || ENGINES.gemini.defaultModel,
      },
      google: {
        enabled: readEnabled(env, 'google'),
        apiKey: env.GOOGLE_API_KEY,
        defaultModel: ENGINES.google.defaultModel,
      },
      baidu: {
        enabled: readEnabled(env, 'baidu'),
        appId: env.BAIDU_APP_ID,
        secretKey: env.BAIDU_SECRET_KEY,
        defaultModel: ENGINES.baidu.defaultModel,
      },
      ollama: {
        enabled: readEnabled(env, 'ollama'),
        baseUrl: env.OLLAMA_BASE_URL,
        timeoutMs: readInt(env.OLLAMA_TIMEOUT, 60000),
        defaultModel: env.OLLAMA_MODEL || ENGINES.ollama.defaultModel,
      },
    },
  };
}

/**
 * A provider counts as configured when it is enabled and every credential it
 * needs is present. Ollama has no key, so an explicit base URL opts it in.
 */
export function hasCredentials(id: ProviderId, provider: ProviderSettings): boolean {
  if (!provider.enabled) return false;
  switch (id) {
    case 'baidu':
      return !!provider.appId && !!provider.secretKey;
    case 'ollama':
      return !!provider.baseUrl;
    default:
      return !!provider.apiKey;
  }
}

export function configuredProviderIds(settings: Settings): ProviderId[] {
  return PROVIDER_IDS.filter(id => hasCredentials(id, settings.providers[id]));
}

export function isProviderId(value: string): value is ProviderId {
  return PROVIDER_IDS.some(id => id === value);
}
