import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import {
  CacheStore,
  FileCacheStore,
  fingerprint,
  isTranslationResult,
  MemoryCacheStore,
  TranslationCache,
} from '../../src/cache';
import { TranslationResult } from '../../src/types';

function makeResult(overrides: Partial<TranslationResult> = {}): TranslationResult {
  return {
    providerId: 'openai',
    model: 'gpt-4o-mini',
    translatedText: 'Bonjour',
    resolvedSourceLang: 'en',
    targetLang: 'fr',
    qualityScore: 88,
    confidenceScore: 0.9,
    processingTimeMs: 12,
    wordCount: 1,
    characterCount: 5,
    metadata: { style: 'natural' },
    ...overrides,
  };
}

describe('Translation cache', () => {
  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('fingerprint', () => {
    it('should be stable for the same inputs', () => {
      const a = fingerprint('Hello', 'en', 'fr', 'openai', { style: 'formal' });
      const b = fingerprint('Hello', 'en', 'fr', 'openai', { style: 'formal' });
      expect(a).toBe(b);
      expect(a).toMatch(/^translation:[0-9a-f]{32}$/);
    });

    it('should ignore option key order and undefined members', () => {
      const a = fingerprint('Hello', 'en', 'fr', 'openai', { style: 'formal', model: 'gpt-4o' });
      const b = fingerprint('Hello', 'en', 'fr', 'openai', { model: 'gpt-4o', style: 'formal', context: undefined });
      expect(a).toBe(b);
    });

    it('should change when any input changes', () => {
      const base = fingerprint('Hello', 'en', 'fr', 'openai', {});
      expect(fingerprint('Hello!', 'en', 'fr', 'openai', {})).not.toBe(base);
      expect(fingerprint('Hello', 'de', 'fr', 'openai', {})).not.toBe(base);
      expect(fingerprint('Hello', 'en', 'es', 'openai', {})).not.toBe(base);
      expect(fingerprint('Hello', 'en', 'fr', 'anthropic', {})).not.toBe(base);
      expect(fingerprint('Hello', 'en', 'fr', 'openai', { style: 'casual' })).not.toBe(base);
    });
  });

  describe('MemoryCacheStore', () => {
    it('should expire entries after their ttl', async () => {
      const now = jest.spyOn(Date, 'now').mockReturnValue(1_000_000);
      const store = new MemoryCacheStore();

      await store.set('k', 'v', 60);
      expect(await store.get('k')).toBe('v');

      now.mockReturnValue(1_060_000);
      expect(await store.get('k')).toBeUndefined();
      expect(store.size).toBe(0);
    });
  });

  describe('FileCacheStore', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'lingua-relay-cache-'));
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('should persist entries across instances', async () => {
      const file = path.join(dir, 'nested', 'cache.json');
      await new FileCacheStore(file).set('k', 'v', 3600);

      expect(await new FileCacheStore(file).get('k')).toBe('v');
    });

    it('should start empty from a corrupt file', async () => {
      const file = path.join(dir, 'cache.json');
      await fs.writeFile(file, '{not json', 'utf-8');

      const store = new FileCacheStore(file);
      expect(await store.get('k')).toBeUndefined();
      await store.set('k', 'v', 3600);
      expect(JSON.parse(await fs.readFile(file, 'utf-8')).k.value).toBe('v');
    });
  });

  describe('TranslationCache', () => {
    it('should round-trip a result', async () => {
      const cache = new TranslationCache(new MemoryCacheStore());
      const result = makeResult();

      await cache.put('key', result, 60);
      expect(await cache.get('key')).toEqual(result);
    });

    it('should treat malformed entries as misses', async () => {
      const store = new MemoryCacheStore();
      await store.set('key', JSON.stringify({ translatedText: 'half a result' }), 60);

      const cache = new TranslationCache(store);
      expect(await cache.get('key')).toBeUndefined();
      expect(console.warn).toHaveBeenCalledWith(expect.stringContaining('Ignoring malformed cache entry'));
    });

    it('should treat store failures as misses and drop failed writes', async () => {
      const broken: CacheStore = {
        get: () => Promise.reject(new Error('store offline')),
        set: () => Promise.reject(new Error('store offline')),
      };
      const cache = new TranslationCache(broken);

      await expect(cache.get('key')).resolves.toBeUndefined();
      await expect(cache.put('key', makeResult(), 60)).resolves.toBeUndefined();
      expect(console.warn).toHaveBeenCalledTimes(2);
    });
  });

  describe('isTranslationResult', () => {
    it('should accept complete results only', () => {
      expect(isTranslationResult(makeResult())).toBe(true);
      expect(isTranslationResult({ ...makeResult(), qualityScore: 'high' })).toBe(false);
      expect(isTranslationResult(null)).toBe(false);
    });
  });
});
