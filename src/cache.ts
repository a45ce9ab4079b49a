import { promises as fs } from 'fs';
import path from 'path';
import { canonicalJson, hashString } from './helpers.js';
import { createLogger, Logger } from './logger.js';
import { TranslateOptions, TranslationResult } from './types.js';

/** Key-value store with per-entry expiry. */
export interface CacheStore {
  get(key: string): Promise<string | undefined>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
}

interface StoredEntry {
  value: string;
  expiresAt: number;
}

export class MemoryCacheStore implements CacheStore {
  private readonly entries = new Map<string, StoredEntry>();

  async get(key: string): Promise<string | undefined> {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (Date.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.entries.set(key, { value, expiresAt: Date.now() + ttlSeconds * 1000 });
  }

  get size(): number {
    return this.entries.size;
  }
}

type CacheFile = { [key: string]: StoredEntry };

/**
 * JSON file store. The file is read once, then kept in memory; every write
 * rewrites the file with expired entries pruned. Writes are chained so two
 * concurrent `set` calls never interleave on disk.
 */
export class FileCacheStore implements CacheStore {
  private data: CacheFile | null = null;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  async get(key: string): Promise<string | undefined> {
    const data = await this.load();
    const entry = data[key];
    if (!entry || Date.now() >= entry.expiresAt) return undefined;
    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    const data = await this.load();
    data[key] = { value, expiresAt: Date.now() + ttlSeconds * 1000 };
    const write = this.writeChain.then(() => this.save(data));
    this.writeChain = write.catch(() => undefined);
    await write;
  }

  private async load(): Promise<CacheFile> {
    if (this.data) return this.data;
    try {
      const raw = await fs.readFile(this.filePath, 'utf-8');
      const parsed: unknown = JSON.parse(raw);
      this.data = isCacheFile(parsed) ? parsed : {};
    } catch {
      // A missing or corrupt file starts an empty cache
      this.data = {};
    }
    return this.data;
  }

  private async save(data: CacheFile): Promise<void> {
    const now = Date.now();
    for (const key of Object.keys(data)) {
      if (data[key].expiresAt <= now) delete data[key];
    }
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(data), 'utf-8');
  }
}

function isCacheFile(value: unknown): value is CacheFile {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  return Object.values(value).every(
    entry => typeof entry === 'object' && entry !== null
      && typeof Reflect.get(entry, 'value') === 'string'
      && typeof Reflect.get(entry, 'expiresAt') === 'number'
  );
}

export function isTranslationResult(value: unknown): value is TranslationResult {
  if (typeof value !== 'object' || value === null) return false;
  const field = (name: string): unknown => Reflect.get(value, name);
  return typeof field('providerId') === 'string'
    && typeof field('model') === 'string'
    && typeof field('translatedText') === 'string'
    && typeof field('resolvedSourceLang') === 'string'
    && typeof field('targetLang') === 'string'
    && typeof field('qualityScore') === 'number'
    && typeof field('confidenceScore') === 'number'
    && typeof field('processingTimeMs') === 'number'
    && typeof field('wordCount') === 'number'
    && typeof field('characterCount') === 'number'
    && typeof field('metadata') === 'object' && field('metadata') !== null;
}

export function fingerprint(
  text: string,
  sourceLang: string,
  targetLang: string,
  providerId: string,
  options: TranslateOptions = {}
): string {
  const content = `${text}:${sourceLang}:${targetLang}:${providerId}:${canonicalJson(options)}`;
  return `translation:${hashString(content)}`;
}

/**
 * Translation results over a CacheStore. The cache only ever speeds things
 * up: a failed read is a miss and a failed write is logged and dropped.
 */
export class TranslationCache {
  private log: Logger;

  constructor(private readonly store: CacheStore, logger?: Logger) {
    this.log = logger ?? createLogger('TranslationCache');
  }

  async get(key: string): Promise<TranslationResult | undefined> {
    try {
      const cached = await this.store.get(key);
      if (cached === undefined) return undefined;
      const parsed: unknown = JSON.parse(cached);
      if (!isTranslationResult(parsed)) {
        this.log.warn('Ignoring malformed cache entry', { key });
        return undefined;
      }
      return parsed;
    } catch (error) {
      this.log.warn('Failed to get cached translation', { key, error: error instanceof Error ? error.message : String(error) });
      return undefined;
    }
  }

  async put(key: string, result: TranslationResult, ttlSeconds: number): Promise<void> {
    try {
      await this.store.set(key, JSON.stringify(result), ttlSeconds);
    } catch (error) {
      this.log.warn('Failed to cache translation', { key, error: error instanceof Error ? error.message : String(error) });
    }
  }
}
