import { createHash } from 'crypto';
import os from 'os';
import path from 'path';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export function hashString(str: string): string {
  return createHash('md5').update(str, 'utf8').digest('hex');
}

/**
 * Recursively sorts object keys and drops undefined members, so two objects
 * with the same entries serialize to the same string.
 */
export function sortObjectKeys(value: unknown): JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(item => (item === undefined ? null : sortObjectKeys(item)));
  }
  if (typeof value === 'object') {
    const sorted: { [key: string]: JsonValue } = {};
    for (const key of Object.keys(value).sort()) {
      const member: unknown = Reflect.get(value, key);
      if (member !== undefined) {
        sorted[key] = sortObjectKeys(member);
      }
    }
    return sorted;
  }
  return null;
}

export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortObjectKeys(value));
}

export function getCacheDirectory(): string {
  const base = process.env.XDG_CACHE_HOME || path.join(os.homedir(), '.cache');
  return path.join(base, 'lingua-relay');
}

export function getDefaultCacheFilePath(): string {
  return path.join(getCacheDirectory(), 'translation-cache.json');
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

export function preview(text: string, length = 50): string {
  return text.length > length ? `${text.slice(0, length)}...` : text;
}

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
