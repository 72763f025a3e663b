import type { CachePayload } from '@prepscout/schemas';
import type { ContentCacheStore } from './types.js';

/**
 * In-process cache store. Payloads are kept serialized, the way a database
 * would hand them back, so callers always go through validation.
 */
export class MemoryContentCache implements ContentCacheStore {
  private readonly entries = new Map<string, string>();

  async get(url: string): Promise<string | null> {
    return this.entries.get(url) ?? null;
  }

  async put(url: string, payload: CachePayload): Promise<void> {
    this.entries.set(url, JSON.stringify(payload));
  }

  /** Store a raw value as-is (used to seed corrupt or legacy entries). */
  setRaw(url: string, raw: string): void {
    this.entries.set(url, raw);
  }

  has(url: string): boolean {
    return this.entries.has(url);
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
