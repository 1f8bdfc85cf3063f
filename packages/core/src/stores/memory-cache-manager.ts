import type { CachedResponse, FreshnessPolicy } from '../cache/index.js';
import type { HttpResponseRecord } from '../types/index.js';
import type { CacheManager } from './cache-manager.js';

export interface MemoryCacheManagerOptions {
  /** Maximum number of entries before the least recently used is evicted. Default: 1000 */
  maxEntries?: number;
}

/**
 * In-process cache manager. Entries are lost when the process exits.
 *
 * Each operation completes synchronously inside its promise, so a
 * concurrent reader sees either the previous entry or the new one.
 */
export class MemoryCacheManager implements CacheManager {
  private readonly entries = new Map<string, CachedResponse>();
  private readonly maxEntries: number;

  constructor({ maxEntries = 1000 }: MemoryCacheManagerOptions = {}) {
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new RangeError('maxEntries must be a positive integer');
    }
    this.maxEntries = maxEntries;
  }

  get size(): number {
    return this.entries.size;
  }

  async get(key: string): Promise<CachedResponse | undefined> {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }

    // Re-insert to mark as most recently used
    this.entries.delete(key);
    this.entries.set(key, entry);

    return structuredClone(entry);
  }

  async put(
    key: string,
    response: HttpResponseRecord,
    policy: FreshnessPolicy,
  ): Promise<void> {
    this.entries.delete(key);
    this.entries.set(key, structuredClone({ response, policy }));

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }
}
