import type {
  CachedResponse,
  FreshnessPolicy,
  StoredEntry,
} from '../cache/index.js';
import type { HttpResponseRecord } from '../types/index.js';

/**
 * Interface for storing HTTP responses together with their freshness policy
 */
export interface CacheManager {
  /**
   * Look up a stored response. Never filters by freshness; that is the
   * caller's decision.
   * @param key The cache key
   * @returns The response and its policy, or undefined if absent
   */
  get(key: string): Promise<CachedResponse | undefined>;

  /**
   * Store a response, replacing any entry under the same key
   * @param key The cache key
   * @param response The response to store
   * @param policy Its freshness policy
   */
  put(
    key: string,
    response: HttpResponseRecord,
    policy: FreshnessPolicy,
  ): Promise<void>;

  /**
   * Remove an entry. Deleting an absent key succeeds.
   * @param key The cache key
   */
  delete(key: string): Promise<void>;

  /**
   * Remove every entry
   */
  clear(): Promise<void>;
}

export type RangeField = 'age' | 'timeToLive';

/**
 * A cache manager that also maintains secondary indices over its entries.
 * Index results are computed against the clock at query time.
 */
export interface IndexedCacheManager extends CacheManager {
  /**
   * All entries whose stored response URL equals `url`
   */
  lookupByTag(url: string): Promise<Array<StoredEntry>>;

  /**
   * Entries whose age or time-to-live, in seconds at query time,
   * lies within [low, high]
   */
  range(
    field: RangeField,
    low: number,
    high: number,
  ): Promise<Array<StoredEntry>>;

  /**
   * Entries that are stale at query time
   */
  staleView(): Promise<Array<StoredEntry>>;

  /**
   * Entries whose body text contains every word of `term`, ignoring case
   */
  search(term: string): Promise<Array<StoredEntry>>;
}
