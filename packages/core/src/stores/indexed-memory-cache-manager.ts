import {
  calculateCurrentAge,
  calculateLifeline,
  calculateTimeToLive,
  evaluateFreshness,
  type CachedResponse,
  type FreshnessPolicy,
  type StoredEntry,
} from '../cache/index.js';
import type { HttpResponseRecord } from '../types/index.js';
import type { IndexedCacheManager, RangeField } from './cache-manager.js';
import { SortedIndex } from './sorted-index.js';

// Slack, in ms, when narrowing candidates through the instant indices;
// every candidate is re-checked against the live clock.
const INSTANT_SLACK_MS = 1;

const TEXT_CONTENT_TYPE =
  /^(text\/|application\/(json|xml|javascript|x-www-form-urlencoded)|[^;]*\+(json|xml))/i;

export function tokenize(text: string): Array<string> {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter(Boolean);
}

/**
 * Words of a textual body. Bodies with a non-textual content type
 * yield nothing.
 */
export function indexableWords(response: HttpResponseRecord): Set<string> {
  const contentType = response.headers['content-type'];
  if (contentType !== undefined && !TEXT_CONTENT_TYPE.test(contentType)) {
    return new Set();
  }
  return new Set(tokenize(new TextDecoder().decode(response.body)));
}

function addToIndex(
  index: Map<string, Set<string>>,
  term: string,
  key: string,
): void {
  const keys = index.get(term);
  if (keys) {
    keys.add(key);
  } else {
    index.set(term, new Set([key]));
  }
}

function removeFromIndex(
  index: Map<string, Set<string>>,
  term: string,
  key: string,
): void {
  const keys = index.get(term);
  if (!keys) return;
  keys.delete(key);
  if (keys.size === 0) {
    index.delete(term);
  }
}

/**
 * In-process cache manager with secondary indices:
 *
 * - tag index: response URL → keys
 * - word index: body word → keys
 * - birth and stale instants, from which age and time-to-live follow
 *
 * The arena and every index change together inside one synchronous
 * step, so no caller observes an index entry without its record.
 * Entries are lost when the process exits.
 */
export class IndexedMemoryCacheManager implements IndexedCacheManager {
  private readonly arena = new Map<string, StoredEntry>();
  private readonly tags = new Map<string, Set<string>>();
  private readonly words = new Map<string, Set<string>>();
  private readonly entryWords = new Map<string, Set<string>>();
  private readonly bornAt = new SortedIndex();
  private readonly staleAt = new SortedIndex();

  get size(): number {
    return this.arena.size;
  }

  async get(key: string): Promise<CachedResponse | undefined> {
    const entry = this.arena.get(key);
    if (!entry) {
      return undefined;
    }
    return structuredClone({ response: entry.response, policy: entry.policy });
  }

  async put(
    key: string,
    response: HttpResponseRecord,
    policy: FreshnessPolicy,
  ): Promise<void> {
    const entry: StoredEntry = structuredClone({ key, response, policy });

    this.unindex(key);
    this.arena.set(key, entry);

    addToIndex(this.tags, entry.response.url, key);

    const words = indexableWords(entry.response);
    for (const word of words) {
      addToIndex(this.words, word, key);
    }
    this.entryWords.set(key, words);

    const lifeline = calculateLifeline(entry.policy);
    this.bornAt.set(key, lifeline.bornAt);
    this.staleAt.set(key, lifeline.staleAt);
  }

  async delete(key: string): Promise<void> {
    this.unindex(key);
  }

  async clear(): Promise<void> {
    this.arena.clear();
    this.tags.clear();
    this.words.clear();
    this.entryWords.clear();
    this.bornAt.clear();
    this.staleAt.clear();
  }

  async lookupByTag(url: string): Promise<Array<StoredEntry>> {
    return this.resolve(this.tags.get(url) ?? []);
  }

  async range(
    field: RangeField,
    low: number,
    high: number,
  ): Promise<Array<StoredEntry>> {
    const now = Date.now();

    if (field === 'age') {
      // age = (now − bornAt) / 1000
      const candidates = this.bornAt.between(
        now - high * 1000 - INSTANT_SLACK_MS,
        now - low * 1000 + INSTANT_SLACK_MS,
      );
      return this.resolve(candidates).filter((entry) => {
        const age = calculateCurrentAge(entry.policy, now);
        return age >= low && age <= high;
      });
    }

    // timeToLive = (staleAt − now) / 1000
    const candidates = this.staleAt.between(
      now + low * 1000 - INSTANT_SLACK_MS,
      now + high * 1000 + INSTANT_SLACK_MS,
    );
    return this.resolve(candidates).filter((entry) => {
      const ttl = calculateTimeToLive(entry.policy, now);
      return ttl >= low && ttl <= high;
    });
  }

  async staleView(): Promise<Array<StoredEntry>> {
    const now = Date.now();
    const candidates = this.staleAt.between(
      -Infinity,
      now + INSTANT_SLACK_MS,
    );
    return this.resolve(candidates).filter(
      (entry) => evaluateFreshness(entry.policy, now).status === 'stale',
    );
  }

  async search(term: string): Promise<Array<StoredEntry>> {
    const terms = tokenize(term);
    const [first, ...rest] = terms;
    if (first === undefined) {
      return [];
    }

    const matches = [...(this.words.get(first) ?? [])].filter((key) =>
      rest.every((word) => this.words.get(word)?.has(key)),
    );
    return this.resolve(matches);
  }

  private resolve(keys: Iterable<string>): Array<StoredEntry> {
    const entries: Array<StoredEntry> = [];
    for (const key of keys) {
      const entry = this.arena.get(key);
      if (entry) {
        entries.push(structuredClone(entry));
      }
    }
    return entries;
  }

  private unindex(key: string): void {
    const existing = this.arena.get(key);
    if (!existing) return;

    removeFromIndex(this.tags, existing.response.url, key);
    for (const word of this.entryWords.get(key) ?? []) {
      removeFromIndex(this.words, word, key);
    }
    this.entryWords.delete(key);
    this.bornAt.remove(key);
    this.staleAt.remove(key);
    this.arena.delete(key);
  }
}
