import { z } from 'zod';
import type { Logger } from '../logger.js';
import type { CacheManager } from '../stores/cache-manager.js';
import type { RequestParts } from '../types/index.js';

export const CACHE_MODES = [
  'default',
  'no-store',
  'reload',
  'no-cache',
  'force-cache',
  'only-if-cached',
  'ignore-rules',
] as const;

/**
 * How a request interacts with the cache.
 *
 * - `default`: serve fresh entries, revalidate stale ones, store what may be stored
 * - `no-store`: bypass the cache entirely
 * - `reload`: always fetch, then store
 * - `no-cache`: always fetch, even on a hit, then store
 * - `force-cache`: serve any stored entry regardless of staleness
 * - `only-if-cached`: serve any stored entry, never contact the origin
 * - `ignore-rules`: store every 200 and serve it regardless of headers
 */
export type CacheMode = (typeof CACHE_MODES)[number];

export type CacheKeyFn = (parts: RequestParts) => string;
export type CacheModeFn = (parts: RequestParts) => CacheMode;

export const CacheModeSchema = z.enum(CACHE_MODES);

export const CacheOptionsSchema = z
  .object({
    /** Evaluate responses as a shared (public) cache. */
    shared: z.boolean().default(true),
    /** Fraction of (Date − Last-Modified) used as a heuristic lifetime. */
    cacheHeuristic: z.number().min(0).max(1).default(0.1),
    /** Minimum lifetime in seconds for `immutable` responses. */
    immutableMinTimeToLive: z.number().int().nonnegative().default(86_400),
  })
  .strict();

export type CacheOptions = z.output<typeof CacheOptionsSchema>;

export const DEFAULT_CACHE_OPTIONS: CacheOptions = CacheOptionsSchema.parse({});

const isFunction = (value: unknown): boolean => typeof value === 'function';

export const HttpCacheOptionsSchema = z.object({
  manager: z.custom<CacheManager>(
    (value) =>
      typeof value === 'object' &&
      value !== null &&
      'get' in value &&
      'put' in value &&
      'delete' in value,
    { message: 'manager must implement get, put and delete' },
  ),
  mode: CacheModeSchema.default('default'),
  cacheKey: z.custom<CacheKeyFn>(isFunction).optional(),
  cacheModeFn: z.custom<CacheModeFn>(isFunction).optional(),
  cacheOptions: CacheOptionsSchema.default({}),
  fetch: z.custom<typeof fetch>(isFunction).optional(),
  logger: z.custom<Logger>().optional(),
});

export type HttpCacheOptions = z.input<typeof HttpCacheOptionsSchema>;
export type ResolvedHttpCacheOptions = z.output<typeof HttpCacheOptionsSchema>;
