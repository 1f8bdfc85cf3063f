export {
  CACHE_MODES,
  CacheModeSchema,
  CacheOptionsSchema,
  DEFAULT_CACHE_OPTIONS,
  HttpCacheOptionsSchema,
  type CacheKeyFn,
  type CacheMode,
  type CacheModeFn,
  type CacheOptions,
  type HttpCacheOptions,
  type ResolvedHttpCacheOptions,
} from './options-schema.js';
