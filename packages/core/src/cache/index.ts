export {
  parseCacheControl,
  type CacheControlDirectives,
} from './cache-control-parser.js';
export { parseHttpDate } from './http-date.js';
export {
  assessStorability,
  buildConditionalRequest,
  createFreshnessPolicy,
  mergeRevalidation,
  type CachedResponse,
  type FreshnessPolicy,
  type PolicyRequest,
  type PolicyResponse,
  type StoredEntry,
} from './cache-policy.js';
export {
  calculateCurrentAge,
  calculateFreshnessLifetime,
  canServeStaleOnError,
  calculateInitialAge,
  calculateLifeline,
  calculateTimeToLive,
  evaluateFreshness,
  isRevalidatable,
  type Freshness,
} from './freshness.js';
export { defaultCacheKey, deriveCacheKey, toRequestParts } from './cache-key.js';
export {
  decodeCachedResponse,
  encodeCachedResponse,
} from './stored-entry-codec.js';
