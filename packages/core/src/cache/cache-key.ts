import type { CacheKeyFn } from '../config/options-schema.js';
import type { HttpVersion, RequestParts } from '../types/index.js';

/**
 * Default cache key: `{METHOD}:{URL}`, e.g. `GET:http://example.com/`.
 */
export const defaultCacheKey: CacheKeyFn = (parts) =>
  `${parts.method}:${parts.url}`;

/**
 * Describe a request the way cache key functions see it. The URL is
 * normalised so `http://example.com` and `http://example.com/` share a key.
 */
export function toRequestParts(
  request: Pick<Request, 'method' | 'url' | 'headers'>,
  httpVersion: HttpVersion = '1.1',
): RequestParts {
  return {
    method: request.method.toUpperCase(),
    url: new URL(request.url).href,
    httpVersion,
    headers: request.headers,
  };
}

export function deriveCacheKey(
  parts: RequestParts,
  cacheKey: CacheKeyFn = defaultCacheKey,
): string {
  return cacheKey(parts);
}
