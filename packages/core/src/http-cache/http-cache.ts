import {
  assessStorability,
  buildConditionalRequest,
  canServeStaleOnError,
  createFreshnessPolicy,
  defaultCacheKey,
  deriveCacheKey,
  evaluateFreshness,
  mergeRevalidation,
  toRequestParts,
  type CachedResponse,
  type FreshnessPolicy,
  type StoredEntry,
} from '../cache/index.js';
import {
  HttpCacheOptionsSchema,
  type CacheKeyFn,
  type CacheMode,
  type CacheModeFn,
  type CacheOptions,
  type HttpCacheOptions,
} from '../config/options-schema.js';
import { PolicyError } from '../errors/index.js';
import { createLogger, type Logger } from '../logger.js';
import type { CacheManager } from '../stores/cache-manager.js';
import type { HttpResponseRecord } from '../types/index.js';

export type CacheRequestInit = RequestInit & {
  /** Overrides the mode configured on the cache for this request only. */
  cacheMode?: CacheMode;
};

export type CachingFetch = (
  input: string | URL | Request,
  init?: CacheRequestInit,
) => Promise<Response>;

type CacheStatus = 'HIT' | 'MISS';

const NULL_BODY_STATUSES = new Set([204, 205, 304]);

function isSafeMethod(method: string): boolean {
  return method === 'GET' || method === 'HEAD';
}

async function toRecord(
  request: Request,
  response: Response,
): Promise<HttpResponseRecord> {
  const headers: Record<string, string> = {};
  // set-cookie is iterated once per value.
  response.headers.forEach((value, name) => {
    const previous = headers[name];
    headers[name] = previous === undefined ? value : `${previous}, ${value}`;
  });

  return {
    status: response.status,
    headers,
    body: new Uint8Array(await response.arrayBuffer()),
    url: response.url || request.url,
    httpVersion: '1.1',
  };
}

function toResponse(
  record: HttpResponseRecord,
  cache: CacheStatus,
  lookup: CacheStatus,
): Response {
  const headers = new Headers(record.headers);
  headers.set('x-cache', cache);
  headers.set('x-cache-lookup', lookup);

  return new Response(NULL_BODY_STATUSES.has(record.status) ? null : record.body, {
    status: record.status,
    headers,
  });
}

// Responses from fetch have immutable headers, so the stream is rewrapped.
function annotate(
  response: Response,
  cache: CacheStatus,
  lookup: CacheStatus,
): Response {
  const headers = new Headers(response.headers);
  headers.set('x-cache', cache);
  headers.set('x-cache-lookup', lookup);

  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
}

function gatewayTimeout(): Response {
  return new Response(null, {
    status: 504,
    statusText: 'Gateway Timeout',
    headers: { 'x-cache': 'MISS', 'x-cache-lookup': 'MISS' },
  });
}

/**
 * Caching layer in front of `fetch`.
 *
 * Each request is resolved according to its cache mode:
 *
 * | mode             | entry found                        | no entry           |
 * |------------------|------------------------------------|--------------------|
 * | `default`        | fresh: serve; stale: revalidate    | fetch, store       |
 * | `no-store`       | fetch, never store                 | fetch, never store |
 * | `reload`         | fetch, store                       | fetch, store       |
 * | `no-cache`       | fetch, store                       | fetch, store       |
 * | `force-cache`    | serve                              | fetch, store       |
 * | `only-if-cached` | serve                              | 504                |
 * | `ignore-rules`   | serve                              | fetch, store any 200 |
 *
 * Methods other than GET and HEAD are forwarded and, unless the origin
 * answers with an error, invalidate the GET entry of the same URL.
 *
 * A stale entry carrying `stale-if-error` is served in place of a 5xx
 * or a transport error while the window lasts.
 *
 * Storage failures never fail a request: a failing read is a miss and a
 * failing write still returns the origin response. Transport errors
 * propagate unchanged.
 *
 * @example
 * ```typescript
 * const cache = new HttpCache({ manager: new MemoryCacheManager() });
 * const fetchWithCache = cache.createFetch();
 * const response = await fetchWithCache('https://example.com/items');
 * ```
 */
export class HttpCache {
  private readonly manager: CacheManager;
  private readonly mode: CacheMode;
  private readonly cacheKey: CacheKeyFn;
  private readonly cacheModeFn?: CacheModeFn;
  private readonly cacheOptions: CacheOptions;
  private readonly transport: typeof fetch;
  private readonly logger: Logger;

  constructor(options: HttpCacheOptions) {
    const resolved = HttpCacheOptionsSchema.parse(options);

    this.manager = resolved.manager;
    this.mode = resolved.mode;
    this.cacheKey = resolved.cacheKey ?? defaultCacheKey;
    this.cacheModeFn = resolved.cacheModeFn;
    this.cacheOptions = resolved.cacheOptions;
    // Resolved per call so an instrumented global fetch is picked up.
    this.transport =
      resolved.fetch ?? ((input, init) => globalThis.fetch(input, init));
    this.logger = resolved.logger ?? createLogger();
  }

  /**
   * A function with the signature of `fetch` that goes through this cache.
   */
  createFetch(): CachingFetch {
    return (input, init) => this.fetch(input, init);
  }

  async fetch(
    input: string | URL | Request,
    init: CacheRequestInit = {},
  ): Promise<Response> {
    const { cacheMode, ...requestInit } = init;
    const request = new Request(input, requestInit);
    const parts = toRequestParts(request);
    const key = deriveCacheKey(parts, this.cacheKey);
    const mode = cacheMode ?? this.cacheModeFn?.(parts) ?? this.mode;
    const log = this.logger.child({ key, mode });

    if (mode === 'no-store') {
      log.debug({ outcome: 'bypass' }, 'Cache bypassed');
      return this.transport(request);
    }

    if (!isSafeMethod(parts.method)) {
      const response = await this.transport(request);
      if (response.status < 400) {
        const getKey = deriveCacheKey({ ...parts, method: 'GET' }, this.cacheKey);
        await this.remove(getKey, log);
      }
      return response;
    }

    if (mode === 'reload') {
      return this.forward(request, key, mode, 'MISS', log);
    }

    const cached = await this.lookup(key, log);

    if (!cached) {
      if (mode === 'only-if-cached') {
        log.debug({ outcome: 'miss' }, 'No stored response for only-if-cached');
        return gatewayTimeout();
      }
      return this.forward(request, key, mode, 'MISS', log);
    }

    switch (mode) {
      case 'no-cache':
        return this.forward(request, key, mode, 'HIT', log);

      case 'force-cache':
      case 'only-if-cached':
      case 'ignore-rules':
        log.debug({ outcome: 'hit' }, 'Serving stored response');
        return toResponse(cached.response, 'HIT', 'HIT');

      case 'default':
        break;
    }

    const freshness = evaluateFreshness(cached.policy);

    if (freshness.status === 'fresh') {
      log.debug({ outcome: 'hit' }, 'Serving fresh response');
      return toResponse(cached.response, 'HIT', 'HIT');
    }

    if (!freshness.revalidatable) {
      log.debug({ outcome: 'stale' }, 'Stale response has no validators');
    }
    return this.revalidate(
      request,
      { key, ...cached },
      freshness.revalidatable,
      log,
    );
  }

  /**
   * Remove the stored response of a request.
   */
  async invalidate(
    input: string | URL | Request,
    init?: RequestInit,
  ): Promise<void> {
    const request = new Request(input, init);
    await this.manager.delete(
      deriveCacheKey(toRequestParts(request), this.cacheKey),
    );
  }

  private async revalidate(
    request: Request,
    entry: StoredEntry,
    conditional: boolean,
    log: Logger,
  ): Promise<Response> {
    let response: Response;
    try {
      response = await this.transport(
        conditional ? buildConditionalRequest(request, entry.policy) : request,
      );
    } catch (error) {
      if (!canServeStaleOnError(entry.policy)) throw error;
      log.warn(
        { outcome: 'stale-if-error', err: error },
        'Origin unreachable, serving stale response',
      );
      return toResponse(entry.response, 'HIT', 'HIT');
    }

    if (response.status >= 500 && canServeStaleOnError(entry.policy)) {
      log.warn(
        { outcome: 'stale-if-error', status: response.status },
        'Origin failed, serving stale response',
      );
      await response.body?.cancel();
      return toResponse(entry.response, 'HIT', 'HIT');
    }

    if (response.status !== 304) {
      return this.store(request, response, entry.key, 'default', 'HIT', log);
    }

    let merged: StoredEntry;
    try {
      merged = mergeRevalidation(entry, response);
    } catch (error) {
      if (!(error instanceof PolicyError)) throw error;
      log.debug({ outcome: 'revalidated', err: error }, 'Kept stored headers');
      return toResponse(entry.response, 'HIT', 'HIT');
    }

    await this.save(entry.key, merged.response, merged.policy, log);
    log.debug({ outcome: 'revalidated' }, 'Stored response revalidated');
    return toResponse(merged.response, 'HIT', 'HIT');
  }

  private async forward(
    request: Request,
    key: string,
    mode: CacheMode,
    lookup: CacheStatus,
    log: Logger,
  ): Promise<Response> {
    const response = await this.transport(request);
    return this.store(request, response, key, mode, lookup, log);
  }

  private async store(
    request: Request,
    response: Response,
    key: string,
    mode: CacheMode,
    lookup: CacheStatus,
    log: Logger,
  ): Promise<Response> {
    const policy = this.assess(request, response, mode);

    if (!policy) {
      log.debug(
        { outcome: 'not-storable', status: response.status },
        'Response not stored',
      );
      return annotate(response, 'MISS', lookup);
    }

    const record = await toRecord(request, response);
    await this.save(key, record, policy, log);
    log.debug({ outcome: 'stored', status: record.status }, 'Response stored');
    return toResponse(record, 'MISS', lookup);
  }

  private assess(
    request: Request,
    response: Response,
    mode: CacheMode,
  ): FreshnessPolicy | undefined {
    const now = Date.now();

    if (mode !== 'ignore-rules') {
      return assessStorability(request, response, this.cacheOptions, now);
    }

    if (response.status !== 200) {
      return undefined;
    }

    try {
      return createFreshnessPolicy(request, response, this.cacheOptions, now);
    } catch (error) {
      if (!(error instanceof PolicyError)) throw error;
      const headers = new Headers(response.headers);
      headers.delete('cache-control');
      return createFreshnessPolicy(
        request,
        { status: 200, headers },
        this.cacheOptions,
        now,
      );
    }
  }

  private async lookup(
    key: string,
    log: Logger,
  ): Promise<CachedResponse | undefined> {
    try {
      return await this.manager.get(key);
    } catch (error) {
      log.warn({ outcome: 'read-failed', err: error }, 'Cache read failed');
      return undefined;
    }
  }

  private async save(
    key: string,
    response: HttpResponseRecord,
    policy: FreshnessPolicy,
    log: Logger,
  ): Promise<void> {
    try {
      await this.manager.put(key, response, policy);
    } catch (error) {
      log.warn({ outcome: 'write-failed', err: error }, 'Cache write failed');
    }
  }

  private async remove(key: string, log: Logger): Promise<void> {
    try {
      await this.manager.delete(key);
      log.debug({ outcome: 'invalidated' }, 'Stored response invalidated');
    } catch (error) {
      log.warn({ outcome: 'delete-failed', err: error }, 'Cache delete failed');
    }
  }
}
