import {
  DEFAULT_CACHE_OPTIONS,
  type CacheOptions,
} from '../config/options-schema.js';
import { PolicyError } from '../errors/index.js';
import type { HttpResponseRecord } from '../types/index.js';
import {
  parseCacheControl,
  type CacheControlDirectives,
} from './cache-control-parser.js';
import { parseHttpDate } from './http-date.js';

/**
 * Write-time snapshot of everything needed to judge freshness later.
 * Plain data so persisted managers can store it as JSON.
 */
export interface FreshnessPolicy {
  /** Request method the response answered */
  method: string;
  /** HTTP status code of the stored response */
  statusCode: number;
  /** Whether the response was evaluated as a shared cache */
  shared: boolean;
  /** Parsed Cache-Control directives of the response */
  cacheControl: CacheControlDirectives;
  /**
   * Date response header as epoch ms.
   * Falls back to storedAt if the server didn't send Date.
   */
  responseDate: number;
  /** Epoch ms when the response was received */
  storedAt: number;
  /** Value of the Age response header at receipt time (seconds) */
  ageHeader: number;
  /**
   * Expires header as epoch ms. An unparseable value is stored as 0
   * (already expired).
   */
  expires?: number;
  /** ETag response header, for If-None-Match conditional requests */
  etag?: string;
  /** Last-Modified response header, for If-Modified-Since conditional requests */
  lastModified?: string;
  /** Raw Vary header value */
  varyHeaders?: string;
  cacheHeuristic: number;
  /** Seconds */
  immutableMinTimeToLive: number;
}

export interface CachedResponse {
  response: HttpResponseRecord;
  policy: FreshnessPolicy;
}

export interface StoredEntry extends CachedResponse {
  key: string;
}

export interface PolicyRequest {
  method: string;
  headers: Headers;
}

export interface PolicyResponse {
  status: number;
  headers: Headers;
}

// Statuses this cache knows how to store; 206 partial content is not one.
const UNDERSTOOD_STATUSES = new Set([
  200, 203, 204, 300, 301, 302, 303, 307, 308, 404, 405, 410, 414, 501,
]);

// RFC 9110 §15.1
const CACHEABLE_BY_DEFAULT = new Set([
  200, 203, 204, 300, 301, 308, 404, 405, 410, 414, 501,
]);

// The stored body is kept on revalidation, so its framing headers are too.
const EXCLUDED_FROM_REVALIDATION_UPDATE = new Set([
  'content-length',
  'content-encoding',
  'transfer-encoding',
  'content-range',
]);

function parseAgeHeader(raw: string | null): number {
  if (raw === null) return 0;
  const age = Number.parseInt(raw.trim(), 10);
  return Number.isFinite(age) && age > 0 ? age : 0;
}

/**
 * Snapshot the freshness inputs of a response without deciding whether
 * it may be stored. Throws PolicyError for a malformed Cache-Control.
 */
export function createFreshnessPolicy(
  request: PolicyRequest,
  response: PolicyResponse,
  options: CacheOptions = DEFAULT_CACHE_OPTIONS,
  now: number = Date.now(),
): FreshnessPolicy {
  const { headers } = response;
  const expiresRaw = headers.get('expires');

  return {
    method: request.method.toUpperCase(),
    statusCode: response.status,
    shared: options.shared,
    cacheControl: parseCacheControl(headers.get('cache-control')),
    responseDate: parseHttpDate(headers.get('date')) ?? now,
    storedAt: now,
    ageHeader: parseAgeHeader(headers.get('age')),
    expires:
      expiresRaw === null ? undefined : (parseHttpDate(expiresRaw) ?? 0),
    etag: headers.get('etag') ?? undefined,
    lastModified: headers.get('last-modified') ?? undefined,
    varyHeaders: headers.get('vary') ?? undefined,
    cacheHeuristic: options.cacheHeuristic,
    immutableMinTimeToLive: options.immutableMinTimeToLive,
  };
}

function isStorable(
  policy: FreshnessPolicy,
  requestDirectives: CacheControlDirectives,
  hasAuthorization: boolean,
): boolean {
  const cc = policy.cacheControl;

  if (requestDirectives.noStore || cc.noStore) return false;
  if (policy.method !== 'GET' && policy.method !== 'HEAD') return false;
  if (!UNDERSTOOD_STATUSES.has(policy.statusCode)) return false;
  if (policy.shared && cc.private) return false;

  // A shared cache may only keep authenticated responses the origin
  // explicitly marked as reusable.
  if (
    policy.shared &&
    hasAuthorization &&
    !cc.public &&
    cc.sMaxAge === undefined &&
    !cc.mustRevalidate
  ) {
    return false;
  }

  if (policy.varyHeaders?.trim() === '*') return false;

  return (
    policy.expires !== undefined ||
    cc.maxAge !== undefined ||
    (policy.shared && cc.sMaxAge !== undefined) ||
    cc.public ||
    CACHEABLE_BY_DEFAULT.has(policy.statusCode)
  );
}

/**
 * Decide whether a response may be stored and, if so, snapshot its
 * freshness policy. Malformed Cache-Control values make the response
 * non-cacheable rather than failing the request.
 */
export function assessStorability(
  request: PolicyRequest,
  response: PolicyResponse,
  options: CacheOptions = DEFAULT_CACHE_OPTIONS,
  now: number = Date.now(),
): FreshnessPolicy | undefined {
  let policy: FreshnessPolicy;
  let requestDirectives: CacheControlDirectives;

  try {
    requestDirectives = parseCacheControl(request.headers.get('cache-control'));
    policy = createFreshnessPolicy(request, response, options, now);
  } catch (error) {
    if (error instanceof PolicyError) return undefined;
    throw error;
  }

  return isStorable(
    policy,
    requestDirectives,
    request.headers.has('authorization'),
  )
    ? policy
    : undefined;
}

/**
 * Copy a request and attach the validators of a stored response.
 */
export function buildConditionalRequest(
  request: Request,
  policy: FreshnessPolicy,
): Request {
  const headers = new Headers(request.headers);
  if (policy.etag) {
    headers.set('if-none-match', policy.etag);
  }
  if (policy.lastModified) {
    headers.set('if-modified-since', policy.lastModified);
  }
  return new Request(request, { headers });
}

/**
 * Fold a 304 Not Modified into a stored entry.
 *
 * Per RFC 9111 §4.3.4 the 304 headers replace same-named stored headers;
 * status, body and URL stay. The freshness clock restarts at `now`.
 * Throws PolicyError when the merged Cache-Control is malformed.
 */
export function mergeRevalidation(
  entry: StoredEntry,
  notModified: PolicyResponse,
  now: number = Date.now(),
): StoredEntry {
  const headers: Record<string, string> = { ...entry.response.headers };
  notModified.headers.forEach((value, name) => {
    if (!EXCLUDED_FROM_REVALIDATION_UPDATE.has(name)) {
      headers[name] = value;
    }
  });

  const response: HttpResponseRecord = { ...entry.response, headers };
  const policy = createFreshnessPolicy(
    { method: entry.policy.method, headers: new Headers() },
    { status: entry.response.status, headers: new Headers(headers) },
    {
      shared: entry.policy.shared,
      cacheHeuristic: entry.policy.cacheHeuristic,
      immutableMinTimeToLive: entry.policy.immutableMinTimeToLive,
    },
    now,
  );

  return {
    key: entry.key,
    response,
    policy: {
      ...policy,
      // Date and Age describe the 304 itself, not the stored response.
      responseDate: parseHttpDate(notModified.headers.get('date')) ?? now,
      ageHeader: parseAgeHeader(notModified.headers.get('age')),
    },
  };
}
