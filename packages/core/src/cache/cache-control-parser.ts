import { PolicyError } from '../errors/index.js';

export interface CacheControlDirectives {
  maxAge?: number;
  sMaxAge?: number;
  noCache: boolean;
  noStore: boolean;
  mustRevalidate: boolean;
  proxyRevalidate: boolean;
  public: boolean;
  private: boolean;
  immutable: boolean;
  staleIfError?: number;
}

const EMPTY_DIRECTIVES: CacheControlDirectives = {
  noCache: false,
  noStore: false,
  mustRevalidate: false,
  proxyRevalidate: false,
  public: false,
  private: false,
  immutable: false,
};

const DELTA_SECONDS = /^\d+$/;

/**
 * Parse a delta-seconds directive value, optionally quoted.
 * Throws PolicyError for anything that is not a non-negative integer.
 */
function parseSeconds(directive: string, raw: string | undefined): number {
  const value = raw?.replace(/^"(.*)"$/, '$1').trim();
  if (value === undefined || !DELTA_SECONDS.test(value)) {
    throw new PolicyError(
      'cache-control',
      `Invalid value for ${directive}: ${raw === undefined ? '(missing)' : `"${raw}"`}`,
    );
  }
  return Number.parseInt(value, 10);
}

/**
 * Parse a Cache-Control header value into structured directives.
 *
 * Unrecognised directives are ignored. A malformed delta-seconds value
 * on a recognised directive throws PolicyError; callers treat that as
 * "not cacheable".
 */
export function parseCacheControl(
  header: string | null | undefined,
): CacheControlDirectives {
  if (!header) return { ...EMPTY_DIRECTIVES };

  const result: CacheControlDirectives = { ...EMPTY_DIRECTIVES };

  for (const part of header.split(',')) {
    const trimmed = part.trim();
    if (!trimmed) continue;

    const eqIdx = trimmed.indexOf('=');
    const key = (eqIdx === -1 ? trimmed : trimmed.slice(0, eqIdx))
      .trim()
      .toLowerCase();
    const value = eqIdx === -1 ? undefined : trimmed.slice(eqIdx + 1).trim();

    switch (key) {
      case 'max-age':
        result.maxAge = parseSeconds(key, value);
        break;
      case 's-maxage':
        result.sMaxAge = parseSeconds(key, value);
        break;
      case 'no-cache':
        result.noCache = true;
        break;
      case 'no-store':
        result.noStore = true;
        break;
      case 'must-revalidate':
        result.mustRevalidate = true;
        break;
      case 'proxy-revalidate':
        result.proxyRevalidate = true;
        break;
      case 'public':
        result.public = true;
        break;
      case 'private':
        result.private = true;
        break;
      case 'immutable':
        result.immutable = true;
        break;
      case 'stale-if-error':
        result.staleIfError = parseSeconds(key, value);
        break;
      // Unknown directives silently ignored
    }
  }

  return result;
}
