import { createFreshnessPolicy, type CachedResponse } from '../cache/index.js';

export const NOW = 1_700_000_000_000;

/**
 * Build a cached 200 response whose policy was written at `storedAt`.
 */
export function makeCachedResponse({
  url = 'http://example.com/',
  body = 'test',
  headers = {},
  storedAt = NOW,
}: {
  url?: string;
  body?: string;
  headers?: Record<string, string>;
  storedAt?: number;
} = {}): CachedResponse {
  return {
    response: {
      status: 200,
      headers,
      body: new TextEncoder().encode(body),
      url,
      httpVersion: '1.1',
    },
    policy: createFreshnessPolicy(
      { method: 'GET', headers: new Headers() },
      { status: 200, headers: new Headers(headers) },
      undefined,
      storedAt,
    ),
  };
}
