import { z } from 'zod';
import { SerializationError, errorMessage } from '../errors/index.js';
import type { CachedResponse } from './cache-policy.js';

const CacheControlSchema = z.object({
  maxAge: z.number().optional(),
  sMaxAge: z.number().optional(),
  noCache: z.boolean(),
  noStore: z.boolean(),
  mustRevalidate: z.boolean(),
  proxyRevalidate: z.boolean(),
  public: z.boolean(),
  private: z.boolean(),
  immutable: z.boolean(),
  staleIfError: z.number().optional(),
});

const FreshnessPolicySchema = z.object({
  method: z.string(),
  statusCode: z.number().int(),
  shared: z.boolean(),
  cacheControl: CacheControlSchema,
  responseDate: z.number(),
  storedAt: z.number(),
  ageHeader: z.number(),
  expires: z.number().optional(),
  etag: z.string().optional(),
  lastModified: z.string().optional(),
  varyHeaders: z.string().optional(),
  cacheHeuristic: z.number(),
  immutableMinTimeToLive: z.number(),
});

const EncodedEntrySchema = z.object({
  response: z.object({
    status: z.number().int(),
    headers: z.record(z.string()),
    /** base64 */
    body: z.string(),
    url: z.string(),
    httpVersion: z.enum(['0.9', '1.0', '1.1', '2', '3']),
  }),
  policy: FreshnessPolicySchema,
});

/**
 * Serialise a cached response to a JSON string, body as base64.
 */
export function encodeCachedResponse({ response, policy }: CachedResponse): string {
  return JSON.stringify({
    response: {
      ...response,
      body: Buffer.from(response.body).toString('base64'),
    },
    policy,
  });
}

/**
 * Parse and validate a record written by encodeCachedResponse.
 * Throws SerializationError when the record is corrupt.
 */
export function decodeCachedResponse(raw: string): CachedResponse {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new SerializationError(
      `Stored record is not valid JSON: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  const parsed = EncodedEntrySchema.safeParse(json);
  if (!parsed.success) {
    throw new SerializationError(
      `Stored record has an unexpected shape: ${parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ')}`,
      { cause: parsed.error },
    );
  }

  const { response, policy } = parsed.data;
  return {
    response: {
      ...response,
      body: new Uint8Array(Buffer.from(response.body, 'base64')),
    },
    policy,
  };
}
