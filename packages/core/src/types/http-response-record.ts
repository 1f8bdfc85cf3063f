export type HttpVersion = '0.9' | '1.0' | '1.1' | '2' | '3';

export interface HttpResponseRecord {
  /** HTTP status code */
  status: number;
  /** Response headers with lower-case names, in the order received */
  headers: Record<string, string>;
  body: Uint8Array;
  /** Absolute URL the response was produced for */
  url: string;
  httpVersion: HttpVersion;
}

/**
 * Identity of an outgoing request, as seen by cache key functions.
 */
export interface RequestParts {
  method: string;
  /** Normalised absolute URL */
  url: string;
  httpVersion: HttpVersion;
  headers: Headers;
}
