/**
 * Parse an HTTP-date string (RFC 9110 §5.6.7) into epoch ms.
 * Returns undefined if the value is missing or unparseable.
 *
 * Handles:
 * - IMF-fixdate: "Sun, 06 Nov 1994 08:49:37 GMT"
 * - RFC 850: "Sunday, 06-Nov-94 08:49:37 GMT"
 * - asctime: "Sun Nov  6 08:49:37 1994"
 * - "0" (treated as already expired, RFC 9111 §5.3)
 */
export function parseHttpDate(
  value: string | null | undefined,
): number | undefined {
  if (value === null || value === undefined) return undefined;
  const trimmed = value.trim();
  if (!trimmed) return undefined;
  // Expires: 0 means "already expired" per RFC 9111 §5.3
  if (trimmed === '0') return 0;
  const ms = Date.parse(trimmed);
  return Number.isFinite(ms) ? ms : undefined;
}
