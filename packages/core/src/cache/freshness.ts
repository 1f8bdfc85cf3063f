import type { FreshnessPolicy } from './cache-policy.js';

export type Freshness =
  | { status: 'fresh' }
  | { status: 'stale'; revalidatable: boolean };

/**
 * Calculate the freshness lifetime of a stored response in seconds.
 *
 * Priority order (RFC 9111 §4.2.1):
 *   0. no-cache → 0 (always revalidate)
 *   1. shared cache only: proxy-revalidate → 0, else s-maxage
 *   2. max-age
 *   3. Expires − Date
 *   4. Heuristic: cacheHeuristic × (Date − Last-Modified)
 *   5. 0 (treat as immediately stale)
 *
 * `immutable` raises the result to at least immutableMinTimeToLive.
 */
export function calculateFreshnessLifetime(policy: FreshnessPolicy): number {
  const { cacheControl } = policy;

  if (cacheControl.noCache) {
    return 0;
  }

  if (policy.shared && cacheControl.proxyRevalidate) {
    return 0;
  }

  let lifetime = 0;

  if (policy.shared && cacheControl.sMaxAge !== undefined) {
    lifetime = cacheControl.sMaxAge;
  } else if (cacheControl.maxAge !== undefined) {
    lifetime = cacheControl.maxAge;
  } else if (policy.expires !== undefined) {
    // Expires: 0 means already expired
    lifetime =
      policy.expires === 0
        ? 0
        : Math.max(0, (policy.expires - policy.responseDate) / 1000);
  } else if (policy.lastModified) {
    const lastModMs = Date.parse(policy.lastModified);
    if (Number.isFinite(lastModMs)) {
      const age = (policy.responseDate - lastModMs) / 1000;
      if (age > 0) {
        lifetime = Math.floor(age * policy.cacheHeuristic);
      }
    }
  }

  if (cacheControl.immutable) {
    lifetime = Math.max(lifetime, policy.immutableMinTimeToLive);
  }

  return lifetime;
}

/**
 * Age the response already had when it was received, in seconds.
 *
 *   apparent_age        = max(0, response_time − date_value)
 *   corrected_initial   = max(apparent_age, age_value)
 *
 * response_delay is approximated as 0 since request_time is not tracked.
 */
export function calculateInitialAge(policy: FreshnessPolicy): number {
  const apparentAge = Math.max(
    0,
    (policy.storedAt - policy.responseDate) / 1000,
  );
  return Math.max(apparentAge, policy.ageHeader);
}

/**
 * Calculate the current age of a stored response in seconds
 * (RFC 9111 §4.2.3): corrected initial age plus resident time.
 */
export function calculateCurrentAge(
  policy: FreshnessPolicy,
  now?: number,
): number {
  const currentTime = now ?? Date.now();
  const residentTime = (currentTime - policy.storedAt) / 1000;
  return calculateInitialAge(policy) + residentTime;
}

/**
 * Seconds until the response turns stale. Negative once it has.
 */
export function calculateTimeToLive(
  policy: FreshnessPolicy,
  now?: number,
): number {
  return calculateFreshnessLifetime(policy) - calculateCurrentAge(policy, now);
}

/**
 * Epoch ms at which the response was "born" (age 0) and at which it
 * stops being fresh. Both are fixed at write time, so they can be
 * indexed; age and time-to-live are derived from them and the clock.
 */
export function calculateLifeline(policy: FreshnessPolicy): {
  bornAt: number;
  staleAt: number;
} {
  const bornAt = policy.storedAt - calculateInitialAge(policy) * 1000;
  return {
    bornAt,
    staleAt: bornAt + calculateFreshnessLifetime(policy) * 1000,
  };
}

export function isRevalidatable(policy: FreshnessPolicy): boolean {
  return Boolean(policy.etag) || Boolean(policy.lastModified);
}

/**
 * Judge a stored response against the clock. Always recomputed from
 * the write-time snapshot.
 */
export function evaluateFreshness(
  policy: FreshnessPolicy,
  now?: number,
): Freshness {
  if (calculateFreshnessLifetime(policy) > calculateCurrentAge(policy, now)) {
    return { status: 'fresh' };
  }
  return { status: 'stale', revalidatable: isRevalidatable(policy) };
}

/**
 * Whether a stale response may stand in for an origin that failed or
 * answered 5xx: within `stale-if-error` seconds past its lifetime, and
 * never under must-revalidate (or proxy-revalidate, when shared).
 */
export function canServeStaleOnError(
  policy: FreshnessPolicy,
  now?: number,
): boolean {
  const { cacheControl } = policy;

  if (cacheControl.staleIfError === undefined) {
    return false;
  }
  if (
    cacheControl.mustRevalidate ||
    (policy.shared && cacheControl.proxyRevalidate)
  ) {
    return false;
  }

  return -calculateTimeToLive(policy, now) <= cacheControl.staleIfError;
}
