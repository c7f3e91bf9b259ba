// src/backoff.ts

/** Maps a zero-based attempt number to a wait in milliseconds. */
export type BackoffFunc = (attempt: number) => number;

export function constantBackoff(waitMs: number): BackoffFunc {
  return () => waitMs;
}

/** min * 2^attempt, capped at max (also on overflow). */
export function exponentialBackoff(minMs: number, maxMs: number): BackoffFunc {
  return (attempt) => {
    const wait = 2 ** attempt * minMs;
    if (!Number.isFinite(wait) || wait > maxMs) return maxMs;
    return wait;
  };
}

/**
 * (attempt + 1) * uniform(min, max). Spreads retries of many clients that failed together.
 * Degenerates to min * (attempt + 1) when max <= min.
 */
export function linearJitterBackoff(
  minMs: number,
  maxMs: number,
  random: () => number = Math.random
): BackoffFunc {
  return (attempt) => {
    const factor = attempt + 1;
    if (maxMs <= minMs) return minMs * factor;
    const jitter = Math.floor(random() * (maxMs - minMs));
    return (minMs + jitter) * factor;
  };
}

const INTEGER_SECONDS = /^[+-]?\d+$/;
// IMF-fixdate only: Date.parse alone would accept far more than RFC 9110 allows
const IMF_FIXDATE =
  /^(Mon|Tue|Wed|Thu|Fri|Sat|Sun), \d{2} (Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec) \d{4} \d{2}:\d{2}:\d{2} GMT$/;

/**
 * Parses a Retry-After header into a wait relative to `nowMs`.
 * Returns undefined when the value is neither integer seconds nor an HTTP date.
 */
export function retryAfterMs(value: string, nowMs: number = Date.now()): number | undefined {
  const v = value.trim();
  if (INTEGER_SECONDS.test(v)) return Number(v) * 1000;
  if (IMF_FIXDATE.test(v)) {
    const at = Date.parse(v);
    if (!Number.isNaN(at)) return at - nowMs;
  }
  return undefined;
}
