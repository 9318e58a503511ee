/**
 * Poll cadence and failure backoff
 */

export type RandomFn = () => number;

/**
 * Uniform delay in [baseMs, baseMs * (1 + ratio)]
 */
export function jitteredCadence(baseMs: number, ratio: number, random: RandomFn = Math.random): number {
  return Math.round(baseMs * (1 + ratio * random()));
}

export interface BackoffParams {
  cadenceMs: number;
  maxBackoffMs: number;
  /** Consecutive failures including the one being backed off from (>= 1) */
  failures: number;
  /** Server hint from a rate-limit response */
  retryAfterMs?: number | null;
}

/**
 * Effective backoff cap: never below two cadences, so every backoff
 * delay stays strictly longer than the normal cadence.
 */
export function backoffCap(cadenceMs: number, maxBackoffMs: number): number {
  return Math.max(maxBackoffMs, 2 * cadenceMs);
}

/**
 * min(cap, cadence * 2^failures), raised to any Retry-After hint
 */
export function computeBackoffDelay(params: BackoffParams): number {
  const { cadenceMs, maxBackoffMs, retryAfterMs } = params;
  const failures = Math.max(1, params.failures);
  const cap = backoffCap(cadenceMs, maxBackoffMs);

  // 2^failures overflows to Infinity long before it matters; min() absorbs it
  const exponential = Math.min(cap, cadenceMs * 2 ** failures);
  const floor = retryAfterMs ?? 0;

  return Math.max(exponential, floor);
}
