/**
 * Circuit Breaker and Resilience Utilities
 * Per-attempt timeout, circuit breaker and bounded retry for marketplace calls
 */

import {
  ExponentialBackoff,
  retry,
  circuitBreaker,
  timeout,
  wrap,
  handleWhen,
  ConsecutiveBreaker,
  CircuitState,
  TimeoutStrategy,
  BrokenCircuitError,
  TaskCancelledError,
} from 'cockatiel';
import { logger } from '../../utils/logger.js';

// ============================================================================
// Types
// ============================================================================

export interface ResilienceConfig {
  /** Log prefix, e.g. "twickets" */
  label: string;

  /** Failures that are retried and counted by the breaker; others pass straight through */
  handles: (error: unknown) => boolean;

  /** Timeout for a single attempt in ms */
  attemptTimeoutMs: number;

  retry?: {
    /** Retries after the first attempt (0 = no retry) */
    attempts?: number;
    initialDelayMs?: number;
    maxDelayMs?: number;
  };

  breaker?: {
    /** Consecutive handled failures that open the circuit */
    threshold?: number;
    halfOpenAfterMs?: number;
  };
}

export interface ResiliencePolicies {
  /**
   * Run a call under retry → breaker → timeout. The callback receives an
   * AbortSignal that fires on timeout or when the caller's signal aborts.
   */
  execute: <T>(fn: (signal: AbortSignal) => Promise<T>, signal?: AbortSignal) => Promise<T>;
}

const CIRCUIT_STATE_NAMES: Record<CircuitState, string> = {
  [CircuitState.Closed]: 'closed',
  [CircuitState.Open]: 'open',
  [CircuitState.HalfOpen]: 'half-open',
  [CircuitState.Isolated]: 'isolated',
};

// ============================================================================
// Create Resilience Policies
// ============================================================================

/**
 * Outermost first: retry, then the breaker, then the per-attempt timeout.
 * The breaker counts timed-out attempts; retrying stops once it opens.
 */
export function createResiliencePolicies(config: ResilienceConfig): ResiliencePolicies {
  const { label, handles, attemptTimeoutMs } = config;
  const policyFilter = handleWhen(handles);

  const breaker = circuitBreaker(policyFilter, {
    halfOpenAfter: config.breaker?.halfOpenAfterMs ?? 30_000,
    breaker: new ConsecutiveBreaker(config.breaker?.threshold ?? 5),
  });

  breaker.onStateChange((state) => {
    const level = state === CircuitState.Closed ? 'info' : 'warn';
    logger.log(level, `[${label}] Circuit ${CIRCUIT_STATE_NAMES[state]}`, { circuitState: state });
  });

  const retryPolicy = retry(policyFilter, {
    maxAttempts: config.retry?.attempts ?? 2,
    backoff: new ExponentialBackoff({
      initialDelay: config.retry?.initialDelayMs ?? 500,
      maxDelay: config.retry?.maxDelayMs ?? 5_000,
    }),
  });

  retryPolicy.onRetry((event) => {
    logger.warn(`[${label}] Retrying in ${Math.round(event.delay)}ms`, {
      error: 'error' in event ? event.error.message : undefined,
    });
  });

  const timeoutPolicy = timeout(attemptTimeoutMs, TimeoutStrategy.Aggressive);

  timeoutPolicy.onTimeout(() => {
    logger.warn(`[${label}] Attempt timed out after ${attemptTimeoutMs}ms`);
  });

  const combined = wrap(retryPolicy, breaker, timeoutPolicy);

  return {
    execute: (fn, signal) => combined.execute(({ signal: attemptSignal }) => fn(attemptSignal), signal),
  };
}

// ============================================================================
// Error Checks
// ============================================================================

export function isCircuitBreakerOpen(error: unknown): boolean {
  return error instanceof BrokenCircuitError;
}

/** Cockatiel's per-attempt timeout */
export function isTimeoutError(error: unknown): boolean {
  return error instanceof TaskCancelledError;
}
