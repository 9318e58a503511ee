/**
 * Feed Error Taxonomy
 * Every failure from the session and feed layers is converted into one of
 * these before it reaches the monitoring loop.
 */

import axios from 'axios';
import { isCircuitBreakerOpen, isTimeoutError } from './circuit-breaker.js';

export type FeedErrorKind = 'auth' | 'rate_limit' | 'transient' | 'invalid_event';

export type FeedOperation = 'login' | 'listings' | 'inventory' | 'webhook';

export class FeedError extends Error {
  readonly kind: FeedErrorKind;

  constructor(kind: FeedErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

/** Credential rejected by the marketplace */
export class AuthError extends FeedError {
  constructor(message = 'Credential rejected', options?: ErrorOptions) {
    super('auth', message, options);
  }
}

/** Throttled; retryAfterMs is the server's hint, when it gave one */
export class RateLimitError extends FeedError {
  readonly retryAfterMs: number | null;

  constructor(message = 'Rate limit exceeded', retryAfterMs: number | null = null, options?: ErrorOptions) {
    super('rate_limit', message, options);
    this.retryAfterMs = retryAfterMs;
  }
}

/** Network fault, timeout, 5xx or open circuit */
export class TransientError extends FeedError {
  constructor(message: string, options?: ErrorOptions) {
    super('transient', message, options);
  }
}

/** The configured event does not exist */
export class InvalidEventError extends FeedError {
  readonly eventId: string;

  constructor(eventId: string, options?: ErrorOptions) {
    super('invalid_event', `Event ${eventId} not found`, options);
    this.eventId = eventId;
  }
}

export type SessionFailure = 'rejected' | 'locked' | 'second_factor' | 'no_token';

/** Login refused for a reason retrying will not fix */
export class SessionError extends Error {
  readonly reason: SessionFailure;

  constructor(reason: SessionFailure, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SessionError';
    this.reason = reason;
  }
}

// ============================================================================
// Classification
// ============================================================================

/**
 * Parse a Retry-After header (delta seconds or HTTP date) into ms
 */
export function parseRetryAfter(value: unknown, now: number = Date.now()): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return Math.max(0, value * 1000);
  }
  if (typeof value !== 'string' || value.trim() === '') {
    return null;
  }

  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }

  const date = Date.parse(value);
  if (Number.isNaN(date)) {
    return null;
  }
  return Math.max(0, date - now);
}

export interface ErrorContext {
  platform: string;
  operation: FeedOperation;
  eventId?: string;
}

/**
 * Map an HTTP, resilience-policy or unknown failure onto the taxonomy.
 * Cancellations caused by the caller's own AbortSignal are returned
 * unchanged so the loop can tell them apart from timeouts.
 */
export function toFeedError(error: unknown, context: ErrorContext): Error {
  const label = `${context.platform} ${context.operation}`;

  if (error instanceof FeedError || error instanceof SessionError) {
    return error;
  }

  if (isTimeoutError(error)) {
    return new TransientError(`${label} timed out`, { cause: error });
  }

  if (isCircuitBreakerOpen(error)) {
    return new TransientError(`${label} circuit open - marketplace unavailable`, { cause: error });
  }

  if (axios.isAxiosError(error)) {
    if (error.code === 'ERR_CANCELED') {
      return error;
    }

    if (error.response) {
      const status = error.response.status;

      if (status === 401 || status === 403) {
        return new AuthError(`${label} rejected credential (${status})`, { cause: error });
      }

      if (status === 429) {
        return new RateLimitError(
          `${label} rate limited`,
          parseRetryAfter(error.response.headers['retry-after']),
          { cause: error },
        );
      }

      if (status === 404 && context.operation === 'listings' && context.eventId) {
        return new InvalidEventError(context.eventId, { cause: error });
      }

      if (status >= 500) {
        return new TransientError(`${label} server error: ${status}`, { cause: error });
      }

      return new TransientError(
        `${label} unexpected response: ${status} ${error.response.statusText}`.trim(),
        { cause: error },
      );
    }

    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new TransientError(`${label} request timed out`, { cause: error });
    }

    return new TransientError(`${label} network error: ${error.message}`, { cause: error });
  }

  if (error instanceof Error) {
    return error;
  }

  return new Error(`${label} unknown error: ${String(error)}`);
}

/**
 * Failures the resilience policies are allowed to retry
 */
export function isTransientFailure(error: unknown): boolean {
  return error instanceof TransientError || isTimeoutError(error);
}
