/**
 * Monitoring Service
 * Polls one event's listing feed, filters and deduplicates what it sees,
 * and hands each new match to the action dispatcher.
 */

import type {
  Credential,
  FetchOptions,
  IFeedClient,
  Listing,
} from '../../adapters/base/feed-client.interface.js';
import {
  AuthError,
  FeedError,
  InvalidEventError,
  RateLimitError,
  SessionError,
} from '../../adapters/base/feed-errors.js';
import { AlertType } from '../../notifications/base/notifier.interface.js';
import type { IActionDispatcher, DispatchReport } from '../dispatch/action-dispatcher.js';
import type { IListingLedger } from '../dedup/dedup-ledger.js';
import { evaluateListing, passesPrefilter, type FilterConfig } from '../filtering/listing-filter.js';
import type { ISessionProvider } from '../session/session.types.js';
import { AbortedError, sleep as defaultSleep, type SleepFn } from '../../utils/sleep.js';
import { logger } from '../../utils/logger.js';
import { computeBackoffDelay, jitteredCadence, type RandomFn } from './backoff.js';

// ============================================================================
// Types
// ============================================================================

export type MonitorState = 'idle' | 'polling' | 'success' | 'backoff' | 'fatal' | 'stopped';

export type FatalReason = 'auth' | 'invalid_event';

export type MonitorOutcome =
  | { status: 'stopped' }
  | { status: 'fatal'; reason: FatalReason; message: string };

export interface MonitorConfig {
  eventId: string;
  /** Delay between successful polls in ms */
  cadenceMs: number;
  /** Upper bound for failure backoff in ms */
  maxBackoffMs: number;
  /** Consecutive failures before a degraded alert is raised */
  escalateAfterFailures: number;
  /** Cadence is stretched by up to this fraction (default: 0.5) */
  jitterRatio: number;
}

export interface MonitorDeps {
  session: ISessionProvider;
  feed: IFeedClient;
  ledger: IListingLedger;
  dispatcher: IActionDispatcher;
  filter: FilterConfig;
  sleep?: SleepFn;
  random?: RandomFn;
  now?: () => Date;
}

export interface CycleResult {
  listingsSeen: number;
  matched: number;
  dispatched: number;
  reports: DispatchReport[];
}

export interface MonitorStatus {
  state: MonitorState;
  eventId: string;
  startedAt: Date | null;
  cycles: number;
  listingsSeen: number;
  matches: number;
  dispatches: number;
  dispatchFailures: number;
  consecutiveFailures: number;
  lastError: string | null;
  ledgerSize: number;
  logins: number;
}

export const FATAL_MESSAGES: Record<FatalReason, string> = {
  auth: 'authentication failed - check credentials',
  invalid_event: 'event not found - check event id',
};

const DEFAULT_MONITOR_CONFIG: Omit<MonitorConfig, 'eventId'> = {
  cadenceMs: 2_000,
  maxBackoffMs: 60_000,
  escalateAfterFailures: 5,
  jitterRatio: 0.5,
};

// ============================================================================
// Monitor Service
// ============================================================================

export class MonitorService {
  private readonly monitorConfig: MonitorConfig;
  private readonly session: ISessionProvider;
  private readonly feed: IFeedClient;
  private readonly ledger: IListingLedger;
  private readonly dispatcher: IActionDispatcher;
  private readonly filter: FilterConfig;
  private readonly sleep: SleepFn;
  private readonly random: RandomFn;
  private readonly now: () => Date;

  // State
  private state: MonitorState = 'idle';
  private controller: AbortController | null = null;
  private startedAt: Date | null = null;
  private cycles = 0;
  private listingsSeen = 0;
  private matches = 0;
  private dispatches = 0;
  private dispatchFailures = 0;
  private consecutiveFailures = 0;
  private escalated = false;
  private lastError: string | null = null;

  constructor(
    monitorConfig: Pick<MonitorConfig, 'eventId'> & Partial<MonitorConfig>,
    deps: MonitorDeps,
  ) {
    this.monitorConfig = { ...DEFAULT_MONITOR_CONFIG, ...monitorConfig };
    this.session = deps.session;
    this.feed = deps.feed;
    this.ledger = deps.ledger;
    this.dispatcher = deps.dispatcher;
    this.filter = deps.filter;
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
    this.now = deps.now ?? (() => new Date());
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Poll until stopped or a fatal error. Resolves with how the run ended;
   * rejects only on a failure outside the polling cycle itself.
   */
  async run(signal?: AbortSignal): Promise<MonitorOutcome> {
    if (this.controller) {
      throw new Error('Monitor is already running');
    }

    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort();
    if (signal?.aborted) controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });

    this.controller = controller;
    this.startedAt = this.now();
    const { eventId } = this.monitorConfig;

    logger.info('[Monitor] Starting monitoring loop', {
      eventId,
      cadenceMs: this.monitorConfig.cadenceMs,
      filter: this.filter,
    });

    try {
      await this.dispatcher.broadcast({
        alertType: AlertType.MONITOR_STARTED,
        eventId,
        eventUrl: this.feed.eventUrl(eventId),
      });

      const outcome = await this.loop(controller.signal);

      await this.dispatcher.broadcast({
        alertType: AlertType.MONITOR_STOPPED,
        eventId,
        reason: outcome.status === 'fatal' ? outcome.message : 'shutdown requested',
        fatal: outcome.status === 'fatal',
      });

      return outcome;
    } finally {
      signal?.removeEventListener('abort', forwardAbort);
      this.controller = null;
    }
  }

  /**
   * Interrupt the current sleep or request; run() then resolves 'stopped'
   */
  stop(): void {
    if (!this.controller) return;

    logger.info('[Monitor] Stop requested');
    this.controller.abort();
  }

  private async loop(signal: AbortSignal): Promise<MonitorOutcome> {
    while (!signal.aborted) {
      let delay: number;

      try {
        await this.pollOnce(signal);
        delay = jitteredCadence(this.monitorConfig.cadenceMs, this.monitorConfig.jitterRatio, this.random);
      } catch (error) {
        if (signal.aborted) break;

        const fatal = this.classifyFatal(error);
        if (fatal) {
          this.state = 'fatal';
          this.lastError = error instanceof Error ? error.message : String(error);
          logger.error(`[Monitor] Fatal: ${FATAL_MESSAGES[fatal]}`, { error: this.lastError });
          return { status: 'fatal', reason: fatal, message: FATAL_MESSAGES[fatal] };
        }

        this.state = 'backoff';
        delay = await this.recordFailure(error);
      }

      try {
        await this.sleep(delay, signal);
      } catch (error) {
        if (error instanceof AbortedError) break;
        throw error;
      }
    }

    this.state = 'stopped';
    logger.info('[Monitor] Stopped', this.getStatus());
    return { status: 'stopped' };
  }

  // ==========================================================================
  // Poll Cycle
  // ==========================================================================

  /**
   * One fetch-filter-dispatch cycle. Feed, session and dispatch failures
   * propagate; the loop decides between backoff and fatal.
   */
  async pollOnce(signal?: AbortSignal): Promise<CycleResult> {
    this.state = 'polling';
    this.cycles++;

    const listings = await this.fetchListings(signal);
    const reports: DispatchReport[] = [];
    let matched = 0;
    let dispatched = 0;

    for (const listing of listings) {
      this.listingsSeen++;

      if (this.ledger.has(listing.id)) {
        continue;
      }

      const verdict = evaluateListing(listing, this.filter);
      if (!verdict.matched) {
        logger.debug(`[Monitor] Skipping listing ${listing.id}: ${verdict.detail}`, {
          listingId: listing.id,
          reason: verdict.reason,
        });
        continue;
      }

      matched++;
      if (!this.ledger.admit(listing.id)) {
        continue;
      }

      this.logMatch(listing);
      dispatched++;
      const report = await this.dispatchListing(listing);
      if (report) reports.push(report);
    }

    this.state = 'success';
    this.matches += matched;
    this.dispatches += dispatched;
    this.consecutiveFailures = 0;
    this.escalated = false;
    this.lastError = null;

    logger.debug(`[Monitor] Cycle ${this.cycles} complete`, {
      listings: listings.length,
      matched,
      dispatched,
    });

    return { listingsSeen: listings.length, matched, dispatched, reports };
  }

  /**
   * Fetch with the current credential; on rejection log in again and
   * fetch once more. A second AuthError propagates.
   */
  private async fetchListings(signal?: AbortSignal): Promise<Listing[]> {
    const { eventId } = this.monitorConfig;
    const options: FetchOptions = {
      signal,
      prefilter: summary => !this.ledger.has(summary.id) && passesPrefilter(summary, this.filter),
    };

    const credential: Credential = await this.session.acquire(signal);

    try {
      return await this.feed.fetch(eventId, credential, options);
    } catch (error) {
      if (!(error instanceof AuthError)) throw error;

      logger.warn('[Monitor] Credential rejected, re-authenticating');
      this.session.invalidate(credential);

      const fresh = await this.session.acquire(signal);
      return this.feed.fetch(eventId, fresh, options);
    }
  }

  /**
   * Completes before the next listing is dispatched, so alerts and opened
   * links follow feed order. A failure is counted, not thrown.
   */
  private async dispatchListing(listing: Listing): Promise<DispatchReport | null> {
    try {
      const report = await this.dispatcher.dispatch(listing);
      if (report.errors.length > 0) {
        this.dispatchFailures++;
      }
      return report;
    } catch (error) {
      this.dispatchFailures++;
      logger.error(`[Monitor] Dispatch failed for listing ${listing.id}`, {
        listingId: listing.id,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  private logMatch(listing: Listing): void {
    logger.info(`[Monitor] Match: listing ${listing.id}`, {
      listingId: listing.id,
      price: listing.price,
      currency: listing.currency,
      seats: listing.seatCount,
      delivery: listing.deliveryMethod,
      url: listing.purchaseUrl,
    });
  }

  // ==========================================================================
  // Failure Handling
  // ==========================================================================

  private classifyFatal(error: unknown): FatalReason | null {
    if (error instanceof AuthError || error instanceof SessionError) return 'auth';
    if (error instanceof InvalidEventError) return 'invalid_event';
    return null;
  }

  /**
   * Count the failure, raise the degraded alert once per streak and
   * return the delay before the next poll
   */
  private async recordFailure(error: unknown): Promise<number> {
    this.consecutiveFailures++;
    this.lastError = error instanceof Error ? error.message : String(error);

    const delay = computeBackoffDelay({
      cadenceMs: this.monitorConfig.cadenceMs,
      maxBackoffMs: this.monitorConfig.maxBackoffMs,
      failures: this.consecutiveFailures,
      retryAfterMs: error instanceof RateLimitError ? error.retryAfterMs : null,
    });

    const meta = {
      consecutiveFailures: this.consecutiveFailures,
      delay,
      error: this.lastError,
    };
    if (!(error instanceof FeedError)) {
      logger.error('[Monitor] Unexpected poll failure, backing off', {
        ...meta,
        stack: error instanceof Error ? error.stack : undefined,
      });
    } else {
      logger.warn(`[Monitor] Poll failed, backing off ${delay}ms`, meta);
    }

    if (this.consecutiveFailures >= this.monitorConfig.escalateAfterFailures && !this.escalated) {
      this.escalated = true;
      logger.error(`[Monitor] ${this.consecutiveFailures} consecutive failures`, meta);
      await this.dispatcher.broadcast({
        alertType: AlertType.MONITOR_DEGRADED,
        eventId: this.monitorConfig.eventId,
        consecutiveFailures: this.consecutiveFailures,
        lastError: this.lastError,
      });
    }

    return delay;
  }

  // ==========================================================================
  // Status
  // ==========================================================================

  getStatus(): MonitorStatus {
    return {
      state: this.state,
      eventId: this.monitorConfig.eventId,
      startedAt: this.startedAt,
      cycles: this.cycles,
      listingsSeen: this.listingsSeen,
      matches: this.matches,
      dispatches: this.dispatches,
      dispatchFailures: this.dispatchFailures,
      consecutiveFailures: this.consecutiveFailures,
      lastError: this.lastError,
      ledgerSize: this.ledger.size,
      logins: this.session.getLoginCount(),
    };
  }
}
