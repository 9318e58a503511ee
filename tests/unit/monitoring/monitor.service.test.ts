/**
 * Monitor Service Unit Tests
 * Drives the loop with a scripted feed, real session/ledger/dispatcher
 * and a sleep stub that records delays.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  MonitorService,
  type MonitorConfig,
} from '../../../src/services/monitoring/monitor.service.js';
import { SessionProvider } from '../../../src/services/session/session-provider.js';
import { DedupLedger } from '../../../src/services/dedup/dedup-ledger.js';
import { ActionDispatcher } from '../../../src/services/dispatch/action-dispatcher.js';
import {
  AuthError,
  InvalidEventError,
  RateLimitError,
  SessionError,
  TransientError,
} from '../../../src/adapters/base/feed-errors.js';
import {
  AlertType,
  type AlertPayload,
  type INotifier,
  type NotificationChannel,
} from '../../../src/notifications/base/notifier.interface.js';
import type { Listing } from '../../../src/adapters/base/feed-client.interface.js';
import { AbortedError, type SleepFn } from '../../../src/utils/sleep.js';
import { logger } from '../../../src/utils/logger.js';
import { MockFeedClient } from '../../mocks/mock-feed-client.js';
import { MockAuthenticator } from '../../mocks/mock-authenticator.js';
import { MockNotifier } from '../../mocks/mock-notifier.js';
import { MockPurchaseAssist } from '../../mocks/mock-purchase-assist.js';
import { BASE_URL, EVENT_ID, deferred, makeFilter, makeListing } from '../../mocks/fixtures.js';

vi.mock('../../../src/utils/logger.js', () => ({
  logger: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const MONITOR_CONFIG: Pick<MonitorConfig, 'eventId'> & Partial<MonitorConfig> = {
  eventId: EVENT_ID,
  cadenceMs: 2_000,
  maxBackoffMs: 60_000,
  escalateAfterFailures: 3,
};

/** Sleep that waits until the loop is aborted */
const blockingSleep: SleepFn = (_ms, signal) =>
  new Promise<void>((_resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortedError());
      return;
    }
    signal?.addEventListener('abort', () => reject(new AbortedError()), { once: true });
  });

function alertsOf(notifier: MockNotifier, type: AlertType): AlertPayload[] {
  return notifier.sentAlerts.filter(alert => alert.alertType === type);
}

describe('MonitorService', () => {
  let feed: MockFeedClient;
  let auth: MockAuthenticator;
  let ledger: DedupLedger;
  let notifier: MockNotifier;
  let assist: MockPurchaseAssist;
  let delays: number[];
  let stopAfterSleeps: number;
  let monitor: MonitorService;

  const recordingSleep = vi.fn(async (ms: number): Promise<void> => {
    delays.push(ms);
    if (delays.length >= stopAfterSleeps) {
      monitor.stop();
    }
  });

  function createMonitor(sleep: SleepFn = recordingSleep, channel: INotifier = notifier): MonitorService {
    return new MonitorService(MONITOR_CONFIG, {
      session: new SessionProvider(auth, { user: 'test-user', password: 'test-secret' }),
      feed,
      ledger,
      dispatcher: new ActionDispatcher(
        new Map<NotificationChannel, INotifier>([['discord', channel]]),
        assist,
        EVENT_ID,
      ),
      filter: makeFilter(),
      sleep,
      random: () => 0,
    });
  }

  beforeEach(() => {
    feed = new MockFeedClient();
    auth = new MockAuthenticator();
    ledger = new DedupLedger();
    notifier = new MockNotifier();
    assist = new MockPurchaseAssist();
    delays = [];
    stopAfterSleeps = 1;
    vi.clearAllMocks();
    monitor = createMonitor();
  });

  // ==========================================================================
  // Poll Cycle
  // ==========================================================================

  describe('pollOnce', () => {
    it('dispatches matches in feed order', async () => {
      feed.enqueue([
        makeListing({ id: 'A', seatCount: 6 }),
        makeListing({ id: 'B' }),
        makeListing({ id: 'C', price: 20 }),
      ]);

      const result = await monitor.pollOnce();

      expect(result).toMatchObject({ listingsSeen: 3, matched: 2, dispatched: 2 });
      expect(assist.presented.map(p => p.listingId)).toEqual(['B', 'C']);
      expect(
        alertsOf(notifier, AlertType.LISTING_FOUND).map(alert =>
          alert.alertType === AlertType.LISTING_FOUND ? alert.listing.id : null,
        ),
      ).toEqual(['B', 'C']);
    });

    it('finishes each dispatch before starting the next', async () => {
      const slowB = deferred();
      const delivered: string[] = [];
      const channel: INotifier = {
        channel: 'discord',
        initialize: async () => undefined,
        sendAlert: async (payload) => {
          if (payload.alertType === AlertType.LISTING_FOUND) {
            if (payload.listing.id === 'B') await slowB.promise;
            delivered.push(payload.listing.id);
          }
          return { success: true, channel: 'discord', timestamp: new Date(), deliveryStatus: 'delivered' };
        },
      };
      monitor = createMonitor(recordingSleep, channel);
      feed.enqueue([
        makeListing({ id: 'A', seatCount: 9 }),
        makeListing({ id: 'B' }),
        makeListing({ id: 'C' }),
      ]);

      const cycle = monitor.pollOnce();

      await vi.waitFor(() => expect(assist.presented).toHaveLength(1));
      expect(delivered).toEqual([]);
      expect(assist.presented.map(p => p.listingId)).toEqual(['B']);

      slowB.resolve();
      await expect(cycle).resolves.toMatchObject({ matched: 2, dispatched: 2 });
      expect(delivered).toEqual(['B', 'C']);
      expect(assist.presented.map(p => p.listingId)).toEqual(['B', 'C']);
    });

    it('does not dispatch a listing seen in an earlier cycle', async () => {
      const feedPage = [makeListing({ id: 'B' }), makeListing({ id: 'C' })];
      feed.enqueue(feedPage, feedPage);

      await monitor.pollOnce();
      const second = await monitor.pollOnce();

      expect(second).toMatchObject({ listingsSeen: 2, matched: 0, dispatched: 0 });
      expect(assist.presented).toHaveLength(2);
      expect(ledger.size).toBe(2);
    });

    it('dispatches a listing once even if the feed repeats it in one page', async () => {
      feed.enqueue([makeListing({ id: 'B' }), makeListing({ id: 'B' })]);

      const result = await monitor.pollOnce();

      expect(result.dispatched).toBe(1);
      expect(assist.presented).toHaveLength(1);
    });

    it('skips meetup and over-priced listings', async () => {
      feed.enqueue([
        makeListing({ id: 'meet', deliveryMethod: 'meetup' }),
        makeListing({ id: 'dear', price: 80 }),
      ]);

      const result = await monitor.pollOnce();

      expect(result).toMatchObject({ listingsSeen: 2, matched: 0, dispatched: 0 });
      expect(ledger.size).toBe(0);
    });

    it('prefilters known and out-of-range entries', async () => {
      feed.enqueue([makeListing({ id: 'B' })]);

      await monitor.pollOnce();
      await monitor.pollOnce();

      const prefilter = feed.calls[1]?.options.prefilter;
      expect(prefilter?.({ id: 'B', price: 45, seatCount: 2 })).toBe(false);
      expect(prefilter?.({ id: 'D', price: 45, seatCount: 2 })).toBe(true);
      expect(prefilter?.({ id: 'E', price: 45, seatCount: 6 })).toBe(false);
      expect(prefilter?.({ id: 'F', price: 99, seatCount: 2 })).toBe(false);
    });

    it('re-authenticates once when the credential is rejected', async () => {
      feed.enqueue(new AuthError(), [makeListing({ id: 'B' })]);

      const result = await monitor.pollOnce();

      expect(result.dispatched).toBe(1);
      expect(auth.logins).toHaveLength(2);
      expect(feed.calls.map(call => call.credential.token)).toEqual(['token-1', 'token-2']);
    });

    it('propagates a second rejection', async () => {
      feed.enqueue(new AuthError(), new AuthError('still rejected'));

      await expect(monitor.pollOnce()).rejects.toThrow('still rejected');
      expect(auth.logins).toHaveLength(2);
    });

    it('reuses the session across cycles', async () => {
      await monitor.pollOnce();
      await monitor.pollOnce();

      expect(auth.logins).toHaveLength(1);
      expect(feed.calls).toHaveLength(2);
    });

    it('waits for dispatches to finish before completing the cycle', async () => {
      const gate = deferred();
      assist.holdUntil(gate.promise);
      feed.enqueue([makeListing({ id: 'B' })]);

      let done = false;
      const cycle = monitor.pollOnce().then(() => {
        done = true;
      });

      await vi.waitFor(() => expect(assist.presented).toHaveLength(1));
      expect(done).toBe(false);

      gate.resolve();
      await cycle;
      expect(done).toBe(true);
    });

    it('counts a failed side effect without failing the cycle', async () => {
      assist.setThrow('no browser');
      feed.enqueue([makeListing({ id: 'B' })]);

      const result = await monitor.pollOnce();

      expect(result.reports[0]?.errors).toHaveLength(1);
      expect(monitor.getStatus()).toMatchObject({ dispatches: 1, dispatchFailures: 1 });
    });
  });

  // ==========================================================================
  // Loop
  // ==========================================================================

  describe('run', () => {
    it('announces start and stop', async () => {
      const outcome = await monitor.run();

      expect(outcome).toEqual({ status: 'stopped' });
      expect(notifier.sentAlerts[0]).toEqual({
        alertType: AlertType.MONITOR_STARTED,
        eventId: EVENT_ID,
        eventUrl: `${BASE_URL}/event/${EVENT_ID}`,
      });
      expect(notifier.sentAlerts.at(-1)).toEqual({
        alertType: AlertType.MONITOR_STOPPED,
        eventId: EVENT_ID,
        reason: 'shutdown requested',
        fatal: false,
      });
    });

    it('sleeps the cadence between successful polls', async () => {
      stopAfterSleeps = 3;

      await monitor.run();

      expect(delays).toEqual([2_000, 2_000, 2_000]);
      expect(feed.calls).toHaveLength(3);
    });

    it('backs off longer than the cadence after a rate limit', async () => {
      stopAfterSleeps = 2;
      feed.enqueue(new RateLimitError());

      await monitor.run();

      expect(delays).toEqual([4_000, 2_000]);
      expect(ledger.size).toBe(0);
      expect(assist.presented).toEqual([]);
      expect(alertsOf(notifier, AlertType.LISTING_FOUND)).toEqual([]);
    });

    it('honours Retry-After', async () => {
      feed.enqueue(new RateLimitError('Rate limit exceeded', 30_000));

      await monitor.run();

      expect(delays).toEqual([30_000]);
    });

    it('grows the backoff and resets it after a success', async () => {
      stopAfterSleeps = 4;
      feed.enqueue(new TransientError('timeout'), new TransientError('timeout'), [], new TransientError('timeout'));

      await monitor.run();

      expect(delays).toEqual([4_000, 8_000, 2_000, 4_000]);
      expect(monitor.getStatus()).toMatchObject({ consecutiveFailures: 1, lastError: 'timeout' });
    });

    it('backs off on an unclassified error', async () => {
      stopAfterSleeps = 2;
      feed.enqueue(new Error('boom'));

      const outcome = await monitor.run();

      expect(outcome).toEqual({ status: 'stopped' });
      expect(delays).toEqual([4_000, 2_000]);
    });

    it('logs failures outside the feed error types with their stack', async () => {
      feed.enqueue(new TypeError('bad payload'), new TransientError('timeout'));
      stopAfterSleeps = 2;

      await monitor.run();

      expect(logger.error).toHaveBeenCalledWith(
        '[Monitor] Unexpected poll failure, backing off',
        expect.objectContaining({ error: 'bad payload', stack: expect.stringContaining('TypeError: bad payload') }),
      );
      expect(logger.warn).toHaveBeenCalledWith('[Monitor] Poll failed, backing off 8000ms', {
        consecutiveFailures: 2,
        delay: 8_000,
        error: 'timeout',
      });
    });

    it('backs off when login fails transiently', async () => {
      stopAfterSleeps = 2;
      auth.failWith(new TransientError('login timed out'));

      await monitor.run();

      expect(delays).toEqual([4_000, 2_000]);
      expect(auth.logins).toHaveLength(2);
      expect(feed.calls).toHaveLength(1);
    });

    it('raises the degraded alert once per failure streak', async () => {
      stopAfterSleeps = 6;
      feed.enqueue(
        new TransientError('down'),
        new TransientError('down'),
        new TransientError('down'),
        new TransientError('down'),
        [],
        new TransientError('down'),
      );

      await monitor.run();

      expect(alertsOf(notifier, AlertType.MONITOR_DEGRADED)).toEqual([
        {
          alertType: AlertType.MONITOR_DEGRADED,
          eventId: EVENT_ID,
          consecutiveFailures: 3,
          lastError: 'down',
        },
      ]);
      expect(delays).toEqual([4_000, 8_000, 16_000, 32_000, 2_000, 4_000]);
    });

    it('stops fatally when the credential is rejected after re-login', async () => {
      feed.enqueue(new AuthError(), new AuthError());

      const outcome = await monitor.run();

      expect(outcome).toEqual({
        status: 'fatal',
        reason: 'auth',
        message: 'authentication failed - check credentials',
      });
      expect(recordingSleep).not.toHaveBeenCalled();
      expect(feed.calls).toHaveLength(2);
      expect(auth.logins).toHaveLength(2);
      expect(monitor.getStatus().state).toBe('fatal');
      expect(notifier.sentAlerts.at(-1)).toEqual({
        alertType: AlertType.MONITOR_STOPPED,
        eventId: EVENT_ID,
        reason: 'authentication failed - check credentials',
        fatal: true,
      });
    });

    it('stops fatally when login is refused', async () => {
      auth.failWith(new SessionError('rejected', 'Login rejected'));

      const outcome = await monitor.run();

      expect(outcome).toMatchObject({ status: 'fatal', reason: 'auth' });
      expect(feed.calls).toHaveLength(0);
    });

    it('stops fatally when the event does not exist', async () => {
      feed.enqueue(new InvalidEventError(EVENT_ID));

      const outcome = await monitor.run();

      expect(outcome).toEqual({
        status: 'fatal',
        reason: 'invalid_event',
        message: 'event not found - check event id',
      });
    });

    it('refuses to run twice at once', async () => {
      monitor = createMonitor(blockingSleep);
      const running = monitor.run();

      await expect(monitor.run()).rejects.toThrow('Monitor is already running');

      monitor.stop();
      await expect(running).resolves.toEqual({ status: 'stopped' });
    });

    it('stops during a sleep when the external signal aborts', async () => {
      monitor = createMonitor(blockingSleep);
      const controller = new AbortController();

      const running = monitor.run(controller.signal);
      await vi.waitFor(() => expect(feed.calls).toHaveLength(1));
      controller.abort();

      await expect(running).resolves.toEqual({ status: 'stopped' });
      expect(monitor.getStatus().state).toBe('stopped');
    });

    it('interrupts an in-flight fetch on stop', async () => {
      feed.enqueue((_credential, options) =>
        new Promise<Listing[]>((_resolve, reject) => {
          options.signal?.addEventListener('abort', () => reject(new TransientError('request aborted')), {
            once: true,
          });
        }),
      );

      const running = monitor.run();
      await vi.waitFor(() => expect(feed.calls).toHaveLength(1));
      expect(feed.calls[0]?.options.signal?.aborted).toBe(false);
      monitor.stop();

      await expect(running).resolves.toEqual({ status: 'stopped' });
      expect(recordingSleep).not.toHaveBeenCalled();
      expect(alertsOf(notifier, AlertType.MONITOR_DEGRADED)).toEqual([]);
      expect(monitor.getStatus()).toMatchObject({ state: 'stopped', consecutiveFailures: 0 });
    });

    it('does not poll when started with an aborted signal', async () => {
      const controller = new AbortController();
      controller.abort();

      const outcome = await monitor.run(controller.signal);

      expect(outcome).toEqual({ status: 'stopped' });
      expect(feed.calls).toHaveLength(0);
    });
  });

  // ==========================================================================
  // Status
  // ==========================================================================

  describe('getStatus', () => {
    it('starts idle', () => {
      expect(monitor.getStatus()).toMatchObject({
        state: 'idle',
        eventId: EVENT_ID,
        startedAt: null,
        cycles: 0,
        ledgerSize: 0,
        logins: 0,
      });
    });

    it('accumulates counters across cycles', async () => {
      stopAfterSleeps = 2;
      feed.enqueue(
        [makeListing({ id: 'A', seatCount: 6 }), makeListing({ id: 'B' })],
        [makeListing({ id: 'B' }), makeListing({ id: 'C' })],
      );

      await monitor.run();

      expect(monitor.getStatus()).toMatchObject({
        state: 'stopped',
        cycles: 2,
        listingsSeen: 4,
        matches: 2,
        dispatches: 2,
        dispatchFailures: 0,
        consecutiveFailures: 0,
        lastError: null,
        ledgerSize: 2,
        logins: 1,
      });
      expect(monitor.getStatus().startedAt).toBeInstanceOf(Date);
    });
  });
});
