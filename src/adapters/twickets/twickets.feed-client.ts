/**
 * Twickets Feed Client
 * Implements IFeedClient for the Twickets listing feed and inventory endpoints
 */

import type { AxiosInstance } from 'axios';
import type {
  Credential,
  FetchOptions,
  IFeedClient,
  Listing,
  MarketplaceConfig,
} from '../base/feed-client.interface.js';
import { createResiliencePolicies, type ResiliencePolicies } from '../base/circuit-breaker.js';
import {
  InvalidEventError,
  TransientError,
  isTransientFailure,
  toFeedError,
} from '../base/feed-errors.js';
import { SpacingGate } from '../../utils/rate-limiter.js';
import { generateDeepLink } from '../../utils/deep-link-generator.js';
import { logger, logAdapterOperation } from '../../utils/logger.js';
import {
  PLATFORM_NAME,
  authHeaders,
  createTwicketsHttpClient,
  withErrorMapping,
  type TwicketsClientDeps,
} from './twickets.http.js';
import {
  mapFeedEntries,
  mapInventory,
  toListing,
  type FeedEntry,
  type InventoryDetails,
} from './twickets.mapper.js';
import type {
  TwicketsInventoryResponse,
  TwicketsListingsResponse,
} from './twickets.types.js';

// ============================================================================
// Twickets Feed Client Implementation
// ============================================================================

export class TwicketsFeedClient implements IFeedClient {
  readonly config: MarketplaceConfig;

  private client: AxiosInstance;
  private rateLimiter: SpacingGate;
  private resilience: ResiliencePolicies;
  private now: () => Date;

  constructor(config: MarketplaceConfig, deps: TwicketsClientDeps = {}) {
    this.config = config;
    this.now = deps.now ?? (() => new Date());

    this.resilience = createResiliencePolicies({
      label: PLATFORM_NAME,
      handles: isTransientFailure,
      attemptTimeoutMs: config.timeout,
      retry: { attempts: config.retryAttempts, initialDelayMs: config.retryDelay },
    });

    // One fetch() at a time through the gate; the lookups inside a
    // fetch() are not spaced.
    this.rateLimiter = new SpacingGate(config.minRequestSpacing);

    this.client = createTwicketsHttpClient(config, deps.adapter);
  }

  eventUrl(eventId: string): string {
    return generateDeepLink(this.config.baseUrl, { kind: 'event', eventId });
  }

  // ==========================================================================
  // Event Listings
  // ==========================================================================

  async fetch(
    eventId: string,
    credential: Credential,
    options: FetchOptions = {},
  ): Promise<Listing[]> {
    const { signal, prefilter } = options;
    await this.rateLimiter.acquire(signal);

    const startTime = Date.now();
    const capturedAt = this.now();

    try {
      const entries = await this.getFeedEntries(eventId, credential, signal);
      const listings: Listing[] = [];
      let lookups = 0;

      for (const entry of entries) {
        if (prefilter && !prefilter(entry)) {
          listings.push(toListing(entry, this.eventUrl(eventId), null, capturedAt));
          continue;
        }

        lookups++;
        const details = await this.lookupInventory(entry, credential, signal);
        const listing = details && this.resolveListing(entry, details, capturedAt);
        if (listing) listings.push(listing);
      }

      logAdapterOperation(PLATFORM_NAME, 'get_listings', startTime, true, {
        eventId,
        feedEntries: entries.length,
        lookups,
        listingsFound: listings.length,
      });

      return listings;
    } catch (error) {
      logAdapterOperation(PLATFORM_NAME, 'get_listings', startTime, false, {
        eventId,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      throw toFeedError(error, { platform: PLATFORM_NAME, operation: 'listings', eventId });
    }
  }

  private async getFeedEntries(
    eventId: string,
    credential: Credential,
    signal?: AbortSignal,
  ): Promise<FeedEntry[]> {
    const context = { platform: PLATFORM_NAME, operation: 'listings', eventId } as const;

    const response = await this.resilience.execute(
      (attemptSignal) => withErrorMapping(context, () =>
        this.client.get<TwicketsListingsResponse>(
          `/services/g2/inventory/listings/${encodeURIComponent(eventId)}`,
          {
            params: { api_key: this.config.apiKey },
            headers: authHeaders(credential),
            signal: attemptSignal,
          },
        ),
      ),
      signal,
    );

    const body = response.data;
    if (body?.responseCode === 404) {
      throw new InvalidEventError(eventId);
    }

    const rows = body?.responseData;
    return mapFeedEntries(Array.isArray(rows) ? rows : []);
  }

  // ==========================================================================
  // Inventory Lookup
  // ==========================================================================

  /**
   * Returns null when the lookup failed transiently; the entry is then
   * left out of this cycle and looked at again on the next one.
   */
  private async lookupInventory(
    entry: FeedEntry,
    credential: Credential,
    signal?: AbortSignal,
  ): Promise<InventoryDetails | null> {
    const context = { platform: PLATFORM_NAME, operation: 'inventory' } as const;

    try {
      const response = await this.resilience.execute(
        (attemptSignal) => withErrorMapping(context, () =>
          this.client.get<TwicketsInventoryResponse>(
            `/services/inventory/${encodeURIComponent(entry.id)}`,
            {
              params: { api_key: this.config.apiKey, qty: entry.seatCount ?? 1 },
              headers: authHeaders(credential),
              signal: attemptSignal,
              // A withdrawn listing answers 404
              validateStatus: status => (status >= 200 && status < 300) || status === 404,
            },
          ),
        ),
        signal,
      );

      return mapInventory(response.status === 404 ? null : response.data);
    } catch (error) {
      const mapped = toFeedError(error, context);
      if (signal?.aborted || !(mapped instanceof TransientError)) {
        throw mapped;
      }

      logger.warn(`[Twickets] Inventory lookup failed for ${entry.id}, will retry next cycle`, {
        listingId: entry.id,
        error: mapped.message,
      });
      return null;
    }
  }

  private resolveListing(
    entry: FeedEntry,
    details: InventoryDetails,
    capturedAt: Date,
  ): Listing | null {
    if (!details.available) {
      logger.debug(`[Twickets] Listing ${entry.id} no longer available`);
      return null;
    }

    if (!details.blockId) {
      logger.warn(`[Twickets] No block information for listing ${entry.id}`, {
        listingId: entry.id,
        section: entry.section,
      });
      return null;
    }

    const purchaseUrl = generateDeepLink(this.config.baseUrl, {
      kind: 'block',
      blockId: details.blockId,
      quantity: entry.seatCount ?? 1,
    });

    return toListing(entry, purchaseUrl, details.deliveryMethod, capturedAt);
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  dispose(): void {
    this.rateLimiter.dispose();
  }
}
