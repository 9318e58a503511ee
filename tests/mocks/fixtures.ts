/**
 * Test Fixtures
 * Shared fake data for all tests: listings, filters, configs and raw feed rows.
 */

import type { Listing, MarketplaceConfig } from '../../src/adapters/base/feed-client.interface.js';
import type { FilterConfig } from '../../src/services/filtering/listing-filter.js';
import type { TwicketsListing } from '../../src/adapters/twickets/twickets.types.js';

export const BASE_URL = 'https://tickets.example.test';
export const EVENT_ID = '1234567';

// ============================================================================
// Configuration
// ============================================================================

export function makeMarketplaceConfig(overrides: Partial<MarketplaceConfig> = {}): MarketplaceConfig {
  return {
    name: 'twickets',
    baseUrl: BASE_URL,
    apiKey: 'test-api-key',
    userAgent: 'ticket-sentinel-tests',
    timeout: 1_000,
    retryAttempts: 0,
    retryDelay: 1,
    minRequestSpacing: 0,
    ...overrides,
  };
}

export function makeFilter(overrides: Partial<FilterConfig> = {}): FilterConfig {
  return {
    minSeats: 1,
    maxSeats: 4,
    maxPrice: 50,
    skipMeetupDelivery: true,
    ...overrides,
  };
}

// ============================================================================
// Listings
// ============================================================================

export function makeListing(overrides: Partial<Listing> = {}): Listing {
  const id = overrides.id ?? 'lst-001';
  return {
    id,
    price: 45,
    currency: 'GBP',
    seatCount: 2,
    deliveryMethod: 'electronic',
    purchaseUrl: `${BASE_URL}/app/block/blk-${id},2`,
    section: 'Block A',
    row: 'F',
    area: 'Standing',
    ticketType: 'General Admission',
    capturedAt: new Date('2026-03-01T12:00:00Z'),
    ...overrides,
  };
}

// ============================================================================
// Raw Feed Rows
// ============================================================================

export function makeFeedRow(
  id: string,
  overrides: { pence?: number; seats?: number; currency?: string } = {},
): TwicketsListing {
  return {
    id: `catalogue@${id}`,
    splits: [String(overrides.seats ?? 2)],
    pricing: {
      prices: [{ netSellingPrice: overrides.pence ?? 4500, currencyCode: overrides.currency ?? 'gbp' }],
    },
    section: 'Block A',
    row: 'F',
    area: 'Standing',
    type: 'General Admission',
  };
}

/** A promise plus the function that resolves it */
export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>(r => {
    resolve = r;
  });
  return { promise, resolve };
}
