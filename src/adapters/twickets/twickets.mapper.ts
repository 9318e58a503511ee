/**
 * Twickets Data Mapper
 * Transforms Twickets API responses to normalized listings
 */

import type {
  DeliveryMethod,
  Listing,
  ListingSummary,
} from '../base/feed-client.interface.js';
import type {
  TwicketsDeliveryPlan,
  TwicketsInventoryResponse,
  TwicketsListing,
} from './twickets.types.js';

const MEETUP_DELIVERY_CODE = 1;
const DEFAULT_CURRENCY = 'GBP';
const ELECTRONIC_TITLE = /e-?ticket|electronic|mobile|app|email|download|transfer/i;

// ============================================================================
// Feed Entries
// ============================================================================

/** A feed row before its inventory lookup */
export interface FeedEntry extends ListingSummary {
  currency: string;
  section: string;
  row: string;
  area: string;
  ticketType: string;
}

/**
 * Extract the inventory id from "<catalogue>@<inventoryId>"
 */
export function parseListingId(rawId: unknown): string | null {
  if (typeof rawId !== 'string' && typeof rawId !== 'number') {
    return null;
  }

  const text = String(rawId).trim();
  const at = text.indexOf('@');
  const id = at >= 0 ? text.slice(at + 1) : text;

  return id.length > 0 ? id : null;
}

function parseSeatCount(splits: TwicketsListing['splits']): number | null {
  const first = splits?.[0];
  if (first === undefined) return null;

  const count = typeof first === 'number' ? first : Number(first);
  return Number.isInteger(count) && count > 0 ? count : null;
}

function parsePrice(listing: TwicketsListing): { price: number | null; currency: string } {
  const first = listing.pricing?.prices?.[0];
  const pence = first?.netSellingPrice;

  return {
    price: typeof pence === 'number' && Number.isFinite(pence) && pence >= 0 ? pence / 100 : null,
    currency: first?.currencyCode?.toUpperCase() || DEFAULT_CURRENCY,
  };
}

/**
 * Map one feed row. Rows without a usable id cannot be deduplicated and
 * are dropped; every other missing field maps to null or ''.
 */
export function mapFeedEntry(listing: TwicketsListing): FeedEntry | null {
  const id = parseListingId(listing.id);
  if (!id) return null;

  const { price, currency } = parsePrice(listing);

  return {
    id,
    price,
    currency,
    seatCount: parseSeatCount(listing.splits),
    section: listing.section ?? '',
    row: listing.row ?? '',
    area: listing.area ?? '',
    ticketType: listing.type ?? '',
  };
}

export function mapFeedEntries(listings: TwicketsListing[]): FeedEntry[] {
  const entries: FeedEntry[] = [];
  for (const listing of listings) {
    const entry = mapFeedEntry(listing);
    if (entry) entries.push(entry);
  }
  return entries;
}

// ============================================================================
// Inventory
// ============================================================================

export interface InventoryDetails {
  available: boolean;
  blockId: string | null;
  deliveryMethod: DeliveryMethod;
}

/**
 * Any meetup option marks the listing as meetup; otherwise the plan
 * titles decide between electronic and other.
 */
export function mapDeliveryMethod(plans: TwicketsDeliveryPlan[] | undefined): DeliveryMethod {
  if (!plans?.length) return 'other';

  if (plans.some(plan => plan.deliveryMethod === MEETUP_DELIVERY_CODE)) {
    return 'meetup';
  }
  if (plans.some(plan => ELECTRONIC_TITLE.test(plan.title ?? ''))) {
    return 'electronic';
  }
  return 'other';
}

export function mapInventory(response: TwicketsInventoryResponse | null | undefined): InventoryDetails {
  const blockId = response?.block?.blockId;

  return {
    available: response?.available === true,
    blockId: typeof blockId === 'string' && blockId.length > 0 ? blockId : null,
    deliveryMethod: mapDeliveryMethod(response?.deliveryPlan),
  };
}

// ============================================================================
// Listing Assembly
// ============================================================================

export function toListing(
  entry: FeedEntry,
  purchaseUrl: string,
  deliveryMethod: DeliveryMethod | null,
  capturedAt: Date = new Date(),
): Listing {
  return {
    id: entry.id,
    price: entry.price,
    currency: entry.currency,
    seatCount: entry.seatCount,
    deliveryMethod,
    purchaseUrl,
    section: entry.section,
    row: entry.row,
    area: entry.area,
    ticketType: entry.ticketType,
    capturedAt,
  };
}
