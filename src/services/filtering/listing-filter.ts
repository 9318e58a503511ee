/**
 * Listing Filter
 * Pure predicate deciding whether a listing meets the user's constraints
 */

import type { Listing, ListingSummary } from '../../adapters/base/feed-client.interface.js';

export interface FilterConfig {
  /** Inclusive lower bound on tickets in the offer */
  readonly minSeats: number;
  /** Inclusive upper bound on tickets in the offer */
  readonly maxSeats: number;
  /** Inclusive per-ticket price cap; null = unbounded */
  readonly maxPrice: number | null;
  readonly skipMeetupDelivery: boolean;
}

export type FilterRejection =
  | 'missing_field'
  | 'seats_below_min'
  | 'seats_above_max'
  | 'price_above_max'
  | 'meetup_delivery';

export type FilterVerdict =
  | { matched: true }
  | { matched: false; reason: FilterRejection; detail: string };

type FilterableListing = Pick<Listing, 'price' | 'seatCount' | 'deliveryMethod'>;

const DELIVERY_METHODS = new Set(['electronic', 'meetup', 'other']);

function reject(reason: FilterRejection, detail: string): FilterVerdict {
  return { matched: false, reason, detail };
}

/**
 * Evaluate every configured condition and name the first one that fails.
 * A missing or malformed field fails closed.
 */
export function evaluateListing(listing: FilterableListing, filter: FilterConfig): FilterVerdict {
  const { seatCount, price, deliveryMethod } = listing;

  if (typeof seatCount !== 'number' || !Number.isInteger(seatCount) || seatCount < 1) {
    return reject('missing_field', 'seat count unknown');
  }
  if (typeof price !== 'number' || !Number.isFinite(price) || price < 0) {
    return reject('missing_field', 'price unknown');
  }
  if (seatCount < filter.minSeats) {
    return reject('seats_below_min', `too few seats (${seatCount})`);
  }
  if (seatCount > filter.maxSeats) {
    return reject('seats_above_max', `too many seats (${seatCount})`);
  }
  if (filter.maxPrice !== null && price > filter.maxPrice) {
    return reject('price_above_max', `price too high (${price})`);
  }
  if (filter.skipMeetupDelivery && (deliveryMethod === null || !DELIVERY_METHODS.has(deliveryMethod))) {
    return reject('missing_field', 'delivery method unknown');
  }
  if (filter.skipMeetupDelivery && deliveryMethod === 'meetup') {
    return reject('meetup_delivery', 'meetup delivery');
  }

  return { matched: true };
}

export function matches(listing: FilterableListing, filter: FilterConfig): boolean {
  return evaluateListing(listing, filter).matched;
}

/**
 * The seat and price conditions alone, for deciding whether a feed entry
 * is worth a delivery lookup
 */
export function passesPrefilter(summary: ListingSummary, filter: FilterConfig): boolean {
  return evaluateListing(
    { price: summary.price, seatCount: summary.seatCount, deliveryMethod: 'other' },
    filter,
  ).matched;
}
