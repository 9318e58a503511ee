/**
 * Listing Filter Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  evaluateListing,
  matches,
  passesPrefilter,
} from '../../../src/services/filtering/listing-filter.js';
import { makeFilter, makeListing } from '../../mocks/fixtures.js';

describe('evaluateListing', () => {
  const filter = makeFilter({ minSeats: 2, maxSeats: 4, maxPrice: 50 });

  it('matches a listing inside every bound', () => {
    expect(evaluateListing(makeListing({ seatCount: 2, price: 45 }), filter)).toEqual({ matched: true });
  });

  it('treats both seat bounds and the price cap as inclusive', () => {
    expect(matches(makeListing({ seatCount: 2 }), filter)).toBe(true);
    expect(matches(makeListing({ seatCount: 4 }), filter)).toBe(true);
    expect(matches(makeListing({ price: 50 }), filter)).toBe(true);
  });

  it('names the seat bound that failed', () => {
    expect(evaluateListing(makeListing({ seatCount: 1 }), filter)).toEqual({
      matched: false,
      reason: 'seats_below_min',
      detail: 'too few seats (1)',
    });
    expect(evaluateListing(makeListing({ seatCount: 6 }), filter)).toEqual({
      matched: false,
      reason: 'seats_above_max',
      detail: 'too many seats (6)',
    });
  });

  it('rejects a price above the cap', () => {
    expect(evaluateListing(makeListing({ price: 60 }), filter)).toEqual({
      matched: false,
      reason: 'price_above_max',
      detail: 'price too high (60)',
    });
  });

  it('has no price cap when maxPrice is null', () => {
    expect(matches(makeListing({ price: 9_999 }), makeFilter({ maxPrice: null }))).toBe(true);
  });

  it('rejects meetup delivery only when asked to', () => {
    const meetup = makeListing({ deliveryMethod: 'meetup' });

    expect(evaluateListing(meetup, filter)).toEqual({
      matched: false,
      reason: 'meetup_delivery',
      detail: 'meetup delivery',
    });
    expect(matches(meetup, makeFilter({ skipMeetupDelivery: false }))).toBe(true);
  });

  it('fails closed on missing fields', () => {
    expect(evaluateListing(makeListing({ seatCount: null }), filter)).toMatchObject({
      matched: false,
      reason: 'missing_field',
      detail: 'seat count unknown',
    });
    expect(evaluateListing(makeListing({ price: null }), filter)).toMatchObject({
      matched: false,
      reason: 'missing_field',
      detail: 'price unknown',
    });
    expect(evaluateListing(makeListing({ price: Number.NaN }), filter)).toMatchObject({
      reason: 'missing_field',
    });
  });

  it('counts an unknown delivery method as missing only when meetups are skipped', () => {
    const unresolved = makeListing({ deliveryMethod: null });

    expect(evaluateListing(unresolved, filter)).toEqual({
      matched: false,
      reason: 'missing_field',
      detail: 'delivery method unknown',
    });
    expect(matches(unresolved, makeFilter({ skipMeetupDelivery: false }))).toBe(true);
  });

  it('reports the seat bound before the missing delivery method', () => {
    expect(evaluateListing(makeListing({ seatCount: 8, deliveryMethod: null }), filter)).toMatchObject({
      reason: 'seats_above_max',
    });
  });
});

describe('passesPrefilter', () => {
  const filter = makeFilter({ minSeats: 2, maxSeats: 4, maxPrice: 50, skipMeetupDelivery: true });

  it('checks seats and price only', () => {
    expect(passesPrefilter({ id: 'a', price: 45, seatCount: 2 }, filter)).toBe(true);
    expect(passesPrefilter({ id: 'b', price: 45, seatCount: 5 }, filter)).toBe(false);
    expect(passesPrefilter({ id: 'c', price: 51, seatCount: 2 }, filter)).toBe(false);
    expect(passesPrefilter({ id: 'd', price: null, seatCount: 2 }, filter)).toBe(false);
  });
});
