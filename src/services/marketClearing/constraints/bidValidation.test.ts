import { describe, it, expect } from 'vitest';
import {
  assertBidsWithinCapacity,
  findBidCapacityViolations,
  validateBidsAgainstCapacity
} from './bidValidation';
import { InputValidationError } from '../errors';
import type { BidRow, GeneratorRow } from '../types';

const generators: GeneratorRow[] = [
  { region: 'NSW', generator_name: 'nsw_coal', nameplate_capacity: 200 },
  { region: 'VIC', generator_name: 'vic_gas', nameplate_capacity: 100 }
];

describe('validateBidsAgainstCapacity', () => {
  it('accepts bids within nameplate capacity', () => {
    const bids: BidRow[] = [
      { generator_name: 'nsw_coal', pricelevel: 50, bid_capacity: 120 },
      { generator_name: 'nsw_coal', pricelevel: 80, bid_capacity: 60 },
      { generator_name: 'vic_gas', pricelevel: 50, bid_capacity: 100 }
    ];
    expect(validateBidsAgainstCapacity(generators, bids)).toBe(true);
  });

  it('accepts a bid sum exactly at nameplate', () => {
    const bids: BidRow[] = [
      { generator_name: 'nsw_coal', pricelevel: 50, bid_capacity: 150 },
      { generator_name: 'nsw_coal', pricelevel: 80, bid_capacity: 50 }
    ];
    expect(validateBidsAgainstCapacity(generators, bids)).toBe(true);
  });

  it('rejects bids summing above nameplate', () => {
    const bids: BidRow[] = [
      { generator_name: 'nsw_coal', pricelevel: 50, bid_capacity: 150 },
      { generator_name: 'nsw_coal', pricelevel: 80, bid_capacity: 100 }
    ];
    expect(validateBidsAgainstCapacity(generators, bids)).toBe(false);
  });

  it('rejects a bid from a generator that is not listed', () => {
    const bids: BidRow[] = [{ generator_name: 'ghost', pricelevel: 50, bid_capacity: 10 }];
    expect(validateBidsAgainstCapacity(generators, bids)).toBe(false);
  });

  it('accepts a generator with no bids at all', () => {
    const withIdle: GeneratorRow[] = [
      ...generators,
      { region: 'NSW', generator_name: 'nsw_idle', nameplate_capacity: 0 }
    ];
    expect(validateBidsAgainstCapacity(withIdle, [])).toBe(true);
  });
});

describe('findBidCapacityViolations', () => {
  it('reports each offending generator with its bid total', () => {
    const bids: BidRow[] = [
      { generator_name: 'vic_gas', pricelevel: 50, bid_capacity: 101 },
      { generator_name: 'nsw_coal', pricelevel: 50, bid_capacity: 150 },
      { generator_name: 'nsw_coal', pricelevel: 80, bid_capacity: 100 },
      { generator_name: 'ghost', pricelevel: 50, bid_capacity: 5 }
    ];

    expect(findBidCapacityViolations(generators, bids)).toEqual([
      { generator: 'vic_gas', totalBid: 101, nameplateCapacity: 100 },
      { generator: 'nsw_coal', totalBid: 250, nameplateCapacity: 200 },
      { generator: 'ghost', totalBid: 5, nameplateCapacity: null }
    ]);
  });
});

describe('assertBidsWithinCapacity', () => {
  it('returns quietly for valid bids', () => {
    const bids: BidRow[] = [{ generator_name: 'nsw_coal', pricelevel: 50, bid_capacity: 200 }];
    expect(() => assertBidsWithinCapacity(generators, bids)).not.toThrow();
  });

  it('throws InputValidationError listing every violation', () => {
    const bids: BidRow[] = [
      { generator_name: 'nsw_coal', pricelevel: 50, bid_capacity: 150 },
      { generator_name: 'nsw_coal', pricelevel: 80, bid_capacity: 100 },
      { generator_name: 'ghost', pricelevel: 50, bid_capacity: 5 }
    ];

    let caught: unknown;
    try {
      assertBidsWithinCapacity(generators, bids);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InputValidationError);
    if (!(caught instanceof InputValidationError)) return;
    expect(caught.message).toBe('Bids exceed generator capacity');
    expect(caught.code).toBe('INPUT_VALIDATION');
    expect(caught.details).toEqual([
      'nsw_coal: bids 250 MW > nameplate 200 MW',
      'ghost: bids 5 MW for unknown generator'
    ]);
  });
});
