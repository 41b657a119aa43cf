/**
 * Bid Validation
 *
 * Precondition for building a model: for every generator, the bid capacity
 * summed over all price bands must not exceed nameplate capacity. A bid for a
 * generator that is not in the generator table counts as a violation.
 */

import type { BidRow, GeneratorRow } from '../types';
import { InputValidationError } from '../errors';

export interface BidCapacityViolation {
  generator: string;
  totalBid: number;
  nameplateCapacity: number | null;  // null = unknown generator
}

/**
 * Every generator whose summed bids break the capacity rule, in first-bid order
 */
export function findBidCapacityViolations(
  generators: readonly GeneratorRow[],
  bids: readonly BidRow[]
): BidCapacityViolation[] {
  const totalBids = new Map<string, number>();
  for (const bid of bids) {
    totalBids.set(bid.generator_name, (totalBids.get(bid.generator_name) ?? 0) + bid.bid_capacity);
  }

  const capacities = new Map<string, number>();
  for (const gen of generators) {
    capacities.set(gen.generator_name, gen.nameplate_capacity);
  }

  const violations: BidCapacityViolation[] = [];
  for (const [generator, totalBid] of totalBids) {
    const capacity = capacities.get(generator);
    if (capacity === undefined) {
      violations.push({ generator, totalBid, nameplateCapacity: null });
    } else if (totalBid > capacity) {
      violations.push({ generator, totalBid, nameplateCapacity: capacity });
    }
  }

  return violations;
}

/**
 * True when all generators' bid sums are within capacity
 */
export function validateBidsAgainstCapacity(
  generators: readonly GeneratorRow[],
  bids: readonly BidRow[]
): boolean {
  return findBidCapacityViolations(generators, bids).length === 0;
}

/**
 * Throwing form of validateBidsAgainstCapacity(), used by the engine
 */
export function assertBidsWithinCapacity(
  generators: readonly GeneratorRow[],
  bids: readonly BidRow[]
): void {
  const violations = findBidCapacityViolations(generators, bids);
  if (violations.length === 0) return;

  const details = violations.map(v =>
    v.nameplateCapacity === null
      ? `${v.generator}: bids ${v.totalBid} MW for unknown generator`
      : `${v.generator}: bids ${v.totalBid} MW > nameplate ${v.nameplateCapacity} MW`
  );
  throw new InputValidationError('Bids exceed generator capacity', details);
}
