/**
 * Composite keys for flat Map lookups.
 *
 * JSON-encoding the tuple keeps keys unambiguous whatever characters the
 * region or generator identifiers contain.
 */

import type { BidKey, DispatchKey } from '../types';

export function bidKey(generator: string, priceBand: number): BidKey {
  return JSON.stringify([generator, priceBand]);
}

export function dispatchKey(region: string, generator: string, priceBand: number): DispatchKey {
  return JSON.stringify([region, generator, priceBand]);
}

/**
 * Reporting key for an ordered region pair, e.g. "NSW->VIC"
 */
export function regionPairKey(regionStart: string, regionEnd: string): string {
  return `${regionStart}->${regionEnd}`;
}
