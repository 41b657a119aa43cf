/**
 * Shared market fixtures for the test suites
 */

import { fileURLToPath } from 'node:url';
import type { MarketInputs, MarketResult, OptimalMarketResult } from './services/marketClearing/types';
import type { MarketTablePaths } from './services/marketClearing/preprocessing/tableLoader';

/**
 * CSV paths of a scenario under test/fixtures/
 */
export function fixturePaths(scenario: string, withInterconnectors = true): MarketTablePaths {
  const file = (name: string) => fileURLToPath(new URL(`../test/fixtures/${scenario}/${name}.csv`, import.meta.url));
  return {
    region_demand: file('region_demand'),
    generators: file('generators'),
    pricelevel: file('pricelevel'),
    bids: file('bids'),
    ...(withInterconnectors ? { interconnectors: file('interconnectors') } : {})
  };
}

/**
 * NSW 100 MW, VIC 80 MW, one 200 MW generator each bidding everything at $50,
 * one 50 MW interconnector NSW -> VIC.
 */
export function twoRegionInputs(): MarketInputs {
  return {
    region_demand: [
      { region: 'NSW', demand: 100 },
      { region: 'VIC', demand: 80 }
    ],
    generators: [
      { region: 'NSW', generator_name: 'nsw_coal', nameplate_capacity: 200 },
      { region: 'VIC', generator_name: 'vic_gas', nameplate_capacity: 200 }
    ],
    pricelevel: [{ pricelevel: 50 }],
    bids: [
      { generator_name: 'nsw_coal', pricelevel: 50, bid_capacity: 200 },
      { generator_name: 'vic_gas', pricelevel: 50, bid_capacity: 200 }
    ],
    interconnectors: [
      { interconnector_id: 'NSW_VIC', region_start: 'NSW', region_end: 'VIC', interconnector_capacity: 50 }
    ]
  };
}

/**
 * Cheap supply sits in VIC, so the optimum pushes the full 50 MW against the
 * NSW -> VIC direction: flow = -50, VIC 130 MW at $10, NSW 50 MW at $100.
 */
export function reverseFlowInputs(): MarketInputs {
  return {
    region_demand: [
      { region: 'NSW', demand: 100 },
      { region: 'VIC', demand: 80 }
    ],
    generators: [
      { region: 'NSW', generator_name: 'nsw_peaker', nameplate_capacity: 200 },
      { region: 'VIC', generator_name: 'vic_brown_coal', nameplate_capacity: 200 }
    ],
    pricelevel: [{ pricelevel: 10 }, { pricelevel: 100 }],
    bids: [
      { generator_name: 'nsw_peaker', pricelevel: 100, bid_capacity: 200 },
      { generator_name: 'vic_brown_coal', pricelevel: 10, bid_capacity: 200 }
    ],
    interconnectors: [
      { interconnector_id: 'NSW_VIC', region_start: 'NSW', region_end: 'VIC', interconnector_capacity: 50 }
    ]
  };
}

/**
 * Three regions in a chain, two parallel A -> B links, several bands.
 *
 * Supply: 150 MW at $10, 50 MW at $40, 80 MW at $90; demand 250 MW.
 * A can only export 30 MW (150 MW generation, 120 MW demand), so B burns
 * 50 MW of gas and C imports 20 MW. Optimal cost 1500 + 2000 + 4500 = 8000.
 */
export function threeRegionInputs(): MarketInputs {
  return {
    region_demand: [
      { region: 'A', demand: 120 },
      { region: 'B', demand: 90 },
      { region: 'C', demand: 40 }
    ],
    generators: [
      { region: 'A', generator_name: 'a_coal', nameplate_capacity: 150 },
      { region: 'B', generator_name: 'b_gas', nameplate_capacity: 80 },
      { region: 'B', generator_name: 'b_wind', nameplate_capacity: 30 },
      { region: 'C', generator_name: 'c_solar', nameplate_capacity: 20 }
    ],
    pricelevel: [{ pricelevel: 10 }, { pricelevel: 40 }, { pricelevel: 90 }],
    bids: [
      { generator_name: 'a_coal', pricelevel: 10, bid_capacity: 100 },
      { generator_name: 'a_coal', pricelevel: 40, bid_capacity: 50 },
      { generator_name: 'b_gas', pricelevel: 90, bid_capacity: 80 },
      { generator_name: 'b_wind', pricelevel: 10, bid_capacity: 30 },
      { generator_name: 'c_solar', pricelevel: 10, bid_capacity: 20 }
    ],
    interconnectors: [
      { interconnector_id: 'AB1', region_start: 'A', region_end: 'B', interconnector_capacity: 30 },
      { interconnector_id: 'AB2', region_start: 'A', region_end: 'B', interconnector_capacity: 20 },
      { interconnector_id: 'BC', region_start: 'B', region_end: 'C', interconnector_capacity: 25 }
    ]
  };
}

/**
 * Two isolated regions; A needs 150 MW but owns only 100 MW.
 */
export function isolatedShortfallInputs(): MarketInputs {
  return {
    region_demand: [
      { region: 'A', demand: 150 },
      { region: 'B', demand: 10 }
    ],
    generators: [
      { region: 'A', generator_name: 'a_gen', nameplate_capacity: 100 },
      { region: 'B', generator_name: 'b_gen', nameplate_capacity: 50 }
    ],
    pricelevel: [{ pricelevel: 30 }],
    bids: [
      { generator_name: 'a_gen', pricelevel: 30, bid_capacity: 100 },
      { generator_name: 'b_gen', pricelevel: 30, bid_capacity: 50 }
    ],
    interconnectors: []
  };
}

export function expectOptimal(result: MarketResult): OptimalMarketResult {
  if (result.status !== 'optimal') {
    throw new Error(`Expected an optimal result, got ${result.status}${result.error ? `: ${result.error}` : ''}`);
  }
  return result;
}
