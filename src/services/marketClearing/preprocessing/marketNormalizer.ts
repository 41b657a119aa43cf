/**
 * Market Normalizer
 *
 * Turns the five input tables into a MarketTopology:
 * - regions in demand-table order
 * - generators grouped by region
 * - price bands de-duplicated (first appearance wins)
 * - bids keyed by (generator, price band)
 * - interconnectors as a flat list
 *
 * Bids summed over all bands may not exceed the generator's nameplate capacity.
 * All problems are collected and thrown together as one InputValidationError,
 * before any model is built.
 */

import type {
  BidKey,
  GeneratorSpec,
  InterconnectorSpec,
  LogLevel,
  MarketInputs,
  MarketTopology,
  RegionSpec
} from '../types';
import { InputValidationError } from '../errors';
import { bidKey } from '../utils/keys';
import { createLogger } from '../utils/logger';

function checkQuantity(issues: string[], value: number, label: string): void {
  if (!Number.isFinite(value)) {
    issues.push(`${label} must be a finite number, got ${value}`);
  } else if (value < 0) {
    issues.push(`${label} must not be negative, got ${value}`);
  }
}

export function normalizeMarketInputs(inputs: MarketInputs, logLevel: LogLevel = 'info'): MarketTopology {
  const log = createLogger('MarketNormalizer', logLevel);
  const issues: string[] = [];

  // Regions
  const regions: RegionSpec[] = [];
  const regionIds = new Set<string>();
  for (const row of inputs.region_demand) {
    if (regionIds.has(row.region)) {
      issues.push(`Region "${row.region}" appears more than once in region_demand`);
      continue;
    }
    checkQuantity(issues, row.demand, `Demand for region "${row.region}"`);
    regionIds.add(row.region);
    regions.push({ id: row.region, demand: row.demand });
  }

  // Generators
  const generators: GeneratorSpec[] = [];
  const generatorNames = new Set<string>();
  const generatorsByRegion = new Map<string, GeneratorSpec[]>();
  for (const region of regions) {
    generatorsByRegion.set(region.id, []);
  }
  for (const row of inputs.generators) {
    if (generatorNames.has(row.generator_name)) {
      issues.push(`Generator "${row.generator_name}" appears more than once in generators`);
      continue;
    }
    generatorNames.add(row.generator_name);
    checkQuantity(issues, row.nameplate_capacity, `Nameplate capacity of generator "${row.generator_name}"`);

    const regionGenerators = generatorsByRegion.get(row.region);
    if (!regionGenerators) {
      issues.push(`Generator "${row.generator_name}" is in unknown region "${row.region}"`);
      continue;
    }
    const spec: GeneratorSpec = {
      name: row.generator_name,
      region: row.region,
      nameplateCapacity: row.nameplate_capacity
    };
    generators.push(spec);
    regionGenerators.push(spec);
  }

  // Price bands
  const priceBands: number[] = [];
  for (const row of inputs.pricelevel) {
    if (!Number.isFinite(row.pricelevel)) {
      issues.push(`Price level must be a finite number, got ${row.pricelevel}`);
      continue;
    }
    if (!priceBands.includes(row.pricelevel)) {
      priceBands.push(row.pricelevel);
    }
  }

  // Bids
  const bids = new Map<BidKey, number>();
  const bidTotals = new Map<string, number>();
  for (const row of inputs.bids) {
    const label = `Bid of generator "${row.generator_name}" at price ${row.pricelevel}`;
    if (!generatorNames.has(row.generator_name)) {
      issues.push(`${label} references an unknown generator`);
      continue;
    }
    if (!priceBands.includes(row.pricelevel)) {
      issues.push(`${label} references an unknown price level`);
      continue;
    }
    const key = bidKey(row.generator_name, row.pricelevel);
    if (bids.has(key)) {
      issues.push(`${label} appears more than once in bids`);
      continue;
    }
    checkQuantity(issues, row.bid_capacity, `${label}: bid capacity`);
    bids.set(key, row.bid_capacity);
    bidTotals.set(row.generator_name, (bidTotals.get(row.generator_name) ?? 0) + row.bid_capacity);
  }
  for (const gen of generators) {
    const total = bidTotals.get(gen.name) ?? 0;
    if (total > gen.nameplateCapacity) {
      issues.push(`Bids of generator "${gen.name}" total ${total} MW, above nameplate capacity ${gen.nameplateCapacity} MW`);
    }
  }

  // Interconnectors
  const interconnectors: InterconnectorSpec[] = [];
  const interconnectorIds = new Set<string>();
  for (const row of inputs.interconnectors ?? []) {
    const label = `Interconnector "${row.interconnector_id}"`;
    if (interconnectorIds.has(row.interconnector_id)) {
      issues.push(`${label} appears more than once in interconnectors`);
      continue;
    }
    interconnectorIds.add(row.interconnector_id);
    checkQuantity(issues, row.interconnector_capacity, `${label} capacity`);

    if (!regionIds.has(row.region_start)) {
      issues.push(`${label} starts in unknown region "${row.region_start}"`);
    }
    if (!regionIds.has(row.region_end)) {
      issues.push(`${label} ends in unknown region "${row.region_end}"`);
    }
    if (row.region_start === row.region_end) {
      issues.push(`${label} starts and ends in the same region "${row.region_start}"`);
    }

    interconnectors.push({
      id: row.interconnector_id,
      regionStart: row.region_start,
      regionEnd: row.region_end,
      capacity: row.interconnector_capacity
    });
  }

  if (issues.length > 0) {
    log.warn(`Rejected market inputs: ${issues.length} issue(s)`);
    throw new InputValidationError(`Invalid market inputs: ${issues[0]}`, issues);
  }

  log.info(
    `Normalized ${regions.length} regions, ${generators.length} generators, ` +
    `${priceBands.length} price bands, ${bids.size} bids, ${interconnectors.length} interconnectors`
  );

  return {
    regions,
    generators,
    generatorsByRegion,
    priceBands,
    bids,
    interconnectors
  };
}

/**
 * Bid capacity at a band; a missing bid is a zero bid
 */
export function getBidCapacity(topology: MarketTopology, generator: string, priceBand: number): number {
  return topology.bids.get(bidKey(generator, priceBand)) ?? 0;
}
