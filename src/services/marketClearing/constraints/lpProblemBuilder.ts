/**
 * LP Problem Builder
 *
 * Builds the market clearing LP:
 * - Decision variables: dispatch per (region, generator, price band) with a
 *   positive bid, flow per interconnector
 * - Objective: minimize Σ dispatch × price band
 * - Constraints, in this order:
 *   1. Bid cap       dispatch[r,g,p] <= bid(g,p)
 *   2. Nameplate cap Σ_p dispatch[r,g,p] <= nameplate(g)
 *   3. Balance       Σ generation(r) + Σ flow into r - Σ flow out of r = demand(r)
 *
 * A zero or missing bid omits the variable instead of pinning it at 0.
 * The topology is taken as produced by normalizeMarketInputs, which has
 * already checked references and bid totals against nameplate capacity.
 * Row order only affects solver logs, never the optimum.
 */

import { LP_FORMAT } from '@/_domain';
import type {
  DispatchKey,
  DispatchVariable,
  FlowVariable,
  LogLevel,
  LPConstraint,
  LPProblem,
  MarketTopology
} from '../types';
import { getBidCapacity } from '../preprocessing/marketNormalizer';
import { dispatchKey } from '../utils/keys';
import { createLogger } from '../utils/logger';

export interface ProblemBuildResult {
  problem: LPProblem;
}

/**
 * Build the complete LP problem
 */
export function buildLPProblem(topology: MarketTopology, logLevel: LogLevel = 'info'): ProblemBuildResult {
  const log = createLogger('LPBuilder', logLevel);

  log.info(
    `Building problem: ${topology.regions.length} regions, ${topology.generators.length} generators, ` +
    `${topology.priceBands.length} price bands, ${topology.interconnectors.length} interconnectors`
  );

  const dispatchVars: DispatchVariable[] = [];
  const dispatchIndex = new Map<DispatchKey, string>();
  const objectiveCoefficients = new Map<string, number>();
  const constraints: LPConstraint[] = [];

  // Variables for every generator of every region at every band with a bid
  const varsByGenerator = new Map<string, DispatchVariable[]>();
  for (const region of topology.regions) {
    for (const gen of topology.generatorsByRegion.get(region.id) ?? []) {
      const genVars: DispatchVariable[] = [];

      for (const priceBand of topology.priceBands) {
        if (getBidCapacity(topology, gen.name, priceBand) <= 0) continue;

        const dispatchVar: DispatchVariable = {
          name: `${LP_FORMAT.DISPATCH_PREFIX}${dispatchVars.length}`,
          region: region.id,
          generator: gen.name,
          priceBand,
          coefficient: priceBand
        };
        dispatchVars.push(dispatchVar);
        genVars.push(dispatchVar);
        dispatchIndex.set(dispatchKey(region.id, gen.name, priceBand), dispatchVar.name);
        objectiveCoefficients.set(dispatchVar.name, priceBand);
      }

      varsByGenerator.set(gen.name, genVars);
    }
  }

  const flowVars: FlowVariable[] = topology.interconnectors.map((ic, i) => ({
    name: `${LP_FORMAT.FLOW_PREFIX}${i}`,
    interconnectorId: ic.id,
    lower: -ic.capacity,
    upper: ic.capacity
  }));
  for (const flowVar of flowVars) {
    objectiveCoefficients.set(flowVar.name, 0);
  }

  // 1. Bid cap constraints
  for (const dispatchVar of dispatchVars) {
    constraints.push({
      name: `bid_${dispatchVar.region}_${dispatchVar.generator}_${dispatchVar.priceBand}`,
      kind: 'bid_cap',
      type: 'le',
      variables: [{ name: dispatchVar.name, coefficient: 1 }],
      rhs: getBidCapacity(topology, dispatchVar.generator, dispatchVar.priceBand)
    });
  }

  // 2. Nameplate capacity constraints
  // A generator without variables would get the row 0 <= capacity, which always holds
  for (const gen of topology.generators) {
    const genVars = varsByGenerator.get(gen.name) ?? [];
    if (genVars.length === 0) continue;

    constraints.push({
      name: `cap_${gen.name}`,
      kind: 'nameplate_cap',
      type: 'le',
      variables: genVars.map(v => ({ name: v.name, coefficient: 1 })),
      rhs: gen.nameplateCapacity
    });
  }

  // 3. Regional balance constraints
  // Positive flow runs region_start -> region_end: +flow at the end, -flow at the start.
  // Every region gets a row, even an empty one (then only zero demand is feasible).
  for (const region of topology.regions) {
    const variables: LPConstraint['variables'] = [];

    for (const gen of topology.generatorsByRegion.get(region.id) ?? []) {
      for (const v of varsByGenerator.get(gen.name) ?? []) {
        variables.push({ name: v.name, coefficient: 1 });
      }
    }

    variables.push(...netFlowTerms(topology.interconnectors, flowVars, region.id));

    constraints.push({
      name: `balance_${region.id}`,
      kind: 'balance',
      type: 'eq',
      variables,
      rhs: region.demand
    });
  }

  const problem: LPProblem = {
    dispatchVars,
    flowVars,
    constraints,
    objectiveCoefficients,
    dispatchIndex,
    numRegions: topology.regions.length,
    numGenerators: topology.generators.length,
    numVariables: dispatchVars.length + flowVars.length,
    numConstraints: constraints.length
  };

  log.info(`Problem built: ${problem.numVariables} variables, ${problem.numConstraints} constraints`);

  return { problem };
}

/**
 * Net flow into a region as signed flow-variable terms.
 * flowVars[i] belongs to interconnectors[i].
 */
export function netFlowTerms(
  interconnectors: MarketTopology['interconnectors'],
  flowVars: readonly FlowVariable[],
  regionId: string
): LPConstraint['variables'] {
  const terms: LPConstraint['variables'] = [];
  interconnectors.forEach((ic, i) => {
    const flowVar = flowVars[i];
    if (ic.regionEnd === regionId) terms.push({ name: flowVar.name, coefficient: 1 });
    if (ic.regionStart === regionId) terms.push({ name: flowVar.name, coefficient: -1 });
  });
  return terms;
}
