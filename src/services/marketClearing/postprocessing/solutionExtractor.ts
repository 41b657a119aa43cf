/**
 * Solution Extractor
 *
 * Re-aggregates solved LP variables into a MarketResult. Pure: the same
 * problem, topology and solution always give the same result.
 *
 * A non-optimal solution yields the status alone. No cost, dispatch or flow
 * is invented for a solve that produced none.
 */

import { cleanValue } from '@/_domain';
import type {
  BandDispatch,
  LPProblem,
  MarketResult,
  MarketTopology,
  RegionBalance,
  SolverSolution
} from '../types';
import { netFlowTerms } from '../constraints/lpProblemBuilder';
import { dispatchKey, regionPairKey } from '../utils/keys';

/**
 * Solved value of a variable. An optimal solution carries every variable
 * (checked by the solver wrapper), so a miss here is a programming error.
 */
function solvedValue(values: ReadonlyMap<string, number>, name: string): number {
  const value = values.get(name);
  if (value === undefined) {
    throw new Error(`No solved value for variable ${name}`);
  }
  return cleanValue(value);
}

export function extractMarketResult(
  problem: LPProblem,
  topology: MarketTopology,
  solution: SolverSolution
): MarketResult {
  if (solution.status !== 'optimal') {
    return {
      status: solution.status,
      solver: solution.solver,
      solveTimeMs: solution.solveTimeMs,
      ...(solution.error !== undefined ? { error: solution.error } : {})
    };
  }

  const { values } = solution;

  // Dispatch: sum over price bands per (region, generator).
  // Result maps are built from entries: any identifier, "__proto__" included,
  // has to end up as an own key.
  const dispatchEntries: [string, Record<string, number>][] = [];
  const bandDispatch: BandDispatch[] = [];
  const generationByRegion = new Map<string, number>();

  for (const region of topology.regions) {
    const generatorEntries: [string, number][] = [];
    let regionGeneration = 0;

    for (const gen of topology.generatorsByRegion.get(region.id) ?? []) {
      let total = 0;
      for (const priceBand of topology.priceBands) {
        const varName = problem.dispatchIndex.get(dispatchKey(region.id, gen.name, priceBand));
        // No variable: zero bid at this band
        if (varName === undefined) continue;

        const quantity = solvedValue(values, varName);
        total += quantity;
        if (quantity > 0) {
          bandDispatch.push({ region: region.id, generator: gen.name, priceBand, quantity });
        }
      }
      generatorEntries.push([gen.name, total]);
      regionGeneration += total;
    }

    dispatchEntries.push([region.id, Object.fromEntries(generatorEntries)]);
    generationByRegion.set(region.id, regionGeneration);
  }

  // Flows: per interconnector, and summed per ordered region pair
  const flowEntries: [string, number][] = [];
  const pairFlows = new Map<string, number>();
  topology.interconnectors.forEach((ic, i) => {
    const flow = solvedValue(values, problem.flowVars[i].name);
    flowEntries.push([ic.id, flow]);
    const pair = regionPairKey(ic.regionStart, ic.regionEnd);
    pairFlows.set(pair, (pairFlows.get(pair) ?? 0) + flow);
  });

  // Regional balance: generation + net import = demand
  const regionBalances: RegionBalance[] = topology.regions.map(region => {
    const netImport = netFlowTerms(topology.interconnectors, problem.flowVars, region.id)
      .reduce((sum, term) => sum + term.coefficient * solvedValue(values, term.name), 0);
    return {
      region: region.id,
      demand: region.demand,
      generation: generationByRegion.get(region.id) ?? 0,
      netImport: cleanValue(netImport)
    };
  });

  return {
    status: 'optimal',
    totalCost: solution.objectiveValue,
    dispatch: Object.fromEntries(dispatchEntries),
    bandDispatch,
    interconnectorFlows: Object.fromEntries(flowEntries),
    regionPairFlows: Object.fromEntries(pairFlows),
    regionBalances,
    solver: solution.solver,
    solveTimeMs: solution.solveTimeMs
  };
}
