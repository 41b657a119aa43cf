import { describe, it, expect, vi } from 'vitest';
import { MarketClearingEngine, runMarketClearing, solveElectricityMarket } from './marketClearingEngine';
import { InputValidationError, SolverError } from './errors';
import type {
  LPProblem,
  MarketClearingProgress,
  MarketInputs,
  MarketSolverParams,
  OptimalMarketResult,
  SolverSolution
} from './types';
import {
  expectOptimal,
  fixturePaths,
  isolatedShortfallInputs,
  reverseFlowInputs,
  threeRegionInputs,
  twoRegionInputs
} from '@/test-utils';

const EPS = 1e-6;

/**
 * Feasibility of a cleared market against the tables it came from
 */
function expectPhysicallyValid(inputs: MarketInputs, result: OptimalMarketResult): void {
  for (const gen of inputs.generators) {
    const output = result.dispatch[gen.region][gen.generator_name];
    expect(output).toBeGreaterThanOrEqual(-EPS);
    expect(output).toBeLessThanOrEqual(gen.nameplate_capacity + EPS);
  }

  for (const band of result.bandDispatch) {
    const bid = inputs.bids.find(b => b.generator_name === band.generator && b.pricelevel === band.priceBand);
    expect(band.quantity).toBeLessThanOrEqual((bid?.bid_capacity ?? 0) + EPS);
  }

  for (const ic of inputs.interconnectors ?? []) {
    expect(Math.abs(result.interconnectorFlows[ic.interconnector_id])).toBeLessThanOrEqual(ic.interconnector_capacity + EPS);
  }

  for (const balance of result.regionBalances) {
    expect(balance.generation + balance.netImport).toBeCloseTo(balance.demand, 6);
  }
}

/**
 * Stand-in solver: answers optimal with every variable at 0
 */
function zeroSolver() {
  return vi.fn(async (problem: LPProblem, _params: MarketSolverParams): Promise<SolverSolution> => ({
    status: 'optimal',
    objectiveValue: 0,
    values: new Map([...problem.dispatchVars, ...problem.flowVars].map(v => [v.name, 0])),
    solver: 'highs',
    solveTimeMs: 1
  }));
}

describe('MarketClearingEngine', () => {
  it('reports each stage in order', async () => {
    const progress: MarketClearingProgress[] = [];
    const engine = new MarketClearingEngine({ log_level: 'silent' }, p => progress.push(p), zeroSolver());

    await engine.run(twoRegionInputs());

    expect(progress.map(p => p.stage)).toEqual(['validating', 'building', 'submitted', 'extracting', 'complete']);
    expect(progress[2]).toMatchObject({ numVariables: 3, numConstraints: 6 });
    expect(progress[4].solverStatus).toBe('optimal');
  });

  it('passes the resolved params to the solver', async () => {
    const solver = zeroSolver();
    const engine = new MarketClearingEngine({ solver: 'glpk', time_limit_seconds: 7, log_level: 'silent' }, undefined, solver);

    await engine.run(twoRegionInputs());

    expect(solver).toHaveBeenCalledTimes(1);
    expect(solver.mock.calls[0][1]).toMatchObject({ solver: 'glpk', time_limit_seconds: 7, log_level: 'silent' });
  });

  it('rejects bids above nameplate before a model is built', async () => {
    const inputs = twoRegionInputs();
    inputs.pricelevel.push({ pricelevel: 80 });
    inputs.bids.push({ generator_name: 'nsw_coal', pricelevel: 80, bid_capacity: 1 });
    const solver = zeroSolver();
    const progress: MarketClearingProgress[] = [];
    const engine = new MarketClearingEngine({ log_level: 'silent' }, p => progress.push(p), solver);

    await expect(engine.run(inputs)).rejects.toThrow(InputValidationError);

    expect(solver).not.toHaveBeenCalled();
    expect(progress.map(p => p.stage)).toEqual(['validating', 'error']);
  });

  it('rejects inconsistent tables before a model is built', async () => {
    const inputs = twoRegionInputs();
    inputs.interconnectors = [
      { interconnector_id: 'NSW_QLD', region_start: 'NSW', region_end: 'QLD', interconnector_capacity: 10 }
    ];
    const solver = zeroSolver();
    const engine = new MarketClearingEngine({ log_level: 'silent' }, undefined, solver);

    await expect(engine.run(inputs)).rejects.toThrow('Invalid market inputs: Interconnector "NSW_QLD" ends in unknown region "QLD"');
    expect(solver).not.toHaveBeenCalled();
  });

  it('returns a solver verdict as the result status', async () => {
    const solver = vi.fn(async (): Promise<SolverSolution> => ({ status: 'timeout', solver: 'highs', solveTimeMs: 9 }));
    const engine = new MarketClearingEngine({ log_level: 'silent' }, undefined, solver);

    const result = await engine.run(twoRegionInputs());

    expect(result).toEqual({ status: 'timeout', solver: 'highs', solveTimeMs: 9 });
  });

  it('lets a SolverError through', async () => {
    const solver = vi.fn(async (): Promise<SolverSolution> => {
      throw new SolverError('All solver backends failed: out of memory', 'glpk');
    });
    const progress: MarketClearingProgress[] = [];
    const engine = new MarketClearingEngine({ log_level: 'silent' }, p => progress.push(p), solver);

    await expect(engine.run(twoRegionInputs())).rejects.toThrow(SolverError);
    expect(progress.at(-1)).toEqual({ stage: 'error', status: 'Error: All solver backends failed: out of memory' });
  });
});

describe('runMarketClearing', () => {
  it.each(['highs', 'glpk'] as const)('clears the two-region market with %s', async solver => {
    const inputs = twoRegionInputs();

    const result = expectOptimal(await runMarketClearing(inputs, { solver, fallback_enabled: false, log_level: 'silent' }));

    expect(result.solver).toBe(solver);
    expect(result.totalCost).toBeCloseTo(9000, 6);
    const nsw = result.dispatch.NSW.nsw_coal;
    const vic = result.dispatch.VIC.vic_gas;
    expect(nsw + vic).toBeCloseTo(180, 6);
    expect(nsw).toBeGreaterThanOrEqual(50 - EPS);
    expect(nsw).toBeLessThanOrEqual(150 + EPS);
    expect(result.regionPairFlows['NSW->VIC']).toBeCloseTo(result.interconnectorFlows.NSW_VIC, 9);
    expectPhysicallyValid(inputs, result);
  });

  it('imports against the interconnector direction when the cheap supply is downstream', async () => {
    const inputs = reverseFlowInputs();

    const result = expectOptimal(await runMarketClearing(inputs, { log_level: 'silent' }));

    expect(result.totalCost).toBeCloseTo(6300, 6);
    expect(result.interconnectorFlows.NSW_VIC).toBeCloseTo(-50, 6);
    expect(result.dispatch.NSW.nsw_peaker).toBeCloseTo(50, 6);
    expect(result.dispatch.VIC.vic_brown_coal).toBeCloseTo(130, 6);
    expect(result.regionBalances).toEqual([
      expect.objectContaining({ region: 'NSW', demand: 100 }),
      expect.objectContaining({ region: 'VIC', demand: 80 })
    ]);
    expectPhysicallyValid(inputs, result);
  });

  it('dispatches in merit order across a constrained chain', async () => {
    const inputs = threeRegionInputs();

    const result = expectOptimal(await runMarketClearing(inputs, { log_level: 'silent' }));

    expect(result.totalCost).toBeCloseTo(8000, 6);
    expect(result.dispatch.A.a_coal).toBeCloseTo(150, 6);
    expect(result.dispatch.B.b_gas).toBeCloseTo(50, 6);
    expect(result.dispatch.B.b_wind).toBeCloseTo(30, 6);
    expect(result.dispatch.C.c_solar).toBeCloseTo(20, 6);
    expect(result.regionPairFlows['A->B']).toBeCloseTo(30, 6);
    expect(result.regionPairFlows['B->C']).toBeCloseTo(20, 6);
    expectPhysicallyValid(inputs, result);
  });

  it('dispatches a generator with zero capacity and no bids at 0', async () => {
    const inputs = twoRegionInputs();
    inputs.generators.push({ region: 'NSW', generator_name: 'nsw_mothballed', nameplate_capacity: 0 });

    const result = expectOptimal(await runMarketClearing(inputs, { log_level: 'silent' }));

    expect(result.dispatch.NSW.nsw_mothballed).toBe(0);
    expect(result.totalCost).toBeCloseTo(9000, 6);
  });

  it('reports a region and interconnector named __proto__', async () => {
    const inputs = twoRegionInputs();
    inputs.region_demand[1] = { region: '__proto__', demand: 80 };
    inputs.generators[1] = { region: '__proto__', generator_name: 'vic_gas', nameplate_capacity: 200 };
    inputs.interconnectors = [
      { interconnector_id: '__proto__', region_start: 'NSW', region_end: '__proto__', interconnector_capacity: 50 }
    ];

    const result = expectOptimal(await runMarketClearing(inputs, { log_level: 'silent' }));

    expect(Object.keys(result.dispatch)).toEqual(['NSW', '__proto__']);
    expect(Object.keys(result.interconnectorFlows)).toEqual(['__proto__']);
    expect(result.totalCost).toBeCloseTo(9000, 6);
    expectPhysicallyValid(inputs, result);
  });

  it('reports a supply shortfall as infeasible without a cost', async () => {
    const result = await runMarketClearing(isolatedShortfallInputs(), { log_level: 'silent' });

    expect(result.status).toBe('infeasible');
    expect('totalCost' in result).toBe(false);
    expect('dispatch' in result).toBe(false);
  });

  it('gives the same answer for the same inputs', async () => {
    const first = expectOptimal(await runMarketClearing(threeRegionInputs(), { log_level: 'silent' }));
    const second = expectOptimal(await runMarketClearing(threeRegionInputs(), { log_level: 'silent' }));

    expect(second.totalCost).toBe(first.totalCost);
    expect(second.dispatch).toEqual(first.dispatch);
    expect(second.interconnectorFlows).toEqual(first.interconnectorFlows);
    expect(second.regionBalances).toEqual(first.regionBalances);
  });
});

describe('solveElectricityMarket', () => {
  it('clears a market straight from CSV files', async () => {
    const result = expectOptimal(await solveElectricityMarket(fixturePaths('two-region'), { log_level: 'silent' }));

    expect(result.totalCost).toBeCloseTo(9000, 6);
  });

  it('rejects CSV bids above nameplate', async () => {
    await expect(solveElectricityMarket(fixturePaths('invalid-bids', false), { log_level: 'silent' }))
      .rejects.toThrow('Bids exceed generator capacity');
  });
});
