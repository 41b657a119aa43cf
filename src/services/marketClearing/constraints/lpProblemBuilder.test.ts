import { describe, it, expect } from 'vitest';
import { buildLPProblem } from './lpProblemBuilder';
import { normalizeMarketInputs } from '../preprocessing/marketNormalizer';
import { dispatchKey } from '../utils/keys';
import type { MarketInputs } from '../types';
import { threeRegionInputs, twoRegionInputs } from '@/test-utils';

function build(inputs: MarketInputs) {
  return buildLPProblem(normalizeMarketInputs(inputs, 'silent'), 'silent').problem;
}

describe('buildLPProblem', () => {
  it('creates one dispatch variable per positive bid and one flow per interconnector', () => {
    const problem = build(twoRegionInputs());

    expect(problem.dispatchVars).toEqual([
      { name: 'd0', region: 'NSW', generator: 'nsw_coal', priceBand: 50, coefficient: 50 },
      { name: 'd1', region: 'VIC', generator: 'vic_gas', priceBand: 50, coefficient: 50 }
    ]);
    expect(problem.flowVars).toEqual([{ name: 'f0', interconnectorId: 'NSW_VIC', lower: -50, upper: 50 }]);
    expect(problem.objectiveCoefficients.get('d0')).toBe(50);
    expect(problem.objectiveCoefficients.get('f0')).toBe(0);
    expect(problem.numVariables).toBe(3);
    expect(problem.numRegions).toBe(2);
    expect(problem.numGenerators).toBe(2);
  });

  it('emits bid caps, then nameplate caps, then balances', () => {
    const problem = build(twoRegionInputs());

    expect(problem.constraints.map(c => c.name)).toEqual([
      'bid_NSW_nsw_coal_50',
      'bid_VIC_vic_gas_50',
      'cap_nsw_coal',
      'cap_vic_gas',
      'balance_NSW',
      'balance_VIC'
    ]);
    expect(problem.constraints.map(c => c.type)).toEqual(['le', 'le', 'le', 'le', 'eq', 'eq']);
    expect(problem.numConstraints).toBe(6);
  });

  it('signs flow out of region_start and into region_end', () => {
    const problem = build(twoRegionInputs());
    const balances = problem.constraints.filter(c => c.kind === 'balance');

    expect(balances).toEqual([
      {
        name: 'balance_NSW',
        kind: 'balance',
        type: 'eq',
        variables: [{ name: 'd0', coefficient: 1 }, { name: 'f0', coefficient: -1 }],
        rhs: 100
      },
      {
        name: 'balance_VIC',
        kind: 'balance',
        type: 'eq',
        variables: [{ name: 'd1', coefficient: 1 }, { name: 'f0', coefficient: 1 }],
        rhs: 80
      }
    ]);
  });

  it('handles several bands, generators and parallel interconnectors', () => {
    const problem = build(threeRegionInputs());

    expect(problem.dispatchVars.map(v => [v.name, v.generator, v.priceBand])).toEqual([
      ['d0', 'a_coal', 10],
      ['d1', 'a_coal', 40],
      ['d2', 'b_gas', 90],
      ['d3', 'b_wind', 10],
      ['d4', 'c_solar', 10]
    ]);
    expect(problem.dispatchIndex.get(dispatchKey('B', 'b_wind', 10))).toBe('d3');
    expect(problem.dispatchIndex.get(dispatchKey('A', 'a_coal', 90))).toBeUndefined();
    expect(problem.numConstraints).toBe(12);

    const capACoal = problem.constraints.find(c => c.name === 'cap_a_coal');
    expect(capACoal?.variables).toEqual([{ name: 'd0', coefficient: 1 }, { name: 'd1', coefficient: 1 }]);
    expect(capACoal?.rhs).toBe(150);

    const balanceB = problem.constraints.find(c => c.name === 'balance_B');
    expect(balanceB?.variables).toEqual([
      { name: 'd2', coefficient: 1 },
      { name: 'd3', coefficient: 1 },
      { name: 'f0', coefficient: 1 },
      { name: 'f1', coefficient: 1 },
      { name: 'f2', coefficient: -1 }
    ]);
    expect(balanceB?.rhs).toBe(90);
  });

  it('omits variables and the nameplate row of a generator that bids nothing', () => {
    const inputs = twoRegionInputs();
    inputs.generators.push({ region: 'NSW', generator_name: 'nsw_idle', nameplate_capacity: 0 });
    inputs.bids.push({ generator_name: 'nsw_idle', pricelevel: 50, bid_capacity: 0 });

    const problem = build(inputs);

    expect(problem.dispatchVars.some(v => v.generator === 'nsw_idle')).toBe(false);
    expect(problem.constraints.some(c => c.name === 'cap_nsw_idle')).toBe(false);
    expect(problem.numGenerators).toBe(3);
  });

  it('keeps a balance row for a region with nothing in it', () => {
    const inputs = twoRegionInputs();
    inputs.region_demand.push({ region: 'TAS', demand: 0 });

    const balanceTas = build(inputs).constraints.find(c => c.name === 'balance_TAS');

    expect(balanceTas).toEqual({ name: 'balance_TAS', kind: 'balance', type: 'eq', variables: [], rhs: 0 });
  });
});
