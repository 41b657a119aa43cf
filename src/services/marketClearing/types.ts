/**
 * Market Clearing LP Engine - Type Definitions
 *
 * Input tables, the normalized market topology, the LP description handed to
 * the solver, and the dispatch result read back from it.
 */

// =============================================================================
// Input Tables
// =============================================================================

export interface RegionDemandRow {
  region: string;
  demand: number;  // MW
}

export interface GeneratorRow {
  region: string;
  generator_name: string;
  nameplate_capacity: number;  // MW
}

export interface PriceLevelRow {
  pricelevel: number;  // $/MW
}

export interface BidRow {
  generator_name: string;
  pricelevel: number;
  bid_capacity: number;  // MW offered at this price level
}

/**
 * Positive flow runs from region_start to region_end
 */
export interface InterconnectorRow {
  interconnector_id: string;
  region_start: string;
  region_end: string;
  interconnector_capacity: number;  // MW, same limit in both directions
}

/**
 * The five input tables, fully materialized
 */
export interface MarketInputs {
  region_demand: RegionDemandRow[];
  generators: GeneratorRow[];
  pricelevel: PriceLevelRow[];
  bids: BidRow[];
  interconnectors?: InterconnectorRow[];
}

// =============================================================================
// Normalized Topology
// =============================================================================

export interface RegionSpec {
  id: string;
  demand: number;
}

export interface GeneratorSpec {
  name: string;
  region: string;
  nameplateCapacity: number;
}

export interface InterconnectorSpec {
  id: string;
  regionStart: string;
  regionEnd: string;
  capacity: number;
}

/**
 * Composite key of (generator, price band), see bidKey()
 */
export type BidKey = string;

/**
 * Composite key of (region, generator, price band), see dispatchKey()
 */
export type DispatchKey = string;

/**
 * Validated, indexed view of MarketInputs.
 * Built once per run and never mutated.
 */
export interface MarketTopology {
  regions: readonly RegionSpec[];
  generators: readonly GeneratorSpec[];
  generatorsByRegion: ReadonlyMap<string, readonly GeneratorSpec[]>;
  priceBands: readonly number[];
  bids: ReadonlyMap<BidKey, number>;
  interconnectors: readonly InterconnectorSpec[];
}

// =============================================================================
// LP Problem Types
// =============================================================================

/**
 * MW produced by one generator at one price band. Lower bound 0.
 */
export interface DispatchVariable {
  name: string;  // d{index}
  region: string;
  generator: string;
  priceBand: number;
  coefficient: number;  // Objective coefficient (= price band)
}

/**
 * Signed MW on one interconnector, bounded [-capacity, +capacity]
 */
export interface FlowVariable {
  name: string;  // f{index}
  interconnectorId: string;
  lower: number;
  upper: number;
}

export type ConstraintKind = 'bid_cap' | 'nameplate_cap' | 'balance';

/**
 * Constraint in LP
 */
export interface LPConstraint {
  name: string;
  kind: ConstraintKind;
  type: 'eq' | 'le' | 'ge';  // =, <=, >=
  variables: { name: string; coefficient: number }[];
  rhs: number;
}

/**
 * Complete LP problem (always minimized)
 */
export interface LPProblem {
  dispatchVars: DispatchVariable[];
  flowVars: FlowVariable[];
  constraints: LPConstraint[];
  objectiveCoefficients: ReadonlyMap<string, number>;

  // (region, generator, price band) -> dispatch variable name
  dispatchIndex: ReadonlyMap<DispatchKey, string>;

  // Metadata
  numRegions: number;
  numGenerators: number;
  numVariables: number;
  numConstraints: number;
}

// =============================================================================
// Solver Types
// =============================================================================

export type SolverName = 'highs' | 'glpk' | 'presolve';

export type SolverStatus =
  | 'optimal'
  | 'infeasible'
  | 'unbounded'
  | 'timeout'
  | 'indeterminate'
  | 'error';

/**
 * What the solver backend hands back.
 * objectiveValue and values exist only for an optimal solve.
 */
export type SolverSolution =
  | {
      status: 'optimal';
      objectiveValue: number;
      values: ReadonlyMap<string, number>;
      solver: SolverName;
      solveTimeMs: number;
    }
  | {
      status: Exclude<SolverStatus, 'optimal'>;
      solver: SolverName;
      solveTimeMs: number;
      error?: string;
    };

/**
 * Anything that can solve an LPProblem.
 * The engine takes one of these so tests can inject a stand-in.
 */
export type ProblemSolver = (problem: LPProblem, params: MarketSolverParams) => Promise<SolverSolution>;

export type LogLevel = 'silent' | 'info' | 'debug';

/**
 * Solver configuration
 */
export interface MarketSolverParams {
  solver: 'highs' | 'glpk';
  fallback_enabled: boolean;  // Try the other backend when the first one throws
  time_limit_seconds: number;  // 0 = no limit
  log_level: LogLevel;
}

// =============================================================================
// Result Types
// =============================================================================

/**
 * MW per generator, grouped by region
 */
export type DispatchSchedule = Readonly<Record<string, Readonly<Record<string, number>>>>;

export interface BandDispatch {
  region: string;
  generator: string;
  priceBand: number;
  quantity: number;
}

export interface RegionBalance {
  region: string;
  demand: number;
  generation: number;
  netImport: number;  // Positive = importing
}

export interface OptimalMarketResult {
  status: 'optimal';
  totalCost: number;
  dispatch: DispatchSchedule;
  bandDispatch: readonly BandDispatch[];
  interconnectorFlows: Readonly<Record<string, number>>;
  regionPairFlows: Readonly<Record<string, number>>;  // "START->END" -> MW
  regionBalances: readonly RegionBalance[];
  solver: SolverName;
  solveTimeMs: number;
}

/**
 * No cost, dispatch or flows: the status alone carries the outcome
 */
export interface UnsolvedMarketResult {
  status: Exclude<SolverStatus, 'optimal'>;
  solver: SolverName;
  solveTimeMs: number;
  error?: string;
}

export type MarketResult = OptimalMarketResult | UnsolvedMarketResult;

// =============================================================================
// Progress Types
// =============================================================================

export type MarketClearingStage =
  | 'validating'
  | 'building'
  | 'submitted'
  | 'extracting'
  | 'complete'
  | 'error';

export interface MarketClearingProgress {
  stage: MarketClearingStage;
  status: string;
  numVariables?: number;
  numConstraints?: number;
  solverStatus?: SolverStatus;
}

export type MarketClearingProgressCallback = (progress: MarketClearingProgress) => void;
