/**
 * Market Clearing Engine
 *
 * Main orchestrator for the single-period dispatch LP.
 *
 * Execution flow:
 * 1. Validate bids against nameplate capacity
 * 2. Normalize the input tables into a topology
 * 3. Build LP problem
 * 4. Solve with HiGHS (GLPK fallback)
 * 5. Extract the dispatch result
 *
 * Input problems throw InputValidationError before step 3. Solver verdicts
 * (infeasible, unbounded, ...) are returned as the result status. Every run
 * builds and reads its own model; nothing carries over between runs.
 */

import type {
  MarketClearingProgress,
  MarketClearingProgressCallback,
  MarketInputs,
  MarketResult,
  MarketSolverParams,
  ProblemSolver
} from './types';
import { resolveSolverParams } from '@/config/solverConfig';
import { assertBidsWithinCapacity } from './constraints/bidValidation';
import { buildLPProblem } from './constraints/lpProblemBuilder';
import { normalizeMarketInputs } from './preprocessing/marketNormalizer';
import { loadMarketTables, type MarketTablePaths } from './preprocessing/tableLoader';
import { extractMarketResult } from './postprocessing/solutionExtractor';
import { solveProblem } from './solver/highsWrapper';
import { errorMessage } from './errors';
import { createLogger, type Logger } from './utils/logger';

export class MarketClearingEngine {
  private params: MarketSolverParams;
  private onProgress?: MarketClearingProgressCallback;
  private solver: ProblemSolver;
  private log: Logger;

  constructor(
    params: Partial<MarketSolverParams> = {},
    onProgress?: MarketClearingProgressCallback,
    solver: ProblemSolver = solveProblem
  ) {
    this.params = resolveSolverParams(params);
    this.onProgress = onProgress;
    this.solver = solver;
    this.log = createLogger('MarketClearing', this.params.log_level);
  }

  /**
   * Run one market clearing
   */
  async run(inputs: MarketInputs): Promise<MarketResult> {
    const startTime = Date.now();

    try {
      // Phase 1: Validate
      this.reportProgress({ stage: 'validating', status: 'Validating bids and topology...' });
      assertBidsWithinCapacity(inputs.generators, inputs.bids);
      const topology = normalizeMarketInputs(inputs, this.params.log_level);

      // Phase 2: Build
      this.reportProgress({ stage: 'building', status: 'Building LP problem...' });
      const { problem } = buildLPProblem(topology, this.params.log_level);

      // Phase 3: Solve
      this.reportProgress({
        stage: 'submitted',
        status: `Solving with ${this.params.solver}...`,
        numVariables: problem.numVariables,
        numConstraints: problem.numConstraints
      });
      const solution = await this.solver(problem, this.params);

      // Phase 4: Extract
      this.reportProgress({ stage: 'extracting', status: 'Reading solution...', solverStatus: solution.status });
      const result = extractMarketResult(problem, topology, solution);

      this.log.info(`Market cleared in ${Date.now() - startTime}ms: ${result.status}`);
      this.reportProgress({ stage: 'complete', status: `Finished: ${result.status}`, solverStatus: result.status });

      return result;
    } catch (error) {
      this.log.error(`Engine error: ${errorMessage(error)}`);
      this.reportProgress({ stage: 'error', status: `Error: ${errorMessage(error)}` });
      throw error;
    }
  }

  private reportProgress(progress: MarketClearingProgress): void {
    this.log.debug(`${progress.stage}: ${progress.status}`);
    this.onProgress?.(progress);
  }
}

/**
 * Convenience function to clear a market from in-memory tables
 */
export async function runMarketClearing(
  inputs: MarketInputs,
  params: Partial<MarketSolverParams> = {},
  onProgress?: MarketClearingProgressCallback
): Promise<MarketResult> {
  const engine = new MarketClearingEngine(params, onProgress);
  return engine.run(inputs);
}

/**
 * Clear a market straight from the CSV tables on disk
 */
export async function solveElectricityMarket(
  paths: MarketTablePaths,
  params: Partial<MarketSolverParams> = {}
): Promise<MarketResult> {
  const inputs = await loadMarketTables(paths);
  return runMarketClearing(inputs, params);
}
