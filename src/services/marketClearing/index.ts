/**
 * Market Clearing LP Engine - Public API
 *
 * Usage:
 * ```typescript
 * import { runMarketClearing, formatDispatchSummary } from '@/services/marketClearing';
 *
 * const result = await runMarketClearing(inputs, { log_level: 'silent' });
 * if (result.status === 'optimal') {
 *   console.log(formatDispatchSummary(result));
 * }
 * ```
 */

// Types
export * from './types';

// Errors
export { MarketClearingError, InputValidationError, SolverError } from './errors';

// Main Engine
export { MarketClearingEngine, runMarketClearing, solveElectricityMarket } from './marketClearingEngine';

// Preprocessing
export { parseMarketTables, loadMarketTables } from './preprocessing/tableLoader';
export type { MarketTableSources, MarketTablePaths } from './preprocessing/tableLoader';
export { normalizeMarketInputs, getBidCapacity } from './preprocessing/marketNormalizer';

// Constraints
export { validateBidsAgainstCapacity, assertBidsWithinCapacity, findBidCapacityViolations } from './constraints/bidValidation';
export type { BidCapacityViolation } from './constraints/bidValidation';
export { buildLPProblem } from './constraints/lpProblemBuilder';
export type { ProblemBuildResult } from './constraints/lpProblemBuilder';

// Solver
export { solveProblem, problemToLPFormat } from './solver/highsWrapper';

// Post-processing
export { extractMarketResult } from './postprocessing/solutionExtractor';
export { formatDispatchSummary } from './postprocessing/summaryFormatter';
