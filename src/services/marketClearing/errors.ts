/**
 * Market Clearing Errors
 *
 * Only two conditions are raised as exceptions:
 * - InputValidationError: the inputs cannot describe a market (thrown before
 *   any model is built)
 * - SolverError: every solver backend threw
 *
 * Infeasible, unbounded and timed-out solves are NOT errors. They are
 * statuses on MarketResult.
 */

export type MarketClearingErrorCode = 'INPUT_VALIDATION' | 'SOLVER_FAILURE';

export class MarketClearingError extends Error {
  readonly code: MarketClearingErrorCode;
  readonly details: string[];

  constructor(code: MarketClearingErrorCode, message: string, details: string[] = [], options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MarketClearingError';
    this.code = code;
    this.details = details;
  }
}

/**
 * Bad input: bids over nameplate, unknown references, duplicate keys,
 * malformed tables.
 */
export class InputValidationError extends MarketClearingError {
  constructor(message: string, details: string[] = []) {
    super('INPUT_VALIDATION', message, details);
    this.name = 'InputValidationError';
  }
}

/**
 * The solver itself failed (load failure, WASM abort, resource exhaustion).
 * The underlying error is kept as `cause`.
 */
export class SolverError extends MarketClearingError {
  readonly solver: string;

  constructor(message: string, solver: string, cause?: unknown) {
    super('SOLVER_FAILURE', message, [], { cause });
    this.name = 'SolverError';
    this.solver = solver;
  }
}

/**
 * Extract a message from anything thrown
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
