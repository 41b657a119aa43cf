/**
 * Solver configuration
 *
 * Precedence: explicit overrides > environment > DEFAULT_SOLVER_PARAMS.
 *
 * Environment:
 *   MARKET_SOLVER              highs | glpk
 *   MARKET_SOLVER_FALLBACK     true | false
 *   MARKET_SOLVER_TIME_LIMIT   seconds, 0 = no limit
 *   MARKET_LOG_LEVEL           silent | info | debug
 */

import { DEFAULT_SOLVER_PARAMS, SOLVER_ENV_VARS } from '@/_domain';
import { InputValidationError } from '@/services/marketClearing/errors';
import type { LogLevel, MarketSolverParams } from '@/services/marketClearing/types';

const SOLVERS: readonly MarketSolverParams['solver'][] = ['highs', 'glpk'];
const LOG_LEVELS: readonly LogLevel[] = ['silent', 'info', 'debug'];

function parseSolver(raw: string): MarketSolverParams['solver'] {
  const value = raw.trim().toLowerCase();
  const match = SOLVERS.find(s => s === value);
  if (!match) {
    throw new InputValidationError(`${SOLVER_ENV_VARS.SOLVER} must be one of ${SOLVERS.join(', ')}, got "${raw}"`);
  }
  return match;
}

function parseLogLevel(raw: string): LogLevel {
  const value = raw.trim().toLowerCase();
  const match = LOG_LEVELS.find(l => l === value);
  if (!match) {
    throw new InputValidationError(`${SOLVER_ENV_VARS.LOG_LEVEL} must be one of ${LOG_LEVELS.join(', ')}, got "${raw}"`);
  }
  return match;
}

function parseBoolean(raw: string, name: string): boolean {
  const value = raw.trim().toLowerCase();
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  throw new InputValidationError(`${name} must be true or false, got "${raw}"`);
}

function parseTimeLimit(raw: string): number {
  const value = Number(raw.trim());
  if (raw.trim() === '' || !Number.isFinite(value) || value < 0) {
    throw new InputValidationError(`${SOLVER_ENV_VARS.TIME_LIMIT} must be a non-negative number of seconds, got "${raw}"`);
  }
  return value;
}

/**
 * Read solver params from the environment. Unset variables are skipped.
 */
export function solverParamsFromEnv(env: NodeJS.ProcessEnv): Partial<MarketSolverParams> {
  const params: Partial<MarketSolverParams> = {};

  const solver = env[SOLVER_ENV_VARS.SOLVER];
  if (solver) params.solver = parseSolver(solver);

  const fallback = env[SOLVER_ENV_VARS.FALLBACK];
  if (fallback) params.fallback_enabled = parseBoolean(fallback, SOLVER_ENV_VARS.FALLBACK);

  const timeLimit = env[SOLVER_ENV_VARS.TIME_LIMIT];
  if (timeLimit) params.time_limit_seconds = parseTimeLimit(timeLimit);

  const logLevel = env[SOLVER_ENV_VARS.LOG_LEVEL];
  if (logLevel) params.log_level = parseLogLevel(logLevel);

  return params;
}

/**
 * Complete solver params for a run
 */
export function resolveSolverParams(
  overrides: Partial<MarketSolverParams> = {},
  env: NodeJS.ProcessEnv = process.env
): MarketSolverParams {
  const fromEnv = solverParamsFromEnv(env);

  const params: MarketSolverParams = {
    ...DEFAULT_SOLVER_PARAMS,
    ...fromEnv,
    ...overrides,
  };

  if (!Number.isFinite(params.time_limit_seconds) || params.time_limit_seconds < 0) {
    throw new InputValidationError(`time_limit_seconds must be a non-negative number, got ${params.time_limit_seconds}`);
  }

  return params;
}
