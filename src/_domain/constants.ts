/**
 * ============================================================================
 * MARKET CONSTANTS
 * ============================================================================
 *
 * Numeric thresholds, naming prefixes and solver defaults used across the
 * market clearing pipeline.
 *
 * NAMING CONVENTION:
 * - SCREAMING_SNAKE_CASE for constants
 * - Related constants grouped in objects
 *
 * ============================================================================
 */

// =============================================================================
// NUMERICAL TOLERANCES
// =============================================================================

/**
 * SOLVER TOLERANCES
 * -----------------
 * ZERO: solved values closer to zero than this are reported as exactly 0.
 * COEFFICIENT: coefficients smaller than this are dropped from LP text.
 */
export const SOLVER_TOLERANCE = {
  ZERO: 1e-9,
  COEFFICIENT: 1e-10,
} as const;

// =============================================================================
// LP FORMAT
// =============================================================================

/**
 * LP FORMAT SETTINGS
 * ------------------
 * Variable names in the LP are compact (d0, d1, f0 ...) so that region and
 * generator identifiers with spaces or punctuation never reach the solver.
 * Rows are wrapped so no line exceeds MAX_LINE_LENGTH characters.
 */
export const LP_FORMAT = {
  DISPATCH_PREFIX: 'd',
  FLOW_PREFIX: 'f',
  CONSTRAINT_PREFIX: 'c',
  MAX_LINE_LENGTH: 200,
} as const;

// =============================================================================
// SOLVER DEFAULTS
// =============================================================================

/**
 * DEFAULT SOLVER PARAMS
 * ---------------------
 * HiGHS is the primary backend. GLPK takes over when HiGHS throws
 * (module load failure, WASM abort) unless fallback is disabled.
 *
 * time_limit_seconds = 0 leaves the solver without a time limit.
 */
export const DEFAULT_SOLVER_PARAMS = {
  solver: 'highs',
  fallback_enabled: true,
  time_limit_seconds: 0,
  log_level: 'info',
} as const;

/**
 * Environment variables read by resolveSolverParams()
 */
export const SOLVER_ENV_VARS = {
  SOLVER: 'MARKET_SOLVER',
  FALLBACK: 'MARKET_SOLVER_FALLBACK',
  TIME_LIMIT: 'MARKET_SOLVER_TIME_LIMIT',
  LOG_LEVEL: 'MARKET_LOG_LEVEL',
} as const;

// =============================================================================
// INPUT TABLE COLUMNS
// =============================================================================

/**
 * Required CSV headers per input table.
 * Column names follow the market data exports the tables are produced from.
 */
export const TABLE_COLUMNS = {
  region_demand: ['region', 'demand'],
  generators: ['region', 'generator_name', 'nameplate_capacity'],
  pricelevel: ['pricelevel'],
  bids: ['generator_name', 'pricelevel', 'bid_capacity'],
  interconnectors: ['interconnector_id', 'region_start', 'region_end', 'interconnector_capacity'],
} as const;
