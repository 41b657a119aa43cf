/**
 * LP Solver Wrapper using HiGHS
 *
 * Uses the HiGHS WebAssembly build for the market clearing LP.
 * Falls back to GLPK.js when HiGHS throws (load failure, WASM abort).
 *
 * Handles:
 * - Lazy loading of solver modules
 * - Trivial problems (no variables, empty rows) without a solver call
 * - Problem conversion to CPLEX LP format
 * - Status mapping and solution extraction
 */

import highsLoader from 'highs';
import GLPK from 'glpk.js';
import { LP_FORMAT, SOLVER_TOLERANCE } from '@/_domain';
import type { LPConstraint, LPProblem, MarketSolverParams, SolverSolution, SolverStatus } from '../types';
import { SolverError, errorMessage } from '../errors';
import { createLogger, type Logger } from '../utils/logger';

type HighsInstance = Awaited<ReturnType<typeof highsLoader>>;
type GLPKInstance = Awaited<ReturnType<typeof GLPK>>;
type GLPKProblem = Parameters<GLPKInstance['solve']>[0];
type GLPKOptions = Parameters<GLPKInstance['solve']>[1];

// Solver instances (lazy loaded, stateless between solves)
let highsLoadPromise: Promise<HighsInstance> | null = null;
let glpkLoadPromise: Promise<GLPKInstance> | null = null;

/**
 * Get or load HiGHS instance
 */
async function getHiGHS(log: Logger): Promise<HighsInstance> {
  if (!highsLoadPromise) {
    log.info('Loading HiGHS WebAssembly...');
    highsLoadPromise = highsLoader().catch((error: unknown) => {
      // Allow a fresh load attempt on the next solve
      highsLoadPromise = null;
      throw error;
    });
  }
  return highsLoadPromise;
}

/**
 * Get or load GLPK instance
 */
async function getGLPK(log: Logger): Promise<GLPKInstance> {
  if (!glpkLoadPromise) {
    log.info('Loading GLPK.js...');
    glpkLoadPromise = Promise.resolve()
      .then(() => GLPK())
      .catch((error: unknown) => {
        glpkLoadPromise = null;
        throw error;
      });
  }
  return glpkLoadPromise;
}

/**
 * Constraint rows that still carry at least one non-zero term
 */
function nonEmptyTerms(constraint: LPConstraint): LPConstraint['variables'] {
  return constraint.variables.filter(v => Math.abs(v.coefficient) >= SOLVER_TOLERANCE.COEFFICIENT);
}

function relationSymbol(type: LPConstraint['type']): string {
  return type === 'eq' ? '=' : type === 'le' ? '<=' : '>=';
}

/**
 * Does 0 (op) rhs hold?
 */
function emptyRowHolds(constraint: LPConstraint): boolean {
  const tol = SOLVER_TOLERANCE.ZERO;
  if (constraint.type === 'eq') return Math.abs(constraint.rhs) < tol;
  if (constraint.type === 'le') return constraint.rhs > -tol;
  return constraint.rhs < tol;
}

/**
 * Settle problems no solver needs to see:
 * - an empty row that cannot hold (e.g. 0 = 80) makes the LP infeasible
 * - no variables at all and every empty row holding is optimal at cost 0
 * Returns null when the problem has to go to a solver.
 */
export function presolveTrivial(problem: LPProblem): SolverSolution | null {
  for (const constraint of problem.constraints) {
    if (nonEmptyTerms(constraint).length > 0) continue;
    if (!emptyRowHolds(constraint)) {
      return {
        status: 'infeasible',
        solver: 'presolve',
        solveTimeMs: 0,
        error: `Constraint ${constraint.name} has no variables: 0 ${relationSymbol(constraint.type)} ${constraint.rhs}`
      };
    }
  }

  if (problem.numVariables === 0) {
    return {
      status: 'optimal',
      objectiveValue: 0,
      values: new Map(),
      solver: 'presolve',
      solveTimeMs: 0
    };
  }

  return null;
}

/**
 * Shortest text that parses back to the same double (e.g. 4e-7, 100.1234567),
 * so HiGHS sees exactly the numbers GLPK is handed.
 */
function formatNumber(value: number): string {
  return String(value);
}

function formatTerm(coefficient: number, name: string): string {
  return `${coefficient >= 0 ? '+' : '-'} ${formatNumber(Math.abs(coefficient))} ${name}`;
}

/**
 * Append terms to `lines`, starting a new line whenever `head` would grow
 * past MAX_LINE_LENGTH. Returns the unfinished last line.
 */
function wrapTerms(lines: string[], head: string, terms: string[]): string {
  let currentLine = head;
  for (const term of terms) {
    if (currentLine.length + term.length + 1 > LP_FORMAT.MAX_LINE_LENGTH && currentLine.trim() !== '') {
      lines.push(currentLine);
      currentLine = ' ' + term;
    } else {
      currentLine += ' ' + term;
    }
  }
  return currentLine;
}

/**
 * Convert LPProblem to LP format string for HiGHS.
 * Variables keep their compact builder names (d0, f0 ...); rows are c0, c1 ...
 * Rows with no terms are skipped: presolveTrivial() has already checked them.
 */
export function problemToLPFormat(problem: LPProblem): string {
  const lines: string[] = [];
  const allVars = [...problem.dispatchVars.map(v => v.name), ...problem.flowVars.map(v => v.name)];

  // Objective function
  lines.push('Minimize');
  const objectiveTerms: string[] = [];
  for (const name of allVars) {
    const coef = problem.objectiveCoefficients.get(name) ?? 0;
    if (Math.abs(coef) >= SOLVER_TOLERANCE.COEFFICIENT) {
      objectiveTerms.push(formatTerm(coef, name));
    }
  }
  if (objectiveTerms.length === 0 && allVars.length > 0) {
    // LP format requires at least one term
    objectiveTerms.push(`+ 0 ${allVars[0]}`);
  }
  lines.push(wrapTerms(lines, ' obj:', objectiveTerms));

  // Constraints
  lines.push('Subject To');
  let rowIdx = 0;
  for (const constraint of problem.constraints) {
    const terms = nonEmptyTerms(constraint).map(v => formatTerm(v.coefficient, v.name));
    if (terms.length === 0) continue;

    const relation = `${relationSymbol(constraint.type)} ${formatNumber(constraint.rhs)}`;
    lines.push(wrapTerms(lines, ` ${LP_FORMAT.CONSTRAINT_PREFIX}${rowIdx++}:`, [...terms, relation]));
  }

  // Bounds
  lines.push('Bounds');
  for (const v of problem.dispatchVars) {
    lines.push(` ${v.name} >= 0`);
  }
  for (const v of problem.flowVars) {
    lines.push(` ${formatNumber(v.lower)} <= ${v.name} <= ${formatNumber(v.upper)}`);
  }

  lines.push('End');

  return lines.join('\n');
}

/**
 * Map a HiGHS model status string onto SolverStatus
 */
export function mapHighsStatus(status: string): SolverStatus {
  switch (status) {
    case 'Optimal':
      return 'optimal';
    case 'Infeasible':
    case 'Primal infeasible or unbounded':
      return 'infeasible';
    case 'Unbounded':
      return 'unbounded';
    case 'Time limit reached':
    case 'Iteration limit reached':
      return 'timeout';
    default:
      return status.toLowerCase().endsWith('error') ? 'error' : 'indeterminate';
  }
}

/**
 * An optimal solve has to report every variable. If it does not, the
 * solution cannot be trusted and is reported as an error instead.
 */
function completeSolution(
  problem: LPProblem,
  values: Map<string, number>,
  objectiveValue: number,
  solver: 'highs' | 'glpk',
  solveTimeMs: number
): SolverSolution {
  const missing = [...problem.dispatchVars, ...problem.flowVars].filter(v => !values.has(v.name));
  if (missing.length > 0) {
    return {
      status: 'error',
      solver,
      solveTimeMs,
      error: `Solver reported optimal but omitted ${missing.length} variable value(s)`
    };
  }
  return { status: 'optimal', objectiveValue, values, solver, solveTimeMs };
}

function logDiagnostics(problem: LPProblem, lpString: string, log: Logger): void {
  const lpLines = lpString.split('\n');
  log.debug(`LP format: ${Math.round(lpString.length / 1024)}KB, ${lpLines.length} lines`);
  log.debug('LP format preview:\n' + [...lpLines.slice(0, 5), '...', ...lpLines.slice(-5)].join('\n'));

  const numNonZeros = problem.constraints.reduce((sum, c) => sum + c.variables.length, 0);
  const cells = problem.numConstraints * problem.numVariables;
  log.debug('Matrix diagnostics:', {
    constraints: problem.numConstraints,
    variables: problem.numVariables,
    nonZeros: numNonZeros,
    density: cells > 0 ? `${((numNonZeros / cells) * 100).toFixed(2)}%` : 'n/a'
  });
}

/**
 * Solve using HiGHS. Throws when HiGHS itself fails so the caller can fall back.
 */
export async function solveWithHiGHS(problem: LPProblem, params: MarketSolverParams): Promise<SolverSolution> {
  const log = createLogger('HiGHS', params.log_level);
  const startTime = Date.now();

  const highs = await getHiGHS(log);
  const lpString = problemToLPFormat(problem);
  logDiagnostics(problem, lpString, log);

  log.info(`Solving problem (${problem.numVariables} vars, ${problem.numConstraints} constraints)...`);
  let solution: ReturnType<HighsInstance['solve']>;
  try {
    solution = params.time_limit_seconds > 0
      ? highs.solve(lpString, { time_limit: params.time_limit_seconds })
      : highs.solve(lpString);
  } catch (error) {
    // A WASM abort can leave the module unusable: load a fresh one next time
    log.error(`Solve failed: ${errorMessage(error)}`);
    highsLoadPromise = null;
    throw error;
  }

  const solveTimeMs = Date.now() - startTime;
  const rawStatus: string = solution.Status;
  const status = mapHighsStatus(rawStatus);
  log.info(`Solve completed in ${solveTimeMs}ms, status: ${rawStatus}`);

  if (status !== 'optimal') {
    return {
      status,
      solver: 'highs',
      solveTimeMs,
      ...(status === 'error' || status === 'indeterminate' ? { error: `HiGHS status: ${rawStatus}` } : {})
    };
  }

  const values = new Map<string, number>();
  for (const [name, column] of Object.entries(solution.Columns)) {
    // Columns of a non-optimal solve carry no primal value
    if ('Primal' in column) values.set(name, column.Primal);
  }

  return completeSolution(problem, values, solution.ObjectiveValue, 'highs', solveTimeMs);
}

/**
 * Solve using GLPK (fallback)
 */
export async function solveWithGLPK(problem: LPProblem, params: MarketSolverParams): Promise<SolverSolution> {
  const log = createLogger('GLPK', params.log_level);
  const startTime = Date.now();

  const glpk = await getGLPK(log);

  const allVars = [...problem.dispatchVars.map(v => v.name), ...problem.flowVars.map(v => v.name)];

  const subjectTo: GLPKProblem['subjectTo'] = [];
  let rowIdx = 0;
  for (const constraint of problem.constraints) {
    const vars = nonEmptyTerms(constraint).map(v => ({ name: v.name, coef: v.coefficient }));
    if (vars.length === 0) continue;

    const bnds = constraint.type === 'eq'
      ? { type: glpk.GLP_FX, lb: constraint.rhs, ub: constraint.rhs }
      : constraint.type === 'le'
        ? { type: glpk.GLP_UP, lb: -Infinity, ub: constraint.rhs }
        : { type: glpk.GLP_LO, lb: constraint.rhs, ub: Infinity };

    subjectTo.push({ name: `${LP_FORMAT.CONSTRAINT_PREFIX}${rowIdx++}`, vars, bnds });
  }

  const glpkProblem: GLPKProblem = {
    name: 'market_clearing',
    objective: {
      direction: glpk.GLP_MIN,
      name: 'obj',
      vars: allVars.map(name => ({ name, coef: problem.objectiveCoefficients.get(name) ?? 0 }))
    },
    subjectTo,
    bounds: [
      ...problem.dispatchVars.map(v => ({ name: v.name, type: glpk.GLP_LO, lb: 0, ub: Infinity })),
      // GLPK rejects a double bound with lb == ub, so a zero-capacity link is fixed instead
      ...problem.flowVars.map(v => ({
        name: v.name,
        type: v.lower === v.upper ? glpk.GLP_FX : glpk.GLP_DB,
        lb: v.lower,
        ub: v.upper
      }))
    ]
  };

  const options: GLPKOptions = {
    msglev: params.log_level === 'debug' ? glpk.GLP_MSG_ALL : glpk.GLP_MSG_OFF,
    presol: false,
    ...(params.time_limit_seconds > 0 ? { tmlim: params.time_limit_seconds } : {})
  };

  log.info(`Solving problem (${problem.numVariables} vars, ${problem.numConstraints} constraints)...`);
  const result = await glpk.solve(glpkProblem, options);

  const solveTimeMs = Date.now() - startTime;
  const glpkStatus = result.result.status;
  log.info(`Solve completed in ${solveTimeMs}ms, status: ${glpkStatus}, objective: ${result.result.z}`);

  let status: SolverStatus;
  if (glpkStatus === glpk.GLP_OPT) {
    status = 'optimal';
  } else if (glpkStatus === glpk.GLP_INFEAS || glpkStatus === glpk.GLP_NOFEAS) {
    status = 'infeasible';
  } else if (glpkStatus === glpk.GLP_UNBND) {
    status = 'unbounded';
  } else {
    // GLP_UNDEF / GLP_FEAS: stopped without proving optimality
    log.warn(`Undefined status ${glpkStatus} (time limit or numerical issues)`);
    status = 'indeterminate';
  }

  if (status !== 'optimal') {
    return { status, solver: 'glpk', solveTimeMs };
  }

  const values = new Map<string, number>(Object.entries(result.result.vars));
  return completeSolution(problem, values, result.result.z, 'glpk', solveTimeMs);
}

/**
 * Solve the LP problem
 *
 * Layer 0: trivial problems are settled without a solver
 * Layer 1: configured backend (HiGHS by default)
 * Layer 2: the other backend, when the first one throws and fallback is enabled
 *
 * Solver verdicts (infeasible, unbounded, ...) come back as statuses.
 * Only when every backend throws does a SolverError propagate.
 */
export async function solveProblem(problem: LPProblem, params: MarketSolverParams): Promise<SolverSolution> {
  const log = createLogger('Solver', params.log_level);

  log.info(`Problem: ${problem.dispatchVars.length} dispatch vars, ${problem.flowVars.length} flow vars, ${problem.numConstraints} constraints`);

  const trivial = presolveTrivial(problem);
  if (trivial) {
    log.info(`Settled without a solver: ${trivial.status}`);
    return trivial;
  }

  const backends: MarketSolverParams['solver'][] = params.fallback_enabled
    ? [params.solver, params.solver === 'highs' ? 'glpk' : 'highs']
    : [params.solver];

  let lastError: unknown = null;
  for (const backend of backends) {
    try {
      return backend === 'highs'
        ? await solveWithHiGHS(problem, params)
        : await solveWithGLPK(problem, params);
    } catch (error) {
      lastError = error;
      log.error(`${backend} failed: ${errorMessage(error)}`);
    }
  }

  const lastBackend = backends[backends.length - 1];
  throw new SolverError(`All solver backends failed: ${errorMessage(lastError)}`, lastBackend, lastError);
}
