export * from './services/marketClearing';
export { resolveSolverParams, solverParamsFromEnv } from './config/solverConfig';
export { DEFAULT_SOLVER_PARAMS } from './_domain';
