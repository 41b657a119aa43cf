/**
 * Domain constants shared by the market clearing services.
 *
 * Import from '@/_domain' rather than the individual files.
 */

export {
  SOLVER_TOLERANCE,
  LP_FORMAT,
  DEFAULT_SOLVER_PARAMS,
  SOLVER_ENV_VARS,
  TABLE_COLUMNS,
} from './constants';

export { isNegligible, cleanValue } from './calculations';
