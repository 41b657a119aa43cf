/**
 * ============================================================================
 * NUMERIC HELPERS - solver value cleanup
 * ============================================================================
 *
 * Import from '@/_domain':
 *
 *   import { cleanValue } from '@/_domain';
 *
 * ============================================================================
 */

import { SOLVER_TOLERANCE } from './constants';

/**
 * True when a solved value is indistinguishable from zero
 */
export function isNegligible(value: number, tolerance: number = SOLVER_TOLERANCE.ZERO): boolean {
  return Math.abs(value) < tolerance;
}

/**
 * Snap solver noise (e.g. -3e-14) to exactly 0.
 * Everything else passes through unchanged.
 */
export function cleanValue(value: number, tolerance: number = SOLVER_TOLERANCE.ZERO): number {
  return isNegligible(value, tolerance) ? 0 : value;
}
