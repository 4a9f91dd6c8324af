/**
 * Golden-section search for the maximum of a unimodal function on [low, high].
 *
 * Each narrowing step reuses one interior evaluation, so a run costs
 * iterations + 3 evaluations of the objective.
 */

import { createLogger } from '../utils/logger';
import { InvalidBracketError, NonFiniteEvaluationError } from './errors';
import type { GoldenSectionOptions, GoldenSectionResult } from './types';

const logger = createLogger('golden-section');

/** (sqrt(5) - 1) / 2 ≈ 0.618 */
export const INV_PHI = (Math.sqrt(5) - 1) / 2;

export const DEFAULT_TOLERANCE = 1e-3;
export const DEFAULT_MAX_ITERATIONS = 100;

export function goldenSectionMaximize(
  f: (x: number) => number,
  low: number,
  high: number,
  options: GoldenSectionOptions = {},
): GoldenSectionResult {
  const tolerance = options.tolerance ?? DEFAULT_TOLERANCE;
  const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;

  if (!Number.isFinite(low) || !Number.isFinite(high) || low > high) {
    throw new InvalidBracketError(low, high);
  }

  const evaluate = (x: number): number => {
    const value = f(x);
    if (!Number.isFinite(value)) {
      throw new NonFiniteEvaluationError(x, value);
    }
    return value;
  };

  let a = low;
  let b = high;
  let x1 = b - INV_PHI * (b - a);
  let x2 = a + INV_PHI * (b - a);
  let f1 = evaluate(x1);
  let f2 = evaluate(x2);
  let iterations = 0;

  while (Math.abs(b - a) > tolerance && iterations < maxIterations) {
    iterations++;
    if (f1 > f2) {
      // Maximum lies in [a, x2]
      b = x2;
      x2 = x1;
      f2 = f1;
      x1 = b - INV_PHI * (b - a);
      f1 = evaluate(x1);
    } else {
      // Maximum lies in [x1, b]; ties land here
      a = x1;
      x1 = x2;
      f1 = f2;
      x2 = a + INV_PHI * (b - a);
      f2 = evaluate(x2);
    }
  }

  if (Math.abs(b - a) > tolerance) {
    logger.warn({ iterations, width: Math.abs(b - a), tolerance }, 'Iteration cap reached before tolerance');
  }

  const x = (a + b) / 2;
  return { x, value: evaluate(x), iterations };
}
