/**
 * Price Optimization - composes demand estimation with golden-section search
 *
 * profit(p) = (p - cost) * max(0, aD - bD * p), maximized over the observed
 * price range.
 */

import { createLogger } from '../utils/logger';
import { estimateDemand, demandAt, profitAt } from './demand-estimator';
import { goldenSectionMaximize } from './golden-section';
import { InvalidBracketError, NonFiniteEvaluationError } from './errors';
import type {
  GoldenSectionResult,
  OptimizationFailure,
  OptimizationInput,
  OptimizationOptions,
  OptimizationResult,
  Outcome,
  PriceBracket,
} from './types';

const logger = createLogger('optimizer');

export const FALLBACK_BRACKET: Readonly<PriceBracket> = Object.freeze({ low: 0, high: 1000 });
export const FALLBACK_COST = 10;
export const DEFAULT_COST_RATIO = 0.7;

// =============================================================================
// HELPERS
// =============================================================================

export function getPriceRange(prices: readonly number[]): PriceBracket {
  let low = Infinity;
  let high = -Infinity;
  for (const p of prices) {
    if (!Number.isFinite(p)) continue;
    if (p < low) low = p;
    if (p > high) high = p;
  }
  if (low > high) return { ...FALLBACK_BRACKET };
  return { low, high };
}

export function defaultCost(prices: readonly number[]): number {
  let low = Infinity;
  for (const p of prices) {
    if (Number.isFinite(p) && p < low) low = p;
  }
  if (low === Infinity) return FALLBACK_COST;
  return low * DEFAULT_COST_RATIO;
}

// =============================================================================
// tryRunOptimization
// =============================================================================

export function tryRunOptimization(
  input: OptimizationInput,
  options: OptimizationOptions = {},
): Outcome<OptimizationResult, OptimizationFailure> {
  const { prices, ratings } = input;

  const priceRange = getPriceRange(prices);
  logger.info(priceRange, 'Price range');

  const estimated = estimateDemand(prices, ratings, input.maxTheoreticalDemand);
  if (!estimated.ok) {
    return { ok: false, error: estimated.error };
  }
  const params = estimated.value;

  let cost: number;
  if (input.cost === undefined) {
    cost = defaultCost(prices);
    logger.info({ cost }, 'Using default cost');
  } else {
    cost = input.cost;
  }

  let search: GoldenSectionResult;
  try {
    search = goldenSectionMaximize(
      (price) => profitAt(price, cost, params),
      priceRange.low,
      priceRange.high,
      { tolerance: options.tolerance },
    );
  } catch (err) {
    if (err instanceof NonFiniteEvaluationError) {
      return { ok: false, error: { kind: 'NonFiniteProfit', message: err.message } };
    }
    if (err instanceof InvalidBracketError) {
      return { ok: false, error: { kind: 'DegenerateInput', message: err.message } };
    }
    throw err;
  }

  const estimatedDemand = demandAt(search.x, params);

  logger.info(
    {
      iterations: search.iterations,
      optimumPrice: search.x,
      maximumProfit: search.value,
      estimatedDemand,
    },
    'Optimization complete',
  );

  const result: OptimizationResult = Object.freeze({
    optimumPrice: search.x,
    maximumProfit: search.value,
    estimatedDemand,
    iterations: search.iterations,
    demandParameters: params,
    priceRange: Object.freeze(priceRange),
    cost,
  });

  return { ok: true, value: result };
}

// =============================================================================
// runOptimization
// =============================================================================

/**
 * Run the full pipeline. Any failure is logged and reported as null; use
 * {@link tryRunOptimization} to learn why.
 */
export function runOptimization(
  prices: readonly number[],
  ratings: readonly number[],
  cost?: number,
  maxTheoreticalDemand?: number,
  options: OptimizationOptions = {},
): OptimizationResult | null {
  const outcome = tryRunOptimization({ prices, ratings, cost, maxTheoreticalDemand }, options);
  if (!outcome.ok) {
    logger.error({ kind: outcome.error.kind }, `Optimization failed: ${outcome.error.message}`);
    return null;
  }
  return outcome.value;
}
