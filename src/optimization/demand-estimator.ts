/**
 * Demand Estimation
 *
 * Turns observed (price, rating) samples into a linear demand curve
 * Q(p) = aD - bD * p. Ratings act as a proxy for relative demand: they are
 * normalized against the best-rated sample, and 1 - proportion is regressed
 * on price with ordinary least squares.
 */

import { createLogger } from '../utils/logger';
import type {
  DemandParameters,
  EstimationFailure,
  EstimationFailureKind,
  Outcome,
} from './types';

const logger = createLogger('demand-estimator');

/** Ratings are multiplied by this before normalization. */
const RATING_SCALE = 100;

/** Intercepts smaller than this in magnitude switch to the through-origin fit. */
export const INTERCEPT_THRESHOLD = 0.05;

export const MIN_DEFAULT_DEMAND = 100;

// =============================================================================
// HELPERS
// =============================================================================

interface LinearFit {
  slope: number;
  intercept: number;
  fitIntercept: boolean;
}

function fail(kind: EstimationFailureKind, message: string): Outcome<DemandParameters, EstimationFailure> {
  return { ok: false, error: { kind, message } };
}

function mean(values: readonly number[]): number {
  return values.reduce((s, v) => s + v, 0) / values.length;
}

/**
 * Least-squares fit of y on x. A zero-variance x yields slope 0 (the
 * minimum-norm solution) rather than a division by zero.
 */
export function fitLinear(x: readonly number[], y: readonly number[], fitIntercept: boolean): LinearFit {
  if (fitIntercept) {
    const xMean = mean(x);
    const yMean = mean(y);
    let sxy = 0;
    let sxx = 0;
    for (let i = 0; i < x.length; i++) {
      const dx = x[i] - xMean;
      sxy += dx * (y[i] - yMean);
      sxx += dx * dx;
    }
    const slope = sxx === 0 ? 0 : sxy / sxx;
    return { slope, intercept: yMean - slope * xMean, fitIntercept };
  }

  let sxy = 0;
  let sxx = 0;
  for (let i = 0; i < x.length; i++) {
    sxy += x[i] * y[i];
    sxx += x[i] * x[i];
  }
  return { slope: sxx === 0 ? 0 : sxy / sxx, intercept: 0, fitIntercept };
}

/**
 * Coefficient of determination. With a constant target, a perfect fit
 * scores 1 and anything else scores 0.
 */
export function rSquared(y: readonly number[], predicted: readonly number[]): number {
  const yMean = mean(y);
  let ssRes = 0;
  let ssTot = 0;
  for (let i = 0; i < y.length; i++) {
    ssRes += (y[i] - predicted[i]) ** 2;
    ssTot += (y[i] - yMean) ** 2;
  }
  if (ssTot === 0) return ssRes === 0 ? 1 : 0;
  return 1 - ssRes / ssTot;
}

export function defaultMaxTheoreticalDemand(sampleCount: number): number {
  return Math.max(MIN_DEFAULT_DEMAND, Math.floor(sampleCount * 0.1));
}

// =============================================================================
// estimateDemand
// =============================================================================

/**
 * Estimate demand-curve parameters, reporting why estimation failed when it does.
 *
 * `maxTheoreticalDemand` becomes aD as given; when absent (or not a positive
 * finite number) it defaults to max(100, floor(0.1 * sampleCount)).
 */
export function estimateDemand(
  prices: readonly number[],
  ratings: readonly number[],
  maxTheoreticalDemand?: number,
): Outcome<DemandParameters, EstimationFailure> {
  if (prices.length === 0 || ratings.length === 0) {
    return fail('EmptyInput', 'Empty prices or ratings data');
  }
  if (prices.length !== ratings.length) {
    return fail(
      'LengthMismatch',
      `Prices and ratings have different lengths (${prices.length} vs ${ratings.length})`,
    );
  }

  const x: number[] = [];
  const scaled: number[] = [];
  for (let i = 0; i < prices.length; i++) {
    const price = prices[i];
    const rating = ratings[i] * RATING_SCALE;
    if (!Number.isFinite(price) || !Number.isFinite(rating)) continue;
    x.push(price);
    scaled.push(rating);
  }

  if (x.length === 0) {
    return fail('NoValidData', 'No valid data for demand estimation');
  }

  const maxRating = scaled.reduce((max, r) => (r > max ? r : max), -Infinity);
  if (!(maxRating > 0)) {
    return fail('RegressionFailure', 'Ratings have no positive maximum to normalize against');
  }

  // Model: demand_proportion = 1 - (bD / aD) * price
  const y = scaled.map((r) => 1 - r / maxRating);

  const withIntercept = fitLinear(x, y, true);
  let fit: LinearFit;
  if (Math.abs(withIntercept.intercept) < INTERCEPT_THRESHOLD) {
    logger.debug({ intercept: withIntercept.intercept }, 'Intercept close to zero, using model without intercept');
    fit = fitLinear(x, y, false);
  } else {
    logger.debug({ intercept: withIntercept.intercept }, 'Using model with intercept');
    fit = withIntercept;
  }

  if (!Number.isFinite(fit.slope) || !Number.isFinite(fit.intercept)) {
    return fail('RegressionFailure', `Regression produced non-finite coefficients (slope=${fit.slope})`);
  }

  let aD: number;
  if (maxTheoreticalDemand !== undefined && Number.isFinite(maxTheoreticalDemand) && maxTheoreticalDemand > 0) {
    aD = maxTheoreticalDemand;
  } else {
    aD = defaultMaxTheoreticalDemand(prices.length);
    logger.info({ aD }, 'Using default max theoretical demand');
  }

  const slopeSignCorrected = fit.slope < 0;
  if (slopeSignCorrected) {
    logger.warn({ slope: fit.slope }, 'Negative price sensitivity detected, using absolute value');
  }
  const bD = Math.abs(fit.slope) * aD;

  const predicted = x.map((p) => fit.intercept + fit.slope * p);
  const r2 = rSquared(y, predicted);

  logger.info(
    { aD, bD, r2, fitIntercept: fit.fitIntercept, samples: x.length },
    'Estimated demand function parameters',
  );

  const params: DemandParameters = Object.freeze({
    aD,
    bD,
    r2,
    intercept: fit.intercept,
    slope: fit.slope,
    fitIntercept: fit.fitIntercept,
    slopeSignCorrected,
    sampleCount: x.length,
  });

  return { ok: true, value: params };
}

/**
 * Same as {@link estimateDemand}, with every failure logged and flattened to null.
 */
export function estimateDemandParameters(
  prices: readonly number[],
  ratings: readonly number[],
  maxTheoreticalDemand?: number,
): DemandParameters | null {
  const outcome = estimateDemand(prices, ratings, maxTheoreticalDemand);
  if (!outcome.ok) {
    logger.error({ kind: outcome.error.kind }, outcome.error.message);
    return null;
  }
  return outcome.value;
}

// =============================================================================
// DEMAND / PROFIT FUNCTIONS
// =============================================================================

/** Q(p) = max(0, aD - bD * p). Demand never goes negative. */
export function demandAt(price: number, params: Pick<DemandParameters, 'aD' | 'bD'>): number {
  return Math.max(0, params.aD - params.bD * price);
}

/** K(p) = (p - cost) * Q(p). */
export function profitAt(price: number, cost: number, params: Pick<DemandParameters, 'aD' | 'bD'>): number {
  return (price - cost) * demandAt(price, params);
}
