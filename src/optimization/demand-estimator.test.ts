import { describe, it, expect } from 'vitest';
import {
  estimateDemand,
  estimateDemandParameters,
  fitLinear,
  rSquared,
  demandAt,
  profitAt,
  defaultMaxTheoreticalDemand,
} from './demand-estimator';

// =============================================================================
// Input validation
// =============================================================================

describe('estimateDemand input validation', () => {
  it('fails with EmptyInput when prices are empty', () => {
    const outcome = estimateDemand([], [4, 5]);
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) expect(outcome.error.kind).toBe('EmptyInput');
  });

  it('fails with EmptyInput when ratings are empty', () => {
    const outcome = estimateDemand([10, 20], []);
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) expect(outcome.error.kind).toBe('EmptyInput');
  });

  it('fails with LengthMismatch when lengths differ', () => {
    const outcome = estimateDemand([10, 20, 30], [4, 5]);
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.kind).toBe('LengthMismatch');
      expect(outcome.error.message).toBe('Prices and ratings have different lengths (3 vs 2)');
    }
  });

  it('fails with NoValidData when every row has a missing value', () => {
    const outcome = estimateDemand([NaN, 20], [4, NaN]);
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) expect(outcome.error.kind).toBe('NoValidData');
  });

  it('fails with RegressionFailure when every rating is zero', () => {
    const outcome = estimateDemand([10, 20], [0, 0]);
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) expect(outcome.error.kind).toBe('RegressionFailure');
  });

  it('flattens failures to null', () => {
    expect(estimateDemandParameters([], [])).toBeNull();
    expect(estimateDemandParameters([10], [1, 2])).toBeNull();
  });
});

// =============================================================================
// Fitting
// =============================================================================

describe('estimateDemand fitting', () => {
  it('gives zero price sensitivity for constant ratings', () => {
    const params = estimateDemandParameters([10, 20, 30, 40, 50], [4, 4, 4, 4, 4], 100);

    expect(params).not.toBeNull();
    expect(params?.aD).toBe(100);
    expect(params?.bD).toBe(0);
    expect(params?.r2).toBe(1);
    expect(params?.fitIntercept).toBe(false);
    expect(params?.intercept).toBe(0);
    expect(params?.slopeSignCorrected).toBe(false);
  });

  it('keeps the intercept fit when the intercept is large', () => {
    // proportions 1, .75, .5, .25 -> y = 0, .25, .5, .75 = 0.025 * price - 0.25
    const params = estimateDemandParameters([10, 20, 30, 40], [4, 3, 2, 1]);

    expect(params?.fitIntercept).toBe(true);
    expect(params?.intercept).toBeCloseTo(-0.25, 10);
    expect(params?.slope).toBeCloseTo(0.025, 10);
    expect(params?.bD).toBeCloseTo(2.5, 8);
    expect(params?.aD).toBe(100);
    expect(params?.r2).toBeCloseTo(1, 10);
    expect(params?.slopeSignCorrected).toBe(false);
  });

  it('switches to the through-origin fit when the intercept is near zero', () => {
    // y = 0, .1, .2 at prices 1, 11, 21 -> intercept -0.01
    const params = estimateDemandParameters([1, 11, 21], [5, 4.5, 4], 50);

    expect(params?.fitIntercept).toBe(false);
    expect(params?.intercept).toBe(0);
    expect(params?.slope).toBeCloseTo(5.3 / 563, 10);
    expect(params?.bD).toBeCloseTo((50 * 5.3) / 563, 8);
    expect(params?.r2).toBeGreaterThan(0.99);
    expect(params?.r2).toBeLessThan(1);
  });

  it('flips a negative slope so bD stays non-negative', () => {
    // Ratings rise with price: y = 2/3, 1/3, 0 -> slope -1/30
    const params = estimateDemandParameters([10, 20, 30], [1, 2, 3]);

    expect(params?.slope).toBeCloseTo(-1 / 30, 10);
    expect(params?.bD).toBeCloseTo(100 / 30, 8);
    expect(params?.bD).toBeGreaterThanOrEqual(0);
    expect(params?.slopeSignCorrected).toBe(true);
    expect(params?.fitIntercept).toBe(true);
    expect(params?.intercept).toBeCloseTo(1, 10);
  });

  it('tolerates zero ratings without imputing them', () => {
    const params = estimateDemandParameters([10, 20, 30], [4, 0, 4]);

    // y = 0, 1, 0: flat trend, intercept 1/3
    expect(params?.slope).toBeCloseTo(0, 10);
    expect(params?.intercept).toBeCloseTo(1 / 3, 10);
    expect(params?.sampleCount).toBe(3);
  });

  it('drops rows with non-finite values before fitting', () => {
    const params = estimateDemandParameters([10, NaN, 20, 30, 40], [4, 2, 3, 2, 1]);

    expect(params?.sampleCount).toBe(4);
    expect(params?.slope).toBeCloseTo(0.025, 10);
  });

  it('returns a frozen record', () => {
    const params = estimateDemandParameters([10, 20], [4, 3]);
    expect(Object.isFrozen(params)).toBe(true);
  });
});

// =============================================================================
// Max theoretical demand
// =============================================================================

describe('max theoretical demand', () => {
  it('defaults to 100 for small samples', () => {
    expect(defaultMaxTheoreticalDemand(5)).toBe(100);
    expect(defaultMaxTheoreticalDemand(1009)).toBe(100);
  });

  it('scales with sample count for large samples', () => {
    expect(defaultMaxTheoreticalDemand(2000)).toBe(200);
    expect(defaultMaxTheoreticalDemand(2345)).toBe(234);
  });

  it('applies the default when the supplied value is not positive', () => {
    expect(estimateDemandParameters([10, 20], [4, 3], 0)?.aD).toBe(100);
    expect(estimateDemandParameters([10, 20], [4, 3], -5)?.aD).toBe(100);
  });

  it('handles a few hundred thousand samples', () => {
    const n = 300_000;
    const prices = Array.from({ length: n }, (_, i) => 10 + (i % 100));
    const ratings = Array.from({ length: n }, (_, i) => (i === n - 1 ? 5 : 4));

    const outcome = estimateDemand(prices, ratings);

    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      expect(outcome.value.aD).toBe(30_000);
      expect(outcome.value.sampleCount).toBe(n);
    }
  });

  it('uses a supplied positive value as aD', () => {
    expect(estimateDemandParameters([10, 20], [4, 3], 250)?.aD).toBe(250);
  });
});

// =============================================================================
// Helpers
// =============================================================================

describe('fitLinear', () => {
  it('fits slope and intercept', () => {
    const fit = fitLinear([1, 2, 3], [3, 5, 7], true);
    expect(fit.slope).toBeCloseTo(2, 10);
    expect(fit.intercept).toBeCloseTo(1, 10);
  });

  it('fits through the origin', () => {
    const fit = fitLinear([1, 2], [2, 4], false);
    expect(fit.slope).toBeCloseTo(2, 10);
    expect(fit.intercept).toBe(0);
  });

  it('returns slope 0 for a constant predictor', () => {
    const fit = fitLinear([5, 5, 5], [1, 2, 3], true);
    expect(fit.slope).toBe(0);
    expect(fit.intercept).toBe(2);
  });
});

describe('rSquared', () => {
  it('is 1 for a perfect fit', () => {
    expect(rSquared([1, 2, 3], [1, 2, 3])).toBe(1);
  });

  it('is 0 when predicting the mean', () => {
    expect(rSquared([1, 2, 3], [2, 2, 2])).toBe(0);
  });

  it('can go negative for a fit worse than the mean', () => {
    expect(rSquared([1, 2, 3], [3, 2, 1])).toBe(-3);
  });

  it('is 0 for an imperfect fit of a constant target', () => {
    expect(rSquared([2, 2], [1, 3])).toBe(0);
  });
});

describe('demandAt / profitAt', () => {
  const params = { aD: 100, bD: 2 };

  it('is linear below the choke price', () => {
    expect(demandAt(25, params)).toBe(50);
  });

  it('floors demand at zero above aD / bD', () => {
    expect(demandAt(50, params)).toBe(0);
    expect(demandAt(60, params)).toBe(0);
    expect(demandAt(1e6, params)).toBe(0);
  });

  it('computes profit as margin times demand', () => {
    // (30 - 5) * (100 - 60) = 1000
    expect(profitAt(30, 5, params)).toBe(1000);
    expect(profitAt(70, 5, params)).toBe(0);
  });
});
