/**
 * Price Optimization Types
 */

// =============================================================================
// DEMAND
// =============================================================================

export interface DemandParameters {
  /** Theoretical maximum demand at price zero. Supplied or defaulted, never fitted. */
  aD: number;
  /** Price sensitivity: units of demand lost per unit of price. Always >= 0. */
  bD: number;
  /** Fit quality of the chosen regression on the transformed target. Informational. */
  r2: number;
  /** Intercept of the chosen fit (0 for the through-origin fit). */
  intercept: number;
  /** Raw fitted slope of (1 - demand proportion) against price. */
  slope: number;
  fitIntercept: boolean;
  /** True when the fitted slope was negative and its sign was flipped. */
  slopeSignCorrected: boolean;
  sampleCount: number;
}

export type EstimationFailureKind =
  | 'EmptyInput'
  | 'LengthMismatch'
  | 'NoValidData'
  | 'RegressionFailure';

export interface EstimationFailure {
  kind: EstimationFailureKind;
  message: string;
}

// =============================================================================
// SEARCH
// =============================================================================

export interface GoldenSectionOptions {
  /** Stop once the bracket is no wider than this. Default: 1e-3 */
  tolerance?: number;
  /** Hard cap on narrowing steps. Default: 100 */
  maxIterations?: number;
}

export interface GoldenSectionResult {
  x: number;
  value: number;
  iterations: number;
}

// =============================================================================
// ORCHESTRATION
// =============================================================================

export interface PriceBracket {
  low: number;
  high: number;
}

export interface OptimizationInput {
  prices: readonly number[];
  ratings: readonly number[];
  cost?: number;
  maxTheoreticalDemand?: number;
}

export interface OptimizationOptions {
  tolerance?: number;
}

export interface OptimizationResult {
  optimumPrice: number;
  maximumProfit: number;
  estimatedDemand: number;
  iterations: number;
  demandParameters: DemandParameters;
  priceRange: PriceBracket;
  cost: number;
}

export type OptimizationFailureKind =
  | EstimationFailureKind
  | 'NonFiniteProfit'
  | 'DegenerateInput';

export interface OptimizationFailure {
  kind: OptimizationFailureKind;
  message: string;
}

export type Outcome<T, E> = { ok: true; value: T } | { ok: false; error: E };
