/**
 * Optimizer error types
 */

export class OptimizationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OptimizationError';
  }
}

/**
 * Search bracket is unusable: a bound is not finite or low > high.
 */
export class InvalidBracketError extends OptimizationError {
  readonly low: number;
  readonly high: number;

  constructor(low: number, high: number) {
    super(`Invalid search bracket [${low}, ${high}]`);
    this.name = 'InvalidBracketError';
    this.low = low;
    this.high = high;
  }
}

/**
 * The objective returned NaN or an infinity. Comparisons against such values
 * would steer the search arbitrarily, so the search stops here.
 */
export class NonFiniteEvaluationError extends OptimizationError {
  readonly x: number;
  readonly value: number;

  constructor(x: number, value: number) {
    super(`Objective returned non-finite value ${value} at x=${x}`);
    this.name = 'NonFiniteEvaluationError';
    this.x = x;
    this.value = value;
  }
}
