/**
 * Human-readable rendering of an optimization result
 */

import type { OptimizationResult } from '../optimization/types';
import type { SampleStats } from '../samples/types';

export function formatResult(result: OptimizationResult, stats: SampleStats): string {
  const { demandParameters: params } = result;
  const lines = [
    '',
    '\x1b[1mPrice Optimization\x1b[0m',
    '',
    `  Samples:          ${stats.sampleCount} (${stats.missingRatings} missing ratings imputed)`,
    `  Price range:      ${result.priceRange.low.toFixed(2)} - ${result.priceRange.high.toFixed(2)}`,
    `  Unit cost:        ${result.cost.toFixed(2)}`,
    '',
    `  Demand model:     Q(p) = ${params.aD.toFixed(2)} - ${params.bD.toFixed(4)} * p`,
    `  R²:               ${params.r2.toFixed(4)}${params.fitIntercept ? '' : ' (through origin)'}`,
    '',
    `  \x1b[32mOptimum price:    ${result.optimumPrice.toFixed(2)}\x1b[0m`,
    `  Maximum profit:   ${result.maximumProfit.toFixed(2)}`,
    `  Estimated demand: ${result.estimatedDemand.toFixed(2)}`,
    `  Iterations:       ${result.iterations}`,
    '',
  ];
  if (params.slopeSignCorrected) {
    lines.splice(lines.length - 1, 0, '  \x1b[33mNote: ratings rose with price; sensitivity sign was flipped.\x1b[0m');
  }
  return lines.join('\n');
}
