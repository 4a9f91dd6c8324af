/**
 * Replace missing ratings (<= 0 or not a number) with the mean of the known ones.
 */
export function imputeMissingRatings(ratings: readonly number[]): {
  ratings: number[];
  meanRating: number;
  missing: number;
} {
  const known = ratings.filter((r) => Number.isFinite(r) && r > 0);
  const meanRating = known.length > 0 ? known.reduce((s, r) => s + r, 0) / known.length : 0;
  const missing = ratings.length - known.length;

  return {
    ratings: ratings.map((r) => (Number.isFinite(r) && r > 0 ? r : meanRating)),
    meanRating,
    missing,
  };
}
