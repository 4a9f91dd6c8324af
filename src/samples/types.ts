/**
 * Market sample types
 */

export interface SampleStats {
  sampleCount: number;
  /** Ratings that were missing (<= 0) and replaced by the mean. */
  missingRatings: number;
  /** Mean of the known ratings; 0 when none were known. */
  meanRating: number;
  /** Where the samples came from (file path, provider name). */
  source: string;
}

export interface SampleSet {
  prices: number[];
  ratings: number[];
  stats: SampleStats;
}

/** Parsed rows before imputation. A rating of 0 means "missing". */
export interface RawSamples {
  prices: number[];
  ratings: number[];
  skippedRows: number;
}

/**
 * Source of (price, rating) observations for a named product.
 */
export interface SampleProvider {
  readonly name: string;
  fetchSamples(productName: string): Promise<SampleSet>;
}
