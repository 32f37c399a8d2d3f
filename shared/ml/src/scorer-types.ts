/**
 * Shared types for outlier scoring.
 *
 * Any technique that can be fitted incrementally and scores a row in [0, 1]
 * can stand behind the anomaly scorer.
 */

export type FeatureRow = readonly number[];

export interface OutlierScorer {
  /**
   * Feed new rows. May rebuild internal state.
   *
   * @throws ModelFailure when the accumulated data cannot be modelled
   */
  partialFit(rows: readonly FeatureRow[]): void;

  /**
   * Outlier score in [0, 1]; 0 means "looks ordinary".
   *
   * @throws ModelFailure when called before a successful fit
   */
  score(row: FeatureRow): number;

  /** Rows currently backing the model */
  readonly sampleCount: number;
}

export interface IsolationForestConfig {
  /** Number of trees (default: 64) */
  trees?: number;
  /** Rows drawn per tree (default: 16) */
  subsampleSize?: number;
  /** Rows retained for refits; oldest dropped first (default: 256) */
  maxBufferedRows?: number;
  /** PRNG seed (default: 42) */
  seed?: number;
}
