/**
 * @regionguard/ml - Anomaly Scoring
 *
 * Modules:
 * - anomaly-scorer.ts: per-signal scoring over the sample store
 * - isolation-forest.ts: default incremental outlier model
 * - scorer-types.ts: OutlierScorer contract
 * - feature-math.ts: path-length math and sample features
 * - random.ts: seeded PRNG
 */

export { AnomalyScorer } from './anomaly-scorer';
export type { AnomalyScorerConfig } from './anomaly-scorer';

export { IsolationForest } from './isolation-forest';
export type { FeatureRow, IsolationForestConfig, OutlierScorer } from './scorer-types';

export {
  EULER_GAMMA,
  harmonicNumber,
  averagePathLength,
  columnRanges,
  splittableColumns,
  sampleFeatures,
  clamp,
} from './feature-math';
export type { ColumnRange } from './feature-math';

export { createRandom, randomInt } from './random';
export type { RandomSource } from './random';
