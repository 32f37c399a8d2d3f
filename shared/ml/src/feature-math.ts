/**
 * Feature Math for Outlier Scoring
 *
 * Numeric helpers shared by the isolation forest and the anomaly scorer:
 * harmonic numbers, the average unsuccessful-search path length of a binary
 * search tree, column ranges and feature extraction from health samples.
 */

import type { HealthSample } from '@regionguard/types';

/** Euler–Mascheroni constant */
export const EULER_GAMMA = 0.5772156649;

// =============================================================================
// Path Length
// =============================================================================

/**
 * Approximate harmonic number H(i) = ln(i) + γ.
 */
export function harmonicNumber(i: number): number {
  return Math.log(i) + EULER_GAMMA;
}

/**
 * Average path length of an unsuccessful BST search over n points,
 * c(n) = 2H(n - 1) - 2(n - 1)/n. Used to normalize isolation depths.
 */
export function averagePathLength(n: number): number {
  if (n <= 1) return 0;
  if (n === 2) return 1;
  return 2 * harmonicNumber(n - 1) - (2 * (n - 1)) / n;
}

// =============================================================================
// Columns
// =============================================================================

export interface ColumnRange {
  min: number;
  max: number;
}

/**
 * Min/max per column. Rows must share one width.
 */
export function columnRanges(rows: readonly (readonly number[])[]): ColumnRange[] {
  if (rows.length === 0) return [];
  const ranges: ColumnRange[] = rows[0].map(value => ({ min: value, max: value }));
  for (let r = 1; r < rows.length; r++) {
    const row = rows[r];
    for (let c = 0; c < ranges.length; c++) {
      const value = row[c];
      if (value < ranges[c].min) ranges[c].min = value;
      if (value > ranges[c].max) ranges[c].max = value;
    }
  }
  return ranges;
}

/**
 * Indices of columns that take more than one value.
 */
export function splittableColumns(ranges: readonly ColumnRange[]): number[] {
  const columns: number[] = [];
  for (let c = 0; c < ranges.length; c++) {
    if (ranges[c].max > ranges[c].min) columns.push(c);
  }
  return columns;
}

// =============================================================================
// Features
// =============================================================================

/**
 * Feature row of a sample: [successRatio, latencyMs, reachable].
 */
export function sampleFeatures(sample: HealthSample): number[] {
  return [sample.successRatio, sample.latencyMs, sample.reachable ? 1 : 0];
}

export function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min;
  return Math.min(max, Math.max(min, value));
}
