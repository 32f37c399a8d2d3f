/**
 * Isolation Forest
 *
 * Ensemble of random isolation trees over a bounded buffer of recent rows.
 * Points that are isolated by few random splits are outliers.
 *
 * Features:
 * - Incremental: partialFit() appends rows and rebuilds from the buffer
 * - Deterministic: the PRNG is reseeded on every rebuild
 * - Splits only on columns that vary within a node
 * - Scores rescaled so ordinary points sit near 0
 *
 * Raw score s(x) = 2^(-E[h(x)] / c(ψ)); reported score = clamp((s - 0.5) / 0.5, 0, 1).
 */

import { ErrorCode, ModelFailure } from '@regionguard/types';
import {
  averagePathLength,
  clamp,
  columnRanges,
  splittableColumns,
} from './feature-math';
import { createRandom, randomInt } from './random';
import type { RandomSource } from './random';
import type { FeatureRow, IsolationForestConfig, OutlierScorer } from './scorer-types';

// =============================================================================
// Tree Nodes
// =============================================================================

type IsolationNode =
  | { leaf: true; size: number }
  | { leaf: false; column: number; split: number; left: IsolationNode; right: IsolationNode };

function buildTree(
  rows: readonly FeatureRow[],
  depth: number,
  heightLimit: number,
  random: RandomSource
): IsolationNode {
  if (depth >= heightLimit || rows.length <= 1) {
    return { leaf: true, size: rows.length };
  }

  const ranges = columnRanges(rows);
  const columns = splittableColumns(ranges);
  if (columns.length === 0) {
    return { leaf: true, size: rows.length };
  }

  const column = columns[randomInt(random, columns.length)];
  const { min, max } = ranges[column];
  const split = min + random() * (max - min);

  const left: FeatureRow[] = [];
  const right: FeatureRow[] = [];
  for (const row of rows) {
    (row[column] < split ? left : right).push(row);
  }

  return {
    leaf: false,
    column,
    split,
    left: buildTree(left, depth + 1, heightLimit, random),
    right: buildTree(right, depth + 1, heightLimit, random),
  };
}

function pathLength(node: IsolationNode, row: FeatureRow, depth: number): number {
  if (node.leaf) {
    return depth + averagePathLength(node.size);
  }
  return pathLength(row[node.column] < node.split ? node.left : node.right, row, depth + 1);
}

/**
 * Draw `size` distinct rows (partial Fisher-Yates).
 */
function subsample(rows: readonly FeatureRow[], size: number, random: RandomSource): FeatureRow[] {
  const pool = [...rows];
  const count = Math.min(size, pool.length);
  for (let i = 0; i < count; i++) {
    const j = i + randomInt(random, pool.length - i);
    const tmp = pool[i];
    pool[i] = pool[j];
    pool[j] = tmp;
  }
  return pool.slice(0, count);
}

// =============================================================================
// Forest
// =============================================================================

export class IsolationForest implements OutlierScorer {
  private readonly trees: number;
  private readonly subsampleSize: number;
  private readonly maxBufferedRows: number;
  private readonly seed: number;

  private buffer: FeatureRow[] = [];
  private forest: IsolationNode[] = [];
  private normalizer = 0;

  constructor(config: IsolationForestConfig = {}) {
    this.trees = config.trees ?? 64;
    this.subsampleSize = config.subsampleSize ?? 16;
    this.maxBufferedRows = config.maxBufferedRows ?? 256;
    this.seed = config.seed ?? 42;
  }

  get sampleCount(): number {
    return this.buffer.length;
  }

  partialFit(rows: readonly FeatureRow[]): void {
    for (const row of rows) {
      if (row.some(value => !Number.isFinite(value))) {
        throw new ModelFailure('Feature rows must be finite numbers', {
          code: ErrorCode.MODEL_FIT_FAILED,
          context: { row: [...row] },
        });
      }
      this.buffer.push([...row]);
    }
    if (this.buffer.length > this.maxBufferedRows) {
      this.buffer = this.buffer.slice(this.buffer.length - this.maxBufferedRows);
    }

    if (splittableColumns(columnRanges(this.buffer)).length === 0) {
      this.forest = [];
      throw new ModelFailure('Cannot isolate points: every buffered row is identical', {
        code: ErrorCode.MODEL_DEGENERATE_INPUT,
        context: { rows: this.buffer.length },
      });
    }

    this.rebuild();
  }

  score(row: FeatureRow): number {
    if (this.forest.length === 0) {
      throw new ModelFailure('Isolation forest has not been fitted', { code: ErrorCode.MODEL_FIT_FAILED });
    }

    let total = 0;
    for (const tree of this.forest) {
      total += pathLength(tree, row, 0);
    }
    const meanPath = total / this.forest.length;
    const raw = Math.pow(2, -meanPath / this.normalizer);
    return clamp((raw - 0.5) / 0.5, 0, 1);
  }

  private rebuild(): void {
    const random = createRandom(this.seed);
    const psi = Math.min(this.subsampleSize, this.buffer.length);
    const heightLimit = Math.ceil(Math.log2(Math.max(psi, 2)));

    const forest: IsolationNode[] = [];
    for (let t = 0; t < this.trees; t++) {
      forest.push(buildTree(subsample(this.buffer, psi, random), 0, heightLimit, random));
    }
    this.forest = forest;
    this.normalizer = averagePathLength(psi);
  }
}
