/**
 * Seeded random-forest regressor: bootstrap-aggregated CART trees split on
 * variance reduction. Identical inputs and seed always give identical trees.
 */

export interface RandomForestOptions {
  nEstimators: number;
  seed: number;
  maxDepth?: number;
  minSamplesSplit?: number;
}

type TreeNode =
  | { kind: 'leaf'; value: number }
  | { kind: 'split'; feature: number; threshold: number; left: TreeNode; right: TreeNode };

interface Split {
  feature: number;
  threshold: number;
  left: number[];
  right: number[];
}

const MIN_GAIN = 1e-12;

// mulberry32
function seededRandom(seed: number) {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function mean(values: number[]) {
  let sum = 0;
  for (const value of values) sum += value;
  return sum / values.length;
}

function sumOfSquaredErrors(sum: number, sumSquares: number, count: number) {
  return count === 0 ? 0 : sumSquares - (sum * sum) / count;
}

export class RandomForestRegressor {
  private trees: TreeNode[] = [];
  private featureCount = 0;
  private readonly maxDepth: number;
  private readonly minSamplesSplit: number;

  constructor(private readonly options: RandomForestOptions) {
    if (!Number.isInteger(options.nEstimators) || options.nEstimators < 1) {
      throw new Error('nEstimators must be a positive integer');
    }
    this.maxDepth = options.maxDepth ?? 16;
    this.minSamplesSplit = Math.max(2, options.minSamplesSplit ?? 2);
  }

  get isFitted(): boolean {
    return this.trees.length > 0;
  }

  fit(features: number[][], targets: number[]): this {
    if (features.length === 0 || features.length !== targets.length) {
      throw new Error('Training data must be non-empty with one target per row');
    }
    const width = features[0].length;
    if (width === 0 || features.some(row => row.length !== width)) {
      throw new Error('Every training row must have the same non-zero number of features');
    }

    const random = seededRandom(this.options.seed);
    const rowCount = features.length;
    this.featureCount = width;
    this.trees = [];

    for (let t = 0; t < this.options.nEstimators; t++) {
      const bootstrap: number[] = [];
      for (let i = 0; i < rowCount; i++) {
        bootstrap.push(Math.floor(random() * rowCount));
      }
      this.trees.push(this.buildTree(features, targets, bootstrap, 0));
    }

    return this;
  }

  predict(sample: number[]): number {
    if (!this.isFitted) {
      throw new Error('Model has not been fitted');
    }
    if (sample.length !== this.featureCount) {
      throw new Error(`Expected ${this.featureCount} features, received ${sample.length}`);
    }
    return mean(this.trees.map(tree => this.evaluate(tree, sample)));
  }

  private evaluate(node: TreeNode, sample: number[]): number {
    let current = node;
    while (current.kind === 'split') {
      current = sample[current.feature] <= current.threshold ? current.left : current.right;
    }
    return current.value;
  }

  private buildTree(features: number[][], targets: number[], rows: number[], depth: number): TreeNode {
    const values = rows.map(row => targets[row]);
    const leaf: TreeNode = { kind: 'leaf', value: mean(values) };

    if (rows.length < this.minSamplesSplit || depth >= this.maxDepth) {
      return leaf;
    }

    const split = this.findBestSplit(features, targets, rows);
    if (!split) {
      return leaf;
    }

    return {
      kind: 'split',
      feature: split.feature,
      threshold: split.threshold,
      left: this.buildTree(features, targets, split.left, depth + 1),
      right: this.buildTree(features, targets, split.right, depth + 1),
    };
  }

  private findBestSplit(features: number[][], targets: number[], rows: number[]): Split | null {
    let totalSum = 0;
    let totalSquares = 0;
    for (const row of rows) {
      totalSum += targets[row];
      totalSquares += targets[row] * targets[row];
    }
    const parentError = sumOfSquaredErrors(totalSum, totalSquares, rows.length);

    let best: { feature: number; threshold: number; gain: number } | null = null;

    for (let feature = 0; feature < this.featureCount; feature++) {
      const sorted = [...rows].sort((a, b) => features[a][feature] - features[b][feature]);
      let leftSum = 0;
      let leftSquares = 0;

      for (let i = 0; i < sorted.length - 1; i++) {
        const target = targets[sorted[i]];
        leftSum += target;
        leftSquares += target * target;

        const current = features[sorted[i]][feature];
        const next = features[sorted[i + 1]][feature];
        if (current === next) continue;

        const leftCount = i + 1;
        const childError =
          sumOfSquaredErrors(leftSum, leftSquares, leftCount) +
          sumOfSquaredErrors(totalSum - leftSum, totalSquares - leftSquares, sorted.length - leftCount);
        const gain = parentError - childError;

        if (gain > MIN_GAIN && (!best || gain > best.gain)) {
          best = { feature, threshold: (current + next) / 2, gain };
        }
      }
    }

    if (!best) {
      return null;
    }

    const { feature, threshold } = best;
    return {
      feature,
      threshold,
      left: rows.filter(row => features[row][feature] <= threshold),
      right: rows.filter(row => features[row][feature] > threshold),
    };
  }
}
