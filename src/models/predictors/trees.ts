/**
 * Depth-limited regression trees
 *
 * Splits minimize squared error (for 0/1 targets this orders splits the same
 * way as Gini impurity). Candidate thresholds are feature quantiles, so a
 * split search is linear in the sample count.
 */

export type TreeNode =
  | { kind: 'leaf'; value: number }
  | { kind: 'split'; feature: number; threshold: number; left: TreeNode; right: TreeNode };

export interface TreeOptions {
  maxDepth: number;
  minSamplesLeaf: number;
  /** Candidate thresholds per feature, from candidateThresholds() */
  thresholds: readonly (readonly number[])[];
}

const QUANTILE_BINS = 16;

/**
 * Distinct quantile cut points of each feature column
 */
export function candidateThresholds(x: readonly (readonly number[])[], bins: number = QUANTILE_BINS): number[][] {
  const width = x[0]?.length ?? 0;
  const cuts: number[][] = [];

  for (let f = 0; f < width; f++) {
    const column = x.map(row => row[f]).sort((a, b) => a - b);
    const values = new Set<number>();
    for (let b = 1; b < bins; b++) {
      const v = column[Math.floor((b * column.length) / bins)];
      if (v !== undefined) values.add(v);
    }
    cuts.push([...values].sort((a, b) => a - b));
  }

  return cuts;
}

function mean(y: readonly number[], idx: readonly number[]): number {
  if (idx.length === 0) return 0;
  let sum = 0;
  for (const i of idx) sum += y[i];
  return sum / idx.length;
}

interface Split {
  feature: number;
  threshold: number;
  gain: number;
}

function bestSplit(
  x: readonly (readonly number[])[],
  y: readonly number[],
  idx: readonly number[],
  options: TreeOptions
): Split | null {
  let total = 0;
  for (const i of idx) total += y[i];
  const parentScore = (total * total) / idx.length;

  let best: Split | null = null;
  for (let feature = 0; feature < options.thresholds.length; feature++) {
    for (const threshold of options.thresholds[feature]) {
      let leftSum = 0;
      let leftCount = 0;
      for (const i of idx) {
        if (x[i][feature] <= threshold) {
          leftSum += y[i];
          leftCount++;
        }
      }
      const rightCount = idx.length - leftCount;
      if (leftCount < options.minSamplesLeaf || rightCount < options.minSamplesLeaf) continue;

      const rightSum = total - leftSum;
      // Reduction in squared error
      const gain = (leftSum * leftSum) / leftCount + (rightSum * rightSum) / rightCount - parentScore;
      if (gain > 1e-12 && (best === null || gain > best.gain)) {
        best = { feature, threshold, gain };
      }
    }
  }

  return best;
}

function grow(
  x: readonly (readonly number[])[],
  y: readonly number[],
  idx: number[],
  depth: number,
  options: TreeOptions
): TreeNode {
  if (depth >= options.maxDepth || idx.length < 2 * options.minSamplesLeaf) {
    return { kind: 'leaf', value: mean(y, idx) };
  }

  const split = bestSplit(x, y, idx, options);
  if (!split) {
    return { kind: 'leaf', value: mean(y, idx) };
  }

  const left: number[] = [];
  const right: number[] = [];
  for (const i of idx) {
    (x[i][split.feature] <= split.threshold ? left : right).push(i);
  }

  return {
    kind: 'split',
    feature: split.feature,
    threshold: split.threshold,
    left: grow(x, y, left, depth + 1, options),
    right: grow(x, y, right, depth + 1, options)
  };
}

export function fitRegressionTree(x: readonly (readonly number[])[], y: readonly number[], options: TreeOptions): TreeNode {
  return grow(x, y, x.map((_, i) => i), 0, options);
}

export function predictTree(node: TreeNode, features: readonly number[]): number {
  let current = node;
  while (current.kind === 'split') {
    current = features[current.feature] <= current.threshold ? current.left : current.right;
  }
  return current.value;
}
