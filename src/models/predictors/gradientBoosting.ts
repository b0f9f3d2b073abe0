/**
 * Gradient boosting adapter
 *
 * Logistic boosting over shallow regression trees: each round fits a tree to
 * the residuals y - p and adds it, scaled by the learning rate, to the log-odds.
 * Numbers are ranked by their boosted probability after the latest draw.
 */

import { cfg } from '../../core/config.js';
import { buildTrainingSet, requireHistory, selectByScore, type PredictionAdapter } from './features.js';
import { candidateThresholds, fitRegressionTree, predictTree, type TreeNode } from './trees.js';

export interface GradientBoostingParams {
  rounds: number;
  learningRate: number;
  maxDepth: number;
}

const MIN_SAMPLES_LEAF = 10;

function sigmoid(z: number): number {
  return 1 / (1 + Math.exp(-z));
}

export function createGradientBoosting(params: GradientBoostingParams = cfg.models.gradientBoosting): PredictionAdapter {
  return {
    kind: 'gradient_boosting',
    predict(input) {
      requireHistory('gradient_boosting', input);
      const { x, y, latest } = buildTrainingSet(input.game, input.history);

      const base = y.reduce((s, v) => s + v, 0) / Math.max(y.length, 1);
      const clipped = Math.min(Math.max(base, 1e-6), 1 - 1e-6);
      const initial = Math.log(clipped / (1 - clipped));

      const thresholds = candidateThresholds(x);
      const logOdds = new Array<number>(x.length).fill(initial);
      const trees: TreeNode[] = [];

      for (let round = 0; round < params.rounds; round++) {
        const residuals = y.map((target, i) => target - sigmoid(logOdds[i]));
        const tree = fitRegressionTree(x, residuals, {
          maxDepth: params.maxDepth,
          minSamplesLeaf: MIN_SAMPLES_LEAF,
          thresholds
        });
        trees.push(tree);
        x.forEach((features, i) => {
          logOdds[i] += params.learningRate * predictTree(tree, features);
        });
      }

      const scores = new Map<number, number>();
      latest.forEach((features, i) => {
        const z = trees.reduce((acc, tree) => acc + params.learningRate * predictTree(tree, features), initial);
        scores.set(input.game.minNumber + i, sigmoid(z));
      });

      return selectByScore(scores, input.frequency, input.game.numbersCount);
    }
  };
}
