/**
 * Decision tree adapter
 *
 * One tree over the per-number features; a leaf's value is the share of
 * training samples in it whose number was drawn next.
 */

import { cfg } from '../../core/config.js';
import { buildTrainingSet, requireHistory, selectByScore, type PredictionAdapter } from './features.js';
import { candidateThresholds, fitRegressionTree, predictTree } from './trees.js';

export interface DecisionTreeParams {
  maxDepth: number;
  minSamplesLeaf: number;
}

export function createDecisionTree(params: DecisionTreeParams = cfg.models.decisionTree): PredictionAdapter {
  return {
    kind: 'decision_tree',
    predict(input) {
      requireHistory('decision_tree', input);
      const { x, y, latest } = buildTrainingSet(input.game, input.history);

      const tree = fitRegressionTree(x, y, {
        maxDepth: params.maxDepth,
        minSamplesLeaf: params.minSamplesLeaf,
        thresholds: candidateThresholds(x)
      });

      const scores = new Map<number, number>();
      latest.forEach((features, i) => {
        scores.set(input.game.minNumber + i, predictTree(tree, features));
      });

      return selectByScore(scores, input.frequency, input.game.numbersCount);
    }
  };
}
