import { cfg } from '../../core/config.js';
import { createAnomalyDetection } from './anomalyDetection.js';
import { createDecisionTree } from './decisionTree.js';
import type { PredictionAdapter } from './features.js';
import { createGradientBoosting } from './gradientBoosting.js';
import { createMarkovChain } from './markovChain.js';
import { createReinforcement } from './reinforcement.js';

export type { PredictionAdapter, PredictionInput } from './features.js';

/**
 * All adapters, in the order their results are reported
 */
export function createAdapters(models: typeof cfg.models = cfg.models): PredictionAdapter[] {
  return [
    createGradientBoosting(models.gradientBoosting),
    createDecisionTree(models.decisionTree),
    createMarkovChain(),
    createAnomalyDetection(models.anomalyDetection),
    createReinforcement(models.reinforcement)
  ];
}
