/**
 * Reinforcement learning adapter
 *
 * Tabular epsilon-greedy agent. The history is replayed oldest first, one
 * episode per draw: the agent picks a ticket (random with probability epsilon,
 * otherwise its six highest-valued numbers), earns 1 for every picked number
 * that was drawn, and moves each picked number's value toward its reward.
 */

import { cfg } from '../../core/config.js';
import { sampleDistinct } from '../../util/random.js';
import { gameNumbers, requireHistory, selectByScore, type PredictionAdapter } from './features.js';

export interface ReinforcementParams {
  learningRate: number;
  epsilon: number;
  epsilonDecay: number;
  epsilonMin: number;
}

function greedy(values: ReadonlyMap<number, number>, count: number): number[] {
  return [...values.entries()]
    .sort((a, b) => b[1] - a[1] || a[0] - b[0])
    .slice(0, count)
    .map(([n]) => n);
}

export function createReinforcement(params: ReinforcementParams = cfg.models.reinforcement): PredictionAdapter {
  return {
    kind: 'reinforcement',
    predict(input) {
      requireHistory('reinforcement', input);
      const { minNumber, maxNumber, numbersCount } = input.game;
      const values = new Map(gameNumbers(input.game).map(n => [n, 0]));
      let epsilon = params.epsilon;

      for (const draw of input.history) {
        const explore = input.rng() < epsilon;
        const action = explore
          ? sampleDistinct(input.rng, minNumber, maxNumber, numbersCount)
          : greedy(values, numbersCount);
        const drawn = new Set(draw);

        for (const n of action) {
          const value = values.get(n) ?? 0;
          const reward = drawn.has(n) ? 1 : 0;
          values.set(n, value + params.learningRate * (reward - value));
        }

        epsilon = Math.max(params.epsilonMin, epsilon * params.epsilonDecay);
      }

      return selectByScore(values, input.frequency, numbersCount);
    }
  };
}
