/**
 * Markov chain adapter
 *
 * First-order transitions between numbers of consecutive draws: every number
 * of draw t votes for every number of draw t + 1. The successors of the
 * latest draw are scored by their normalized transition probability.
 */

import { requireHistory, selectByScore, type PredictionAdapter } from './features.js';

export type TransitionTable = Map<number, Map<number, number>>;

export function countTransitions(history: readonly (readonly number[])[]): TransitionTable {
  const table: TransitionTable = new Map();

  for (let t = 1; t < history.length; t++) {
    for (const from of history[t - 1]) {
      const row = table.get(from) ?? new Map<number, number>();
      for (const to of history[t]) {
        row.set(to, (row.get(to) ?? 0) + 1);
      }
      table.set(from, row);
    }
  }

  return table;
}

/**
 * Sum over the latest draw's numbers of P(next contains n | number drawn)
 */
export function scoreSuccessors(table: TransitionTable, latest: readonly number[]): Map<number, number> {
  const scores = new Map<number, number>();

  for (const from of latest) {
    const row = table.get(from);
    if (!row) continue;
    const total = [...row.values()].reduce((s, c) => s + c, 0);
    for (const [to, count] of row) {
      scores.set(to, (scores.get(to) ?? 0) + count / total);
    }
  }

  return scores;
}

export function createMarkovChain(): PredictionAdapter {
  return {
    kind: 'markov_chain',
    predict(input) {
      requireHistory('markov_chain', input);
      const table = countTransitions(input.history);
      const latest = input.history[input.history.length - 1] ?? [];
      return selectByScore(scoreSuccessors(table, latest), input.frequency, input.game.numbersCount);
    }
  };
}
