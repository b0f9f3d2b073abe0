/**
 * Shared inputs and helpers for the prediction adapters
 */

import type { GameConfig } from '../../core/games.js';
import { InsufficientDataError } from '../../errors/index.js';
import type { ModelKind } from '../../types/domain.js';
import type { Rng } from '../../util/random.js';
import { rankHot, type NumberCount } from '../../services/statisticsService.js';

export interface PredictionInput {
  game: Pick<GameConfig, 'id' | 'minNumber' | 'maxNumber' | 'numbersCount'>;
  /** Winning numbers of each stored draw, oldest first */
  history: readonly (readonly number[])[];
  frequency: readonly NumberCount[];
  rng: Rng;
  minHistory: number;
}

export interface PredictionAdapter {
  kind: ModelKind;
  /** Six distinct numbers in the game range, ascending */
  predict(input: PredictionInput): number[];
}

/** Draws looked back over for the recent-rate feature */
export const RECENT_WINDOW = 10;

/** Most recent draws used to build training samples */
export const TRAINING_WINDOW = 200;

/** [recent rate, overall rate, normalized gap] */
export type FeatureVector = [number, number, number];

export function requireHistory(kind: ModelKind, input: PredictionInput): void {
  if (input.history.length < input.minHistory) {
    throw new InsufficientDataError(
      `${kind} needs at least ${input.minHistory} draws, got ${input.history.length}`,
      input.minHistory,
      input.history.length
    );
  }
}

export function gameNumbers(game: Pick<GameConfig, 'minNumber' | 'maxNumber'>): number[] {
  return Array.from({ length: game.maxNumber - game.minNumber + 1 }, (_, i) => game.minNumber + i);
}

/**
 * Walks the history once, yielding each number's features as they stood
 * before every draw, paired with whether the number was then drawn
 *
 * `onStep` receives the features of every number (indexed from minNumber)
 * and the draw that followed; the final call has `next` undefined and carries
 * the features after the latest draw.
 */
export function walkFeatures(
  game: Pick<GameConfig, 'minNumber' | 'maxNumber'>,
  history: readonly (readonly number[])[],
  onStep: (features: FeatureVector[], next: readonly number[] | undefined, step: number) => void
): void {
  const size = game.maxNumber - game.minNumber + 1;
  const total = new Array<number>(size).fill(0);
  const recent = new Array<number>(size).fill(0);
  const lastSeen = new Array<number>(size).fill(-1);

  for (let t = 0; t <= history.length; t++) {
    const seenDraws = Math.max(t, 1);
    const window = Math.max(Math.min(t, RECENT_WINDOW), 1);
    const features = total.map((count, i): FeatureVector => [
      recent[i] / window,
      count / seenDraws,
      (lastSeen[i] === -1 ? t : t - 1 - lastSeen[i]) / seenDraws
    ]);

    const next = history[t];
    onStep(features, next, t);
    if (!next) break;

    for (const n of next) {
      const i = n - game.minNumber;
      if (i < 0 || i >= size) continue;
      total[i]++;
      recent[i]++;
      lastSeen[i] = t;
    }

    // Slide the recent window past draw t - RECENT_WINDOW
    const dropped = t >= RECENT_WINDOW ? history[t - RECENT_WINDOW] : undefined;
    for (const n of dropped ?? []) {
      const i = n - game.minNumber;
      if (i >= 0 && i < size) recent[i]--;
    }
  }
}

export interface TrainingSet {
  x: FeatureVector[];
  y: number[];
  /** Features after the latest draw, one per number */
  latest: FeatureVector[];
}

/**
 * One sample per (draw, number) over the last TRAINING_WINDOW draws
 */
export function buildTrainingSet(
  game: Pick<GameConfig, 'minNumber' | 'maxNumber'>,
  history: readonly (readonly number[])[]
): TrainingSet {
  const firstStep = Math.max(1, history.length - TRAINING_WINDOW);
  const x: FeatureVector[] = [];
  const y: number[] = [];
  let latest: FeatureVector[] = [];

  walkFeatures(game, history, (features, next, step) => {
    if (!next) {
      latest = features;
      return;
    }
    if (step < firstStep) return;
    const drawn = new Set(next);
    features.forEach((f, i) => {
      x.push(f);
      y.push(drawn.has(game.minNumber + i) ? 1 : 0);
    });
  });

  return { x, y, latest };
}

/**
 * Picks `count` numbers by descending score
 *
 * Ties are broken by frequency rank, then ascending number. Numbers without
 * a score are not candidates; any shortfall is filled from the most frequent
 * numbers.
 */
export function selectByScore(
  scores: ReadonlyMap<number, number>,
  frequency: readonly NumberCount[],
  count: number
): number[] {
  const hotOrder = rankHot(frequency).map(f => f.number);
  const rank = new Map(hotOrder.map((n, i) => [n, i]));
  const byRank = (n: number): number => rank.get(n) ?? Number.MAX_SAFE_INTEGER;

  const chosen = [...scores.entries()]
    .sort((a, b) => b[1] - a[1] || byRank(a[0]) - byRank(b[0]) || a[0] - b[0])
    .slice(0, count)
    .map(([n]) => n);

  for (const n of hotOrder) {
    if (chosen.length >= count) break;
    if (!chosen.includes(n)) chosen.push(n);
  }

  return chosen.sort((a, b) => a - b);
}
