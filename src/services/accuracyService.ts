/**
 * Accuracy Service
 *
 * Scores stored predictions against actual draws.
 */

import { logger } from '../core/logger.js';
import type { GameConfig, GameId } from '../core/games.js';
import type { AccuracyStore } from '../db/repositories/predictionAccuracy.js';
import type { DrawStore } from '../db/repositories/drawResults.js';
import type { PredictionStore } from '../db/repositories/predictions.js';
import { NotFoundError, ValidationError } from '../errors/index.js';
import type { DistanceMetrics, DrawRecord, NewAccuracy, PredictionRecord } from '../types/domain.js';
import { drawProduct, drawSum } from './statisticsService.js';

export interface AccuracyDeps {
  draws: Pick<DrawStore, 'getAllDraws' | 'getDraw'>;
  predictions: Pick<PredictionStore, 'getAllPredictions' | 'getPrediction'>;
  accuracy: Pick<AccuracyStore, 'insertAccuracy' | 'listScoredPairs'>;
}

/**
 * Distances between a predicted ticket and the actual numbers
 *
 * Positional metrics compare both tickets sorted ascending.
 *
 * @example
 * calculateMetrics([1, 2, 3, 4, 5, 6], [1, 2, 3, 4, 5, 7])
 * // { euclidean: 1, manhattan: 1, hamming: 1, setIntersection: 5, sumDifference: 1, productDifference: 120 }
 */
export function calculateMetrics(predicted: readonly number[], actual: readonly number[]): DistanceMetrics {
  const p = [...predicted].sort((a, b) => a - b);
  const a = [...actual].sort((x, y) => x - y);
  const actualSet = new Set(a);

  let squares = 0;
  let manhattan = 0;
  let hamming = 0;
  for (let i = 0; i < Math.max(p.length, a.length); i++) {
    const diff = (p[i] ?? 0) - (a[i] ?? 0);
    squares += diff * diff;
    manhattan += Math.abs(diff);
    if (diff !== 0) hamming++;
  }

  return {
    euclidean: Math.sqrt(squares),
    manhattan,
    hamming,
    setIntersection: p.filter(n => actualSet.has(n)).length,
    sumDifference: Math.abs(drawSum(p) - drawSum(a)),
    productDifference: Math.abs(drawProduct(p) - drawProduct(a))
  };
}

function buildAccuracy(prediction: PredictionRecord, draw: DrawRecord): NewAccuracy {
  const metrics = calculateMetrics(prediction.numbers, draw.numbers);
  return {
    gameId: prediction.gameId,
    predictionId: prediction.id,
    resultId: draw.id,
    numbersMatched: metrics.setIntersection,
    errorDistance: metrics.euclidean,
    metrics
  };
}

export interface ScoreOutcome {
  accuracy: NewAccuracy;
  /** False when the pair had already been scored */
  created: boolean;
}

/**
 * Scores one prediction against one draw
 *
 * @throws NotFoundError when either record is missing
 * @throws ValidationError when the records belong to different games
 */
export async function scorePrediction(
  predictionId: string,
  resultId: string,
  gameId: GameId,
  deps: Pick<AccuracyDeps, 'draws' | 'predictions'> & { accuracy: Pick<AccuracyStore, 'insertAccuracy'> }
): Promise<ScoreOutcome> {
  const [prediction, draw] = await Promise.all([
    deps.predictions.getPrediction(predictionId),
    deps.draws.getDraw(resultId)
  ]);

  if (!prediction) throw new NotFoundError(`Prediction not found: ${predictionId}`, 'prediction');
  if (!draw) throw new NotFoundError(`Result not found: ${resultId}`, 'result');
  if (prediction.gameId !== gameId || draw.gameId !== gameId) {
    throw new ValidationError(`Prediction and result must both belong to ${gameId}`, 'gameId');
  }

  const accuracy = buildAccuracy(prediction, draw);
  const stored = await deps.accuracy.insertAccuracy(accuracy);
  return { accuracy, created: stored !== null };
}

/**
 * Scores every prediction whose target date has a stored draw
 *
 * Pairs already scored are skipped.
 *
 * @returns Number of accuracy records created
 */
export async function autoCalculateAccuracy(gameIds: readonly GameId[], deps: AccuracyDeps): Promise<number> {
  let calculated = 0;

  for (const gameId of gameIds) {
    const [draws, predictions, pairs] = await Promise.all([
      deps.draws.getAllDraws(gameId),
      deps.predictions.getAllPredictions(gameId),
      deps.accuracy.listScoredPairs(gameId)
    ]);

    const scored = new Set(pairs.map(p => `${p.predictionId}|${p.resultId}`));
    const drawsByDate = new Map<string, DrawRecord[]>();
    for (const draw of draws) {
      drawsByDate.set(draw.drawDate, [...(drawsByDate.get(draw.drawDate) ?? []), draw]);
    }

    let created = 0;
    for (const prediction of predictions) {
      for (const draw of drawsByDate.get(prediction.targetDrawDate) ?? []) {
        if (scored.has(`${prediction.id}|${draw.id}`)) continue;
        const stored = await deps.accuracy.insertAccuracy(buildAccuracy(prediction, draw));
        if (stored) created++;
      }
    }

    logger.info({ gameId, created, predictions: predictions.length }, 'Accuracy auto-calculated');
    calculated += created;
  }

  return calculated;
}

export interface AccuracyDiagnostics {
  gameId: GameId;
  totalResults: number;
  totalPredictions: number;
  totalAccuracyRecords: number;
  /** Predictions whose target date has a stored draw */
  matchablePredictions: number;
  /** Newest first */
  sampleResultDates: string[];
  /** Target dates of the newest predictions */
  samplePredictionDates: string[];
  hasValidResults: boolean;
  hasValidPredictions: boolean;
}

const DIAGNOSTIC_SAMPLE = 5;

/**
 * Counts and sample dates for working out why auto-calculation scores nothing
 */
export async function accuracyDiagnostics(game: GameConfig, deps: AccuracyDeps): Promise<AccuracyDiagnostics> {
  const [draws, predictions, pairs] = await Promise.all([
    deps.draws.getAllDraws(game.id),
    deps.predictions.getAllPredictions(game.id),
    deps.accuracy.listScoredPairs(game.id)
  ]);

  const drawDates = new Set(draws.map(d => d.drawDate));
  const complete = (numbers: readonly number[]): boolean => numbers.length === game.numbersCount;

  return {
    gameId: game.id,
    totalResults: draws.length,
    totalPredictions: predictions.length,
    totalAccuracyRecords: pairs.length,
    matchablePredictions: predictions.filter(p => drawDates.has(p.targetDrawDate)).length,
    sampleResultDates: draws.slice(0, DIAGNOSTIC_SAMPLE).map(d => d.drawDate),
    samplePredictionDates: predictions.slice(-DIAGNOSTIC_SAMPLE).reverse().map(p => p.targetDrawDate),
    hasValidResults: draws.some(d => complete(d.numbers)),
    hasValidPredictions: predictions.some(p => complete(p.numbers))
  };
}
