/**
 * Prediction Service
 *
 * Runs every prediction adapter over a game's history and stores each
 * successful guess. Adapters run independently; one failing does not stop
 * the others.
 */

import { cfg } from '../core/config.js';
import { logger } from '../core/logger.js';
import type { GameConfig, GameId } from '../core/games.js';
import type { EventPublisher } from '../bus/kafkaProducer.js';
import type { DrawStore } from '../db/repositories/drawResults.js';
import type { PredictionStore } from '../db/repositories/predictions.js';
import { AppError, InsufficientDataError, toError } from '../errors/index.js';
import { createAdapters, type PredictionAdapter } from '../models/predictors/index.js';
import type { ModelKind } from '../types/domain.js';
import { calendarDateIn } from '../util/date.js';
import { createTimeSeed, mulberry32, type Rng } from '../util/random.js';
import { countFrequency } from './statisticsService.js';

export interface PredictionDeps {
  draws: Pick<DrawStore, 'getAllDraws'>;
  predictions: Pick<PredictionStore, 'insertPrediction'>;
  publisher: Pick<EventPublisher, 'publish'>;
  adapters?: PredictionAdapter[];
  rng?: Rng;
  /** Overrides the clock used for the target draw date */
  now?: Date;
}

export type ModelOutcome =
  | { modelKind: ModelKind; status: 'ok'; numbers: number[]; predictionId: string }
  | { modelKind: ModelKind; status: 'failed'; error: { code: string; message: string } };

export interface PredictionRun {
  gameId: GameId;
  targetDrawDate: string;
  predictions: ModelOutcome[];
}

/**
 * Checks an adapter's ticket: right size, distinct, in range, ascending
 */
export function isValidTicket(numbers: readonly number[], game: Pick<GameConfig, 'minNumber' | 'maxNumber' | 'numbersCount'>): boolean {
  return (
    numbers.length === game.numbersCount &&
    numbers.every((n, i) =>
      Number.isInteger(n) && n >= game.minNumber && n <= game.maxNumber && (i === 0 || n > numbers[i - 1])
    )
  );
}

/**
 * Generates, stores and publishes one prediction per model
 *
 * @throws InsufficientDataError when the game has fewer draws than the models need
 */
export async function generatePredictions(game: GameConfig, deps: PredictionDeps): Promise<PredictionRun> {
  const draws = await deps.draws.getAllDraws(game.id);
  const minHistory = cfg.predictions.minHistory;
  if (draws.length < minHistory) {
    throw new InsufficientDataError(
      `${game.name} has ${draws.length} stored draws; predictions need at least ${minHistory}`,
      minHistory,
      draws.length
    );
  }

  const history = [...draws]
    .sort((a, b) => a.drawDate.localeCompare(b.drawDate))
    .map(d => d.numbers);
  const frequency = countFrequency(game, draws);
  const seed = cfg.predictions.seed ?? createTimeSeed();
  const rng = deps.rng ?? mulberry32(seed);
  const targetDrawDate = calendarDateIn(cfg.predictions.timezone, deps.now);
  const predictions: ModelOutcome[] = [];

  for (const adapter of deps.adapters ?? createAdapters()) {
    try {
      const numbers = adapter.predict({ game, history, frequency, rng, minHistory });
      if (!isValidTicket(numbers, game)) {
        throw new AppError(`${adapter.kind} produced an invalid ticket: ${numbers.join(', ')}`, 'INVALID_PREDICTION');
      }
      const stored = await deps.predictions.insertPrediction({
        gameId: game.id,
        modelKind: adapter.kind,
        numbers,
        targetDrawDate
      });
      predictions.push({ modelKind: adapter.kind, status: 'ok', numbers, predictionId: stored.id });
    } catch (err) {
      const error = toError(err);
      logger.warn({ err: error, gameId: game.id, modelKind: adapter.kind }, 'Model prediction failed');
      predictions.push({
        modelKind: adapter.kind,
        status: 'failed',
        error: { code: err instanceof AppError ? err.code : 'INTERNAL_ERROR', message: error.message }
      });
    }
  }

  const predictionIds: Partial<Record<ModelKind, string>> = {};
  for (const p of predictions) {
    if (p.status === 'ok') predictionIds[p.modelKind] = p.predictionId;
  }

  if (Object.keys(predictionIds).length > 0) {
    await deps.publisher.publish({
      eventType: 'predictions.generated',
      gameId: game.id,
      version: 'v1',
      occurredAt: new Date().toISOString(),
      payload: { targetDrawDate, predictionIds }
    });
  }

  logger.info({ gameId: game.id, targetDrawDate, seed: deps.rng ? undefined : seed }, 'Predictions generated');
  return { gameId: game.id, targetDrawDate, predictions };
}
