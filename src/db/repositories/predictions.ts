/**
 * Prediction Repository
 *
 * Stored model guesses. A prediction row is never updated; the draw it was
 * scored against is read from prediction_accuracy.
 */

import { randomUUID } from 'crypto';
import { db, databaseError } from '../client.js';
import { predictionRowSchema, validRows } from '../types.js';
import type { GameId } from '../../core/games.js';
import type { NewPrediction, PredictionRecord } from '../../types/domain.js';

export interface PredictionStore {
  insertPrediction(prediction: NewPrediction): Promise<PredictionRecord>;
  /** Newest first */
  listPredictions(gameId: GameId, limit: number): Promise<PredictionRecord[]>;
  getAllPredictions(gameId: GameId): Promise<PredictionRecord[]>;
  getPrediction(id: string): Promise<PredictionRecord | null>;
}

const SELECT = `
  SELECT p.id, p.game_id, p.model_kind, p.numbers, p.target_draw_date, p.created_at, pa.result_id
  FROM predictions p
  LEFT JOIN LATERAL (
    SELECT a.result_id FROM prediction_accuracy a
    WHERE a.prediction_id = p.id
    ORDER BY a.calculated_at DESC
    LIMIT 1
  ) pa ON TRUE
`;

export const pgPredictionStore: PredictionStore = {
  async insertPrediction(prediction) {
    try {
      const result = await db.query(
        `INSERT INTO predictions (id, game_id, model_kind, numbers, target_draw_date)
         VALUES ($1, $2, $3, $4::smallint[], $5)
         RETURNING id, game_id, model_kind, numbers, target_draw_date, created_at, NULL::uuid AS result_id`,
        [randomUUID(), prediction.gameId, prediction.modelKind, prediction.numbers, prediction.targetDrawDate]
      );
      const [stored] = validRows(predictionRowSchema, result.rows, 'predictions');
      if (!stored) {
        throw new Error('inserted row did not validate');
      }
      return stored;
    } catch (err) {
      throw databaseError('insert prediction', err, { gameId: prediction.gameId, modelKind: prediction.modelKind });
    }
  },

  async listPredictions(gameId, limit) {
    try {
      const result = await db.query(`${SELECT} WHERE p.game_id = $1 ORDER BY p.created_at DESC LIMIT $2`, [gameId, limit]);
      return validRows(predictionRowSchema, result.rows, 'predictions');
    } catch (err) {
      throw databaseError('list predictions', err, { gameId });
    }
  },

  async getAllPredictions(gameId) {
    try {
      const result = await db.query(`${SELECT} WHERE p.game_id = $1 ORDER BY p.created_at ASC`, [gameId]);
      return validRows(predictionRowSchema, result.rows, 'predictions');
    } catch (err) {
      throw databaseError('load predictions', err, { gameId });
    }
  },

  async getPrediction(id) {
    try {
      const result = await db.query(`${SELECT} WHERE p.id = $1`, [id]);
      return validRows(predictionRowSchema, result.rows, 'predictions')[0] ?? null;
    } catch (err) {
      throw databaseError('get prediction', err, { id });
    }
  }
};
