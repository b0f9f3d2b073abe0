/**
 * Prediction Accuracy Repository
 */

import { randomUUID } from 'crypto';
import { db, databaseError } from '../client.js';
import { accuracyRowSchema, validRows } from '../types.js';
import type { GameId } from '../../core/games.js';
import type { AccuracyRecord, NewAccuracy } from '../../types/domain.js';

export interface ScoredPair {
  predictionId: string;
  resultId: string;
}

export interface AccuracyStore {
  /** Returns null when the (prediction, result) pair was already scored */
  insertAccuracy(accuracy: NewAccuracy): Promise<AccuracyRecord | null>;
  /** Most recently calculated first */
  listAccuracy(gameId: GameId, limit: number): Promise<AccuracyRecord[]>;
  listScoredPairs(gameId: GameId): Promise<ScoredPair[]>;
}

const COLUMNS = 'id, game_id, prediction_id, result_id, numbers_matched, error_distance, distance_metrics, calculated_at';

export const pgAccuracyStore: AccuracyStore = {
  async insertAccuracy(accuracy) {
    try {
      const result = await db.query(
        `INSERT INTO prediction_accuracy
           (id, game_id, prediction_id, result_id, numbers_matched, error_distance, distance_metrics)
         VALUES ($1, $2, $3, $4, $5, $6, $7)
         ON CONFLICT (prediction_id, result_id) DO NOTHING
         RETURNING ${COLUMNS}`,
        [
          randomUUID(),
          accuracy.gameId,
          accuracy.predictionId,
          accuracy.resultId,
          accuracy.numbersMatched,
          accuracy.errorDistance,
          JSON.stringify(accuracy.metrics)
        ]
      );
      return validRows(accuracyRowSchema, result.rows, 'prediction_accuracy')[0] ?? null;
    } catch (err) {
      throw databaseError('insert accuracy', err, { predictionId: accuracy.predictionId, resultId: accuracy.resultId });
    }
  },

  async listAccuracy(gameId, limit) {
    try {
      const result = await db.query(
        `SELECT ${COLUMNS} FROM prediction_accuracy WHERE game_id = $1 ORDER BY calculated_at DESC LIMIT $2`,
        [gameId, limit]
      );
      return validRows(accuracyRowSchema, result.rows, 'prediction_accuracy');
    } catch (err) {
      throw databaseError('list accuracy', err, { gameId });
    }
  },

  async listScoredPairs(gameId) {
    try {
      const result = await db.query<{ prediction_id: string; result_id: string }>(
        'SELECT prediction_id, result_id FROM prediction_accuracy WHERE game_id = $1',
        [gameId]
      );
      return result.rows.map(row => ({
        predictionId: row.prediction_id,
        resultId: row.result_id
      }));
    } catch (err) {
      throw databaseError('list scored pairs', err, { gameId });
    }
  }
};
