/**
 * Database Entity Types
 *
 * Row schemas for each table, mapped to domain records. Rows are validated on
 * read; a malformed row is logged and dropped rather than handed to callers.
 */

import { z } from 'zod';
import { GAME_IDS } from '../core/games.js';
import { NUMBERS_PER_DRAW } from '../core/constants.js';
import { logger } from '../core/logger.js';
import { MODEL_KINDS } from '../types/domain.js';
import type { AccuracyRecord, DrawRecord, PredictionRecord } from '../types/domain.js';

const dateISO = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);
const ticket = z.array(z.number().int().positive()).length(NUMBERS_PER_DRAW);

export const drawRowSchema = z.object({
  id: z.string().uuid(),
  game_id: z.enum(GAME_IDS),
  draw_date: dateISO, // DATE as string (YYYY-MM-DD)
  draw_number: z.string().nullable(),
  numbers: ticket, // SMALLINT[]
  jackpot: z.coerce.number().finite().nullable(), // NUMERIC arrives as a string
  winners: z.number().int().nullable(),
  created_at: z.date()
}).transform((row): DrawRecord => ({
  id: row.id,
  gameId: row.game_id,
  drawDate: row.draw_date,
  drawNumber: row.draw_number,
  numbers: [...row.numbers].sort((a, b) => a - b),
  jackpot: row.jackpot,
  winners: row.winners,
  createdAt: row.created_at
}));

export type DrawRow = z.input<typeof drawRowSchema>;

export const predictionRowSchema = z.object({
  id: z.string().uuid(),
  game_id: z.enum(GAME_IDS),
  model_kind: z.enum(MODEL_KINDS),
  numbers: ticket,
  target_draw_date: dateISO,
  created_at: z.date(),
  result_id: z.string().uuid().nullable() // From the accuracy table, when scored
}).transform((row): PredictionRecord => ({
  id: row.id,
  gameId: row.game_id,
  modelKind: row.model_kind,
  numbers: row.numbers,
  targetDrawDate: row.target_draw_date,
  createdAt: row.created_at,
  resultId: row.result_id
}));

export type PredictionRow = z.input<typeof predictionRowSchema>;

export const distanceMetricsSchema = z.object({
  euclidean: z.number(),
  manhattan: z.number(),
  hamming: z.number(),
  setIntersection: z.number(),
  sumDifference: z.number(),
  productDifference: z.number()
});

export const accuracyRowSchema = z.object({
  id: z.string().uuid(),
  game_id: z.enum(GAME_IDS),
  prediction_id: z.string().uuid(),
  result_id: z.string().uuid(),
  numbers_matched: z.number().int(),
  error_distance: z.number(),
  distance_metrics: distanceMetricsSchema, // JSONB
  calculated_at: z.date()
}).transform((row): AccuracyRecord => ({
  id: row.id,
  gameId: row.game_id,
  predictionId: row.prediction_id,
  resultId: row.result_id,
  numbersMatched: row.numbers_matched,
  errorDistance: row.error_distance,
  metrics: row.distance_metrics,
  calculatedAt: row.calculated_at
}));

export type AccuracyRow = z.input<typeof accuracyRowSchema>;

/**
 * Maps raw rows through a schema, dropping and logging the ones that fail
 */
export function validRows<S extends z.ZodTypeAny>(schema: S, rows: unknown[], table: string): z.output<S>[] {
  const out: z.output<S>[] = [];
  for (const row of rows) {
    const parsed = schema.safeParse(row);
    if (parsed.success) {
      out.push(parsed.data);
    } else {
      logger.warn({ table, issues: parsed.error.issues }, 'Dropping malformed row');
    }
  }
  return out;
}
