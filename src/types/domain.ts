/**
 * Domain Type Definitions
 *
 * Draws, predictions and accuracy records as the rest of the service sees them.
 * Dates without a meaningful time component are ISO calendar strings (YYYY-MM-DD).
 */

import type { GameId } from '../core/games.js';

/**
 * A draw produced by the row parser, not yet stored
 */
export interface ParsedDraw {
  gameId: GameId;
  drawDate: string;
  drawNumber: string | null;
  /** Six distinct numbers, ascending */
  numbers: number[];
  jackpot: number | null;
  winners: number | null;
}

/**
 * A stored draw. Never updated after insert.
 */
export interface DrawRecord extends ParsedDraw {
  id: string;
  createdAt: Date;
}

export const MODEL_KINDS = [
  'gradient_boosting',
  'decision_tree',
  'markov_chain',
  'anomaly_detection',
  'reinforcement'
] as const;

export type ModelKind = typeof MODEL_KINDS[number];

export interface NewPrediction {
  gameId: GameId;
  modelKind: ModelKind;
  numbers: number[];
  targetDrawDate: string;
}

/**
 * One model's stored guess. `resultId` is the draw it was scored against, if any.
 */
export interface PredictionRecord extends NewPrediction {
  id: string;
  createdAt: Date;
  resultId: string | null;
}

/**
 * Distances between a predicted ticket and the actual draw
 */
export interface DistanceMetrics {
  euclidean: number;
  manhattan: number;
  hamming: number;
  setIntersection: number;
  sumDifference: number;
  productDifference: number;
}

export interface NewAccuracy {
  gameId: GameId;
  predictionId: string;
  resultId: string;
  numbersMatched: number;
  errorDistance: number;
  metrics: DistanceMetrics;
}

export interface AccuracyRecord extends NewAccuracy {
  id: string;
  calculatedAt: Date;
}

export interface Page {
  limit: number;
  offset: number;
}
