/**
 * Message Models
 *
 * Events published to Kafka when the stored data changes.
 */

import type { GameId } from '../core/games.js';
import type { ModelKind } from '../types/domain.js';

interface EventEnvelope<E extends string, P> {
  eventType: E;
  gameId: GameId;
  version: 'v1';
  /** ISO timestamp when the event was produced */
  occurredAt: string;
  payload: P;
}

/**
 * Published after an ingestion run appended at least one draw
 */
export type DrawsIngestedEvent = EventEnvelope<'draws.ingested', {
  added: number;
  /** Draw dates of the appended records, newest first */
  drawDates: string[];
}>;

/**
 * Published after a prediction run stored its guesses
 */
export type PredictionsGeneratedEvent = EventEnvelope<'predictions.generated', {
  targetDrawDate: string;
  predictionIds: Partial<Record<ModelKind, string>>;
}>;

export type ServiceEvent = DrawsIngestedEvent | PredictionsGeneratedEvent;
