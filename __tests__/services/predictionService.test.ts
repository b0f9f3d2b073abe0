import { describe, it, expect } from 'vitest';
import { GAMES } from '../../src/core/games.js';
import { InsufficientDataError } from '../../src/errors/index.js';
import type { PredictionAdapter, PredictionInput } from '../../src/models/predictors/index.js';
import { generatePredictions, isValidTicket } from '../../src/services/predictionService.js';
import { mulberry32, sampleDistinct } from '../../src/util/random.js';
import { createMemoryStores, createRecordingPublisher, draw } from '../helpers/memoryStores.js';

const game = GAMES.lotto_6_42;
// 20:00 UTC is already the next day in Manila
const now = new Date('2024-03-10T20:00:00Z');

async function seededStores(count: number) {
  const stores = createMemoryStores();
  const rng = mulberry32(11);
  const draws = Array.from({ length: count }, (_, i) =>
    draw('lotto_6_42', `2024-01-${String(i + 1).padStart(2, '0')}`, sampleDistinct(rng, 1, 42, 6))
  );
  // Stored newest first to check that models see the history oldest first
  await stores.draws.insertDraws('lotto_6_42', [...draws].reverse());
  return { stores, draws };
}

function stub(kind: PredictionAdapter['kind'], predict: (input: PredictionInput) => number[]): PredictionAdapter {
  return { kind, predict };
}

describe('predictionService', () => {
  it('should refuse to predict with too little history', async () => {
    const { stores } = await seededStores(9);

    await expect(
      generatePredictions(game, { ...stores, publisher: createRecordingPublisher(), now })
    ).rejects.toBeInstanceOf(InsufficientDataError);
    expect(stores.predictionRows).toHaveLength(0);
  });

  it('should isolate failing models and store the rest', async () => {
    const { stores } = await seededStores(12);
    const publisher = createRecordingPublisher();

    const run = await generatePredictions(game, {
      ...stores,
      publisher,
      now,
      rng: mulberry32(1),
      adapters: [
        stub('gradient_boosting', () => [1, 2, 3, 4, 5, 6]),
        stub('decision_tree', () => {
          throw new Error('model exploded');
        }),
        stub('markov_chain', () => [1, 1, 2, 3, 4, 5])
      ]
    });

    expect(run.gameId).toBe('lotto_6_42');
    expect(run.targetDrawDate).toBe('2024-03-11');
    expect(run.predictions).toEqual([
      { modelKind: 'gradient_boosting', status: 'ok', numbers: [1, 2, 3, 4, 5, 6], predictionId: stores.predictionRows[0].id },
      { modelKind: 'decision_tree', status: 'failed', error: { code: 'INTERNAL_ERROR', message: 'model exploded' } },
      {
        modelKind: 'markov_chain',
        status: 'failed',
        error: { code: 'INVALID_PREDICTION', message: 'markov_chain produced an invalid ticket: 1, 1, 2, 3, 4, 5' }
      }
    ]);
    expect(stores.predictionRows).toHaveLength(1);
    expect(stores.predictionRows[0]).toMatchObject({ modelKind: 'gradient_boosting', targetDrawDate: '2024-03-11' });
    expect(publisher.events).toHaveLength(1);
    expect(publisher.events[0]).toMatchObject({
      eventType: 'predictions.generated',
      gameId: 'lotto_6_42',
      payload: { targetDrawDate: '2024-03-11', predictionIds: { gradient_boosting: stores.predictionRows[0].id } }
    });
  });

  it('should not publish when every model fails', async () => {
    const { stores } = await seededStores(10);
    const publisher = createRecordingPublisher();

    const run = await generatePredictions(game, {
      ...stores,
      publisher,
      now,
      adapters: [stub('reinforcement', () => [0, 1, 2, 3, 4, 5])]
    });

    expect(run.predictions.map(p => p.status)).toEqual(['failed']);
    expect(publisher.events).toEqual([]);
  });

  it('should hand models the history oldest first with the game frequency', async () => {
    const { stores, draws } = await seededStores(10);
    const seen: PredictionInput[] = [];

    await generatePredictions(game, {
      ...stores,
      publisher: createRecordingPublisher(),
      now,
      adapters: [stub('anomaly_detection', input => {
        seen.push(input);
        return [7, 8, 9, 10, 11, 12];
      })]
    });

    expect(seen[0].history).toEqual(draws.map(d => d.numbers));
    expect(seen[0].frequency).toHaveLength(42);
    expect(seen[0].minHistory).toBe(10);
  });

  it('should produce a valid ticket from every built-in model', async () => {
    const { stores } = await seededStores(30);

    const run = await generatePredictions(game, {
      ...stores,
      publisher: createRecordingPublisher(),
      now,
      rng: mulberry32(5)
    });

    expect(run.predictions.map(p => [p.modelKind, p.status])).toEqual([
      ['gradient_boosting', 'ok'],
      ['decision_tree', 'ok'],
      ['markov_chain', 'ok'],
      ['anomaly_detection', 'ok'],
      ['reinforcement', 'ok']
    ]);
    expect(stores.predictionRows).toHaveLength(5);
  });

  describe('isValidTicket', () => {
    it('should require six distinct ascending numbers in range', () => {
      expect(isValidTicket([1, 2, 3, 4, 5, 42], game)).toBe(true);
      expect(isValidTicket([2, 1, 3, 4, 5, 6], game)).toBe(false);
      expect(isValidTicket([1, 2, 3, 4, 5, 43], game)).toBe(false);
      expect(isValidTicket([1, 2, 3, 4, 5], game)).toBe(false);
      expect(isValidTicket([1, 2, 3, 4, 5, 5.5], game)).toBe(false);
    });
  });
});
