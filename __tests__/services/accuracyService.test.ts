import { describe, it, expect } from 'vitest';
import { NotFoundError, ValidationError } from '../../src/errors/index.js';
import { autoCalculateAccuracy, calculateMetrics, scorePrediction } from '../../src/services/accuracyService.js';
import { createMemoryStores, draw } from '../helpers/memoryStores.js';

describe('accuracyService', () => {
  describe('calculateMetrics', () => {
    it('should measure a near miss', () => {
      expect(calculateMetrics([1, 2, 3, 4, 5, 6], [1, 2, 3, 4, 5, 7])).toEqual({
        euclidean: 1,
        manhattan: 1,
        hamming: 1,
        setIntersection: 5,
        sumDifference: 1,
        productDifference: 120
      });
    });

    it('should compare tickets in ascending order regardless of input order', () => {
      expect(calculateMetrics([42, 10, 41, 20, 40, 30], [6, 5, 4, 3, 2, 1])).toEqual({
        euclidean: Math.sqrt(5022),
        manhattan: 162,
        hamming: 6,
        setIntersection: 0,
        sumDifference: 162,
        productDifference: 413279280
      });
    });
  });

  describe('scorePrediction', () => {
    it('should store the score once per pair', async () => {
      const stores = createMemoryStores();
      const [result] = await stores.draws.insertDraws('lotto_6_42', [draw('lotto_6_42', '2024-05-01', [1, 2, 3, 4, 5, 7])]);
      const prediction = await stores.predictions.insertPrediction({
        gameId: 'lotto_6_42',
        modelKind: 'markov_chain',
        numbers: [1, 2, 3, 4, 5, 6],
        targetDrawDate: '2024-05-01'
      });

      const first = await scorePrediction(prediction.id, result.id, 'lotto_6_42', stores);
      const second = await scorePrediction(prediction.id, result.id, 'lotto_6_42', stores);

      expect(first.created).toBe(true);
      expect(first.accuracy).toMatchObject({ numbersMatched: 5, errorDistance: 1 });
      expect(second.created).toBe(false);
      expect(stores.accuracyRows).toHaveLength(1);
      expect((await stores.predictions.getPrediction(prediction.id))?.resultId).toBe(result.id);
    });

    it('should reject unknown records', async () => {
      const stores = createMemoryStores();
      const missing = '00000000-0000-4000-8000-000000000000';

      await expect(scorePrediction(missing, missing, 'lotto_6_42', stores)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should reject records from another game', async () => {
      const stores = createMemoryStores();
      const [result] = await stores.draws.insertDraws('mega_lotto_6_45', [draw('mega_lotto_6_45', '2024-05-01', [1, 2, 3, 4, 5, 6])]);
      const prediction = await stores.predictions.insertPrediction({
        gameId: 'lotto_6_42',
        modelKind: 'decision_tree',
        numbers: [1, 2, 3, 4, 5, 6],
        targetDrawDate: '2024-05-01'
      });

      await expect(scorePrediction(prediction.id, result.id, 'lotto_6_42', stores)).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('autoCalculateAccuracy', () => {
    it('should score predictions whose target date has a draw, skipping pairs already scored', async () => {
      const stores = createMemoryStores();
      await stores.draws.insertDraws('lotto_6_42', [
        draw('lotto_6_42', '2024-05-01', [1, 2, 3, 4, 5, 6]),
        draw('lotto_6_42', '2024-05-02', [7, 8, 9, 10, 11, 12])
      ]);
      for (const [numbers, targetDrawDate] of [
        [[1, 2, 3, 10, 11, 12], '2024-05-01'],
        [[1, 2, 3, 4, 11, 12], '2024-05-01'],
        [[1, 2, 3, 4, 5, 6], '2024-05-03']
      ] as const) {
        await stores.predictions.insertPrediction({
          gameId: 'lotto_6_42',
          modelKind: 'reinforcement',
          numbers: [...numbers],
          targetDrawDate
        });
      }

      expect(await autoCalculateAccuracy(['lotto_6_42'], stores)).toBe(2);
      expect(stores.accuracyRows.map(a => a.numbersMatched)).toEqual([3, 4]);
      expect(await autoCalculateAccuracy(['lotto_6_42'], stores)).toBe(0);
    });

    it('should leave other games alone', async () => {
      const stores = createMemoryStores();
      await stores.draws.insertDraws('lotto_6_42', [draw('lotto_6_42', '2024-05-01', [1, 2, 3, 4, 5, 6])]);
      await stores.predictions.insertPrediction({
        gameId: 'lotto_6_42',
        modelKind: 'gradient_boosting',
        numbers: [1, 2, 3, 4, 5, 6],
        targetDrawDate: '2024-05-01'
      });

      expect(await autoCalculateAccuracy(['grand_lotto_6_55'], stores)).toBe(0);
    });
  });
});
