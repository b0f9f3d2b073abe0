import { describe, it, expect } from 'vitest';
import { computeDistribution, computeStatistics } from '../../src/services/statisticsService.js';
import { GAMES } from '../../src/core/games.js';
import { mulberry32, sampleDistinct } from '../../src/util/random.js';
import { draw } from '../helpers/memoryStores.js';

// A small range keeps every list short enough to assert in full
const game = { id: 'lotto_6_42' as const, minNumber: 1, maxNumber: 8 };

const draws = [
  draw('lotto_6_42', '2020-01-01', [1, 2, 3, 4, 5, 6], { jackpot: 100 }),
  draw('lotto_6_42', '2020-01-03', [1, 2, 3, 4, 5, 7]),
  draw('lotto_6_42', '2020-01-02', [1, 2, 3, 6, 7, 8], { jackpot: 300 })
];

describe('statisticsService', () => {
  describe('computeStatistics', () => {
    it('should count every number in the range', () => {
      expect(computeStatistics(game, draws).frequency).toEqual([
        { number: 1, count: 3 },
        { number: 2, count: 3 },
        { number: 3, count: 3 },
        { number: 4, count: 2 },
        { number: 5, count: 2 },
        { number: 6, count: 2 },
        { number: 7, count: 2 },
        { number: 8, count: 1 }
      ]);
    });

    it('should order hot and cold with ties broken by ascending number', () => {
      const stats = computeStatistics(game, draws);

      expect(stats.hot.map(h => h.number)).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
      expect(stats.cold.map(c => c.number)).toEqual([8, 4, 5, 6, 7, 1, 2, 3]);
    });

    it('should count overdue draws from the newest draw date', () => {
      expect(computeStatistics(game, draws).overdue).toEqual([
        { number: 6, drawsSince: 1 },
        { number: 8, drawsSince: 1 },
        { number: 1, drawsSince: 0 },
        { number: 2, drawsSince: 0 },
        { number: 3, drawsSince: 0 },
        { number: 4, drawsSince: 0 },
        { number: 5, drawsSince: 0 },
        { number: 7, drawsSince: 0 }
      ]);
    });

    it('should treat a never-drawn number as overdue by the whole history', () => {
      const stats = computeStatistics({ ...game, maxNumber: 9 }, draws);

      expect(stats.overdue[0]).toEqual({ number: 9, drawsSince: 3 });
      expect(stats.cold[0]).toEqual({ number: 9, count: 0 });
    });

    it('should summarize draws and known jackpots', () => {
      expect(computeStatistics(game, draws).summary).toEqual({
        totalDraws: 3,
        averageJackpot: 200,
        dateRange: { start: '2020-01-01', end: '2020-01-03' }
      });
    });

    it('should truncate the ranked lists to top', () => {
      const stats = computeStatistics(game, draws, { top: 3 });

      expect(stats.hot.map(h => h.number)).toEqual([1, 2, 3]);
      expect(stats.cold.map(c => c.number)).toEqual([8, 4, 5]);
      expect(stats.overdue.map(o => o.number)).toEqual([6, 8, 1]);
      expect(stats.frequency).toHaveLength(8);
    });

    it('should not depend on input order', () => {
      expect(computeStatistics(game, [...draws].reverse())).toEqual(computeStatistics(game, draws));
    });

    it('should return empty views when there are no draws', () => {
      expect(computeStatistics(game, [])).toEqual({
        gameId: 'lotto_6_42',
        frequency: [],
        hot: [],
        cold: [],
        overdue: [],
        summary: { totalDraws: 0, averageJackpot: null, dateRange: null }
      });
    });
  });

  describe('frequency invariants', () => {
    /**
     * Builds six-number tickets in which each number appears exactly as often
     * as requested, filling the emptiest tickets first
     */
    function ticketsWithCounts(counts: [number, number][], ticketCount: number): number[][] {
      const tickets: number[][] = Array.from({ length: ticketCount }, () => []);
      for (const [n, count] of [...counts].sort((a, b) => b[1] - a[1])) {
        const open = tickets
          .map((ticket, i) => ({ i, free: 6 - ticket.length }))
          .sort((a, b) => b.free - a.free || a.i - b.i)
          .slice(0, count);
        for (const { i } of open) tickets[i].push(n);
      }
      return tickets;
    }

    it('should rank cold as the exact reverse of hot when every count differs', () => {
      // Number n is drawn n - 1 times across eleven draws
      const tickets = ticketsWithCounts(
        Array.from({ length: 12 }, (_, i): [number, number] => [i + 1, i]),
        11
      );
      const uniqueDraws = tickets.map((numbers, i) =>
        draw('lotto_6_42', `2021-01-${String(i + 1).padStart(2, '0')}`, numbers)
      );
      const stats = computeStatistics({ id: 'lotto_6_42', minNumber: 1, maxNumber: 12 }, uniqueDraws);

      expect(tickets.every(t => t.length === 6)).toBe(true);
      expect(stats.hot.map(h => h.number)).toEqual([12, 11, 10, 9, 8, 7, 6, 5, 4, 3, 2, 1]);
      expect(stats.cold).toEqual([...stats.hot].reverse());
    });

    it('should count six numbers per draw', () => {
      const rng = mulberry32(42);
      const generated = Array.from({ length: 50 }, (_, i) =>
        draw('lotto_6_42', `2021-03-${String((i % 28) + 1).padStart(2, '0')}`, sampleDistinct(rng, 1, 42, 6))
      );
      const { frequency } = computeStatistics(GAMES.lotto_6_42, generated);

      expect(frequency).toHaveLength(42);
      expect(frequency.reduce((sum, f) => sum + f.count, 0)).toBe(6 * generated.length);
    });
  });

  describe('computeDistribution', () => {
    it('should compute sum and product statistics', () => {
      const result = computeDistribution([
        draw('lotto_6_42', '2020-01-01', [1, 2, 3, 4, 5, 6]),
        draw('lotto_6_42', '2020-01-02', [2, 3, 4, 5, 6, 7])
      ]);

      expect(result.draws.map(d => [d.sum, d.product])).toEqual([[21, 720], [27, 5040]]);
      expect(result.statistics?.count).toBe(2);
      expect(result.statistics?.sum).toEqual({ mean: 24, std: 3, min: 21, max: 27 });
      expect(result.statistics?.product).toEqual({ mean: 2880, std: 2160, min: 720, max: 5040 });
      expect(result.statistics?.logProduct.mean).toBeCloseTo((Math.log(720) + Math.log(5040)) / 2, 10);
      expect(result.statistics?.logProduct.std).toBeCloseTo(Math.log(7) / 2, 10);
    });

    it('should return null statistics when there are no draws', () => {
      expect(computeDistribution([])).toEqual({ draws: [], statistics: null });
    });
  });
});
