/**
 * Statistics Service
 *
 * Pure projections of a game's stored draws: frequency, hot, cold and overdue
 * numbers, a summary, and the sum/product distribution. Nothing here reads
 * or writes storage; the same draws always give the same result.
 */

import type { GameConfig, GameId } from '../core/games.js';
import type { ParsedDraw } from '../types/domain.js';

export type StatDraw = Pick<ParsedDraw, 'drawDate' | 'numbers' | 'jackpot'>;

export interface NumberCount {
  number: number;
  count: number;
}

export interface OverdueNumber {
  number: number;
  /** Most recent consecutive draws without this number */
  drawsSince: number;
}

export interface DrawSummary {
  totalDraws: number;
  averageJackpot: number | null;
  dateRange: { start: string; end: string } | null;
}

export interface DrawStatistics {
  gameId: GameId;
  frequency: NumberCount[];
  hot: NumberCount[];
  cold: NumberCount[];
  overdue: OverdueNumber[];
  summary: DrawSummary;
}

export interface StatisticsOptions {
  /** Truncates hot, cold and overdue; all numbers are returned when omitted */
  top?: number;
}

/**
 * Appearance count of every number in the game's range, ascending by number
 *
 * Empty when there are no draws.
 */
export function countFrequency(game: Pick<GameConfig, 'minNumber' | 'maxNumber'>, draws: readonly StatDraw[]): NumberCount[] {
  if (draws.length === 0) return [];

  const counts = new Map<number, number>();
  for (const draw of draws) {
    for (const n of draw.numbers) {
      counts.set(n, (counts.get(n) ?? 0) + 1);
    }
  }

  const frequency: NumberCount[] = [];
  for (let n = game.minNumber; n <= game.maxNumber; n++) {
    frequency.push({ number: n, count: counts.get(n) ?? 0 });
  }
  return frequency;
}

/**
 * Most frequent first; ties by ascending number
 */
export function rankHot(frequency: readonly NumberCount[]): NumberCount[] {
  return [...frequency].sort((a, b) => b.count - a.count || a.number - b.number);
}

/**
 * Least frequent first; ties by ascending number
 */
export function rankCold(frequency: readonly NumberCount[]): NumberCount[] {
  return [...frequency].sort((a, b) => a.count - b.count || a.number - b.number);
}

/**
 * For every number, how many of the latest draws (by draw date) lack it
 *
 * A number never drawn is overdue by the full history length.
 */
export function computeOverdue(game: Pick<GameConfig, 'minNumber' | 'maxNumber'>, draws: readonly StatDraw[]): OverdueNumber[] {
  if (draws.length === 0) return [];

  const newestFirst = [...draws].sort((a, b) => b.drawDate.localeCompare(a.drawDate));
  const overdue: OverdueNumber[] = [];

  for (let n = game.minNumber; n <= game.maxNumber; n++) {
    const idx = newestFirst.findIndex(d => d.numbers.includes(n));
    overdue.push({ number: n, drawsSince: idx === -1 ? newestFirst.length : idx });
  }

  return overdue.sort((a, b) => b.drawsSince - a.drawsSince || a.number - b.number);
}

export function summarize(draws: readonly StatDraw[]): DrawSummary {
  const jackpots = draws.map(d => d.jackpot).filter((j): j is number => j !== null);
  const dates = draws.map(d => d.drawDate).sort();
  const start = dates[0];
  const end = dates[dates.length - 1];

  return {
    totalDraws: draws.length,
    averageJackpot: jackpots.length > 0 ? jackpots.reduce((s, j) => s + j, 0) / jackpots.length : null,
    dateRange: start !== undefined && end !== undefined ? { start, end } : null
  };
}

/**
 * Computes the statistics view of a game's draws
 *
 * @example
 * computeStatistics(GAMES.lotto_6_42, draws, { top: 20 }).hot[0] // most drawn number
 */
export function computeStatistics(
  game: Pick<GameConfig, 'id' | 'minNumber' | 'maxNumber'>,
  draws: readonly StatDraw[],
  options: StatisticsOptions = {}
): DrawStatistics {
  const frequency = countFrequency(game, draws);
  const limit = <T>(list: T[]): T[] => (options.top === undefined ? list : list.slice(0, options.top));

  return {
    gameId: game.id,
    frequency,
    hot: limit(rankHot(frequency)),
    cold: limit(rankCold(frequency)),
    overdue: limit(computeOverdue(game, draws)),
    summary: summarize(draws)
  };
}

// Distribution of per-draw sums and products

export interface SeriesStats {
  mean: number;
  /** Population standard deviation */
  std: number;
  min: number;
  max: number;
}

export interface DrawShape {
  drawDate: string;
  numbers: number[];
  sum: number;
  product: number;
}

export interface Distribution {
  draws: DrawShape[];
  statistics: {
    count: number;
    sum: SeriesStats;
    product: SeriesStats;
    /** Mean and std of ln(product) */
    logProduct: { mean: number; std: number };
  } | null;
}

function seriesStats(values: readonly number[]): SeriesStats {
  const mean = values.reduce((s, v) => s + v, 0) / values.length;
  const variance = values.reduce((s, v) => s + (v - mean) ** 2, 0) / values.length;
  return {
    mean,
    std: Math.sqrt(variance),
    min: Math.min(...values),
    max: Math.max(...values)
  };
}

export function drawSum(numbers: readonly number[]): number {
  return numbers.reduce((s, n) => s + n, 0);
}

export function drawProduct(numbers: readonly number[]): number {
  return numbers.reduce((p, n) => p * n, 1);
}

/**
 * Sum and product of every draw, with aggregate statistics
 *
 * `statistics` is null when there are no draws.
 */
export function computeDistribution(draws: readonly StatDraw[]): Distribution {
  const shapes: DrawShape[] = draws.map(d => ({
    drawDate: d.drawDate,
    numbers: [...d.numbers],
    sum: drawSum(d.numbers),
    product: drawProduct(d.numbers)
  }));

  if (shapes.length === 0) {
    return { draws: [], statistics: null };
  }

  const logs = seriesStats(shapes.map(s => Math.log(s.product)));
  return {
    draws: shapes,
    statistics: {
      count: shapes.length,
      sum: seriesStats(shapes.map(s => s.sum)),
      product: seriesStats(shapes.map(s => s.product)),
      logProduct: { mean: logs.mean, std: logs.std }
    }
  };
}
