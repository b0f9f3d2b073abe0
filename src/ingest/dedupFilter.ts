/**
 * Deduplication Filter
 *
 * A draw is identified by its date and draw number. Incoming draws whose key
 * is already stored, or already accepted earlier in the same batch, are dropped.
 */

import type { ParsedDraw } from '../types/domain.js';

export type DrawKeyFields = Pick<ParsedDraw, 'drawDate' | 'drawNumber'>;

export interface FilterOutcome<T> {
  fresh: T[];
  duplicates: number;
}

/**
 * Composite key of a draw; a missing draw number is the empty string
 *
 * @example
 * compositeKey({ drawDate: '2015-04-01', drawNumber: null }) // '2015-04-01|'
 */
export function compositeKey(draw: DrawKeyFields): string {
  return `${draw.drawDate}|${draw.drawNumber ?? ''}`;
}

/**
 * Splits incoming draws into those not yet stored and a duplicate count
 *
 * Input order is preserved; the first draw with a given key wins.
 */
export function filterNewDraws<T extends DrawKeyFields>(
  incoming: readonly T[],
  existing: readonly DrawKeyFields[]
): FilterOutcome<T> {
  const seen = new Set(existing.map(compositeKey));
  const fresh: T[] = [];

  for (const draw of incoming) {
    const key = compositeKey(draw);
    if (seen.has(key)) continue;
    seen.add(key);
    fresh.push(draw);
  }

  return { fresh, duplicates: incoming.length - fresh.length };
}
