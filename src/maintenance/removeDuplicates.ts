/**
 * Duplicate removal command
 *
 * Usage: npm run dedupe [-- <gameId> ...]
 * With no game ids every game is processed. Policy and conflict handling come
 * from DEDUPE_POLICY and DEDUPE_ON_CONFLICT.
 */

import { cfg } from '../core/config.js';
import { GAME_IDS, type GameId } from '../core/games.js';
import { logger } from '../core/logger.js';
import { closeDatabase } from '../db/client.js';
import { pgDrawStore } from '../db/repositories/drawResults.js';
import { requireGame } from '../util/validation.js';
import { removeDuplicates, type DedupeReport } from './duplicates.js';

export async function runDedupe(args: readonly string[]): Promise<DedupeReport[]> {
  const gameIds: GameId[] = args.length > 0 ? args.map(a => requireGame(a).id) : [...GAME_IDS];
  logger.info({ games: gameIds, ...cfg.maintenance }, 'Removing duplicate draws');
  return removeDuplicates(gameIds, { draws: pgDrawStore }, {
    policy: cfg.maintenance.duplicatePolicy,
    onConflict: cfg.maintenance.onConflict
  });
}

// Run if this file is executed directly (not imported)
if (import.meta.url === `file://${process.argv[1]}` || process.argv[1]?.includes('removeDuplicates.ts')) {
  runDedupe(process.argv.slice(2))
    .then(async (reports) => {
      const removed = reports.reduce((sum, r) => sum + r.removed, 0);
      logger.info({ removed }, 'Duplicate removal completed');
      await closeDatabase();
      process.exit(0);
    })
    .catch((err: unknown) => {
      logger.error({ err }, 'Duplicate removal failed');
      process.exit(1);
    });
}
