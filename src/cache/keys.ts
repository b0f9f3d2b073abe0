/**
 * Redis Key Generators
 *
 * Centralized key generation for Redis entries.
 */

import type { GameId } from '../core/games.js';

export const KEYS = {
  /** Held while one ingestion run for the game is in progress */
  ingestLock: (gameId: GameId) => `lock:ingest:${gameId}`,
};
