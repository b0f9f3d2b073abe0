/**
 * Ingestion Lock
 *
 * Serializes ingestion runs per game. Two concurrent runs for the same game
 * would both pass the duplicate filter against the same stored set and insert
 * the same draws twice.
 */

import { randomUUID } from 'crypto';
import type { Redis } from 'ioredis';
import { KEYS } from './keys.js';
import { cfg } from '../core/config.js';
import { logger } from '../core/logger.js';
import type { GameId } from '../core/games.js';
import { CacheError, IngestionInProgressError, toError } from '../errors/index.js';

export interface IngestLock {
  /** Returns a release token, or null when another run holds the lock */
  acquire(gameId: GameId): Promise<string | null>;
  release(gameId: GameId, token: string): Promise<void>;
}

// Deletes the key only if it still holds our token
const RELEASE_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
end
return 0
`;

/**
 * Redis-backed lock: SET NX with an expiry, released by token compare
 */
export function createRedisIngestLock(client: Redis, ttlMs: number = cfg.ingestion.lockTtlMs): IngestLock {
  return {
    async acquire(gameId) {
      const token = randomUUID();
      try {
        const result = await client.set(KEYS.ingestLock(gameId), token, 'PX', ttlMs, 'NX');
        return result === 'OK' ? token : null;
      } catch (err) {
        const error = toError(err);
        throw new CacheError(`Failed to acquire ingestion lock: ${error.message}`, 'acquire', error);
      }
    },

    async release(gameId, token) {
      try {
        await client.eval(RELEASE_SCRIPT, 1, KEYS.ingestLock(gameId), token);
      } catch (err) {
        // The lock expires on its own; a failed release only delays the next run
        logger.warn({ err, gameId }, 'Failed to release ingestion lock');
      }
    }
  };
}

/**
 * Runs `work` while holding the game's lock
 *
 * @throws IngestionInProgressError when the lock is held elsewhere
 */
export async function withIngestLock<T>(lock: IngestLock, gameId: GameId, work: () => Promise<T>): Promise<T> {
  const token = await lock.acquire(gameId);
  if (token === null) {
    throw new IngestionInProgressError(gameId);
  }
  try {
    return await work();
  } finally {
    await lock.release(gameId, token);
  }
}
