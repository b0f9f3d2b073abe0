/**
 * Redis Client Module
 *
 * Creates and exports a singleton Redis client instance.
 * The connection is opened lazily by the first command, so importing this
 * module does not touch the network.
 */

import { Redis } from 'ioredis';
import { cfg } from '../core/config.js';
import { logger } from '../core/logger.js';

/**
 * Redis client instance, used for the per-game ingestion locks
 */
export const redis = new Redis(cfg.redis.url, { lazyConnect: true });

redis.on('connect', () => logger.info('Redis connected'));
redis.on('error', (err: Error) => logger.error({ err }, 'Redis error'));

export async function closeRedis(): Promise<void> {
  if (redis.status === 'wait' || redis.status === 'end') return;
  await redis.quit();
  logger.info('Redis connection closed');
}
