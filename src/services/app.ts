/**
 * Application Service
 *
 * Main application orchestration logic.
 * Handles initialization, HTTP server startup, and graceful shutdown.
 */

import type { Server } from 'http';
import { cfg } from '../core/config.js';
import { logger } from '../core/logger.js';
import { createServer } from '../api/server.js';
import { createEventPublisher, type EventPublisher } from '../bus/kafkaProducer.js';
import { createRedisIngestLock } from '../cache/ingestLock.js';
import { closeRedis, redis } from '../cache/redisClient.js';
import { closeDatabase } from '../db/client.js';
import { runMigrations } from '../db/migrate.js';
import { pgAccuracyStore } from '../db/repositories/predictionAccuracy.js';
import { pgDrawStore } from '../db/repositories/drawResults.js';
import { pgPredictionStore } from '../db/repositories/predictions.js';
import { waitForServices } from '../util/waitForServices.js';

/**
 * Sets up graceful shutdown handlers
 */
function setupShutdownHandlers(server: Server, publisher: EventPublisher): void {
  const shutdown = async (signal: string) => {
    logger.info(`${signal} received, shutting down`);

    await new Promise<void>((resolve) => {
      server.close((err) => {
        if (err) logger.warn({ err }, 'Error closing HTTP server');
        resolve();
      });
    });

    try {
      await publisher.stop();
    } catch (err) {
      logger.warn({ err }, 'Error stopping Kafka producer');
    }

    try {
      await closeRedis();
    } catch (err) {
      logger.warn({ err }, 'Error closing Redis connection');
    }

    try {
      await closeDatabase();
    } catch (err) {
      logger.warn({ err }, 'Error closing database connections');
    }

    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

/**
 * Main application logic
 *
 * 1. Waits for PostgreSQL, Redis and (when enabled) Kafka
 * 2. Applies database migrations
 * 3. Connects the event publisher
 * 4. Starts the HTTP API
 */
export async function startApp(): Promise<Server> {
  try {
    await waitForServices();
  } catch (err) {
    logger.error({ err }, 'Failed to wait for services, continuing anyway...');
  }

  await runMigrations();

  const publisher = createEventPublisher();
  await publisher.start();

  const app = createServer({
    draws: pgDrawStore,
    predictions: pgPredictionStore,
    accuracy: pgAccuracyStore,
    lock: createRedisIngestLock(redis),
    publisher
  });

  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(cfg.http.port, () => resolve(listening));
  });
  logger.info({ port: cfg.http.port, kafka: cfg.kafka.enabled }, 'HTTP API listening');

  setupShutdownHandlers(server, publisher);
  return server;
}
