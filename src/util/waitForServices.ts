/**
 * Wait for Services Utility
 *
 * Waits for external services (PostgreSQL, Redis, and Kafka when enabled) to
 * be ready before starting the application. Prevents startup errors from
 * connection failures.
 */

import { cfg } from '../core/config.js';
import { logger } from '../core/logger.js';
import { HEALTH_CHECK } from '../core/constants.js';
import { Redis } from 'ioredis';
import { Kafka } from 'kafkajs';
import pg from 'pg';

const MAX_RETRIES = HEALTH_CHECK.MAX_RETRIES;
const RETRY_DELAY_MS = HEALTH_CHECK.RETRY_DELAY_MS;

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Retries `check` until it resolves or the attempts run out
 */
async function waitFor(name: string, check: () => Promise<void>): Promise<void> {
  logger.info(`Waiting for ${name} to be ready...`);

  for (let i = 0; i < MAX_RETRIES; i++) {
    try {
      await check();
      logger.info(`✓ ${name} is ready`);
      return;
    } catch (err) {
      if (i < MAX_RETRIES - 1) {
        logger.debug({ attempt: i + 1, maxRetries: MAX_RETRIES }, `${name} not ready, retrying...`);
        await delay(RETRY_DELAY_MS);
      } else {
        throw new Error(`${name} failed to become ready after ${MAX_RETRIES} attempts: ${String(err)}`);
      }
    }
  }
}

async function pingRedis(): Promise<void> {
  const client = new Redis(cfg.redis.url, {
    lazyConnect: true,
    maxRetriesPerRequest: 1,
    retryStrategy: () => null, // Don't retry, just test connection
    connectTimeout: HEALTH_CHECK.CONNECTION_TIMEOUT_MS
  });
  try {
    await client.connect();
    await client.ping();
  } finally {
    client.disconnect();
  }
}

async function pingKafka(): Promise<void> {
  const kafka = new Kafka({
    clientId: `${cfg.kafka.clientId}-health-check`,
    brokers: cfg.kafka.brokers,
    connectionTimeout: HEALTH_CHECK.CONNECTION_TIMEOUT_MS,
    requestTimeout: HEALTH_CHECK.CONNECTION_TIMEOUT_MS
  });
  const admin = kafka.admin();
  await admin.connect();
  try {
    await admin.listTopics();
  } finally {
    await admin.disconnect();
  }
}

async function pingPostgres(): Promise<void> {
  const client = new pg.Client({
    host: cfg.database.host,
    port: cfg.database.port,
    user: cfg.database.user,
    password: cfg.database.password,
    database: cfg.database.database,
    ssl: cfg.database.ssl,
    connectionTimeoutMillis: HEALTH_CHECK.CONNECTION_TIMEOUT_MS
  });
  await client.connect();
  try {
    await client.query('SELECT 1');
  } finally {
    await client.end();
  }
}

/**
 * Wait for all required services to be ready
 *
 * @throws Error naming every service that never became ready
 */
export async function waitForServices(): Promise<void> {
  logger.info('Checking service availability...');

  const checks = [
    waitFor('PostgreSQL', pingPostgres),
    waitFor('Redis', pingRedis),
    ...(cfg.kafka.enabled ? [waitFor('Kafka', pingKafka)] : [])
  ];

  // Run checks in parallel for faster startup
  const results = await Promise.allSettled(checks);
  const failures = results
    .filter((r): r is PromiseRejectedResult => r.status === 'rejected')
    .map(r => String(r.reason));
  if (failures.length > 0) {
    throw new Error(failures.join('; '));
  }

  logger.info('Service availability check complete');
}
