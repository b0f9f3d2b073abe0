/**
 * Configuration Module
 *
 * Centralizes all application configuration from environment variables.
 * Loads .env file automatically via dotenv/config import.
 */

import 'dotenv/config';

/**
 * Reads an optional numeric environment variable
 *
 * @param name - Environment variable name
 * @param fallback - Value used when the variable is unset or not a finite number
 */
function numberEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

/**
 * Reads an environment variable constrained to a fixed set of values
 */
function choiceEnv<T extends string>(name: string, choices: readonly T[], fallback: T): T {
  const raw = process.env[name]?.trim();
  return choices.find(c => c === raw) ?? fallback;
}

export const DUPLICATE_POLICIES = ['first-seen', 'earliest-ingested', 'latest-ingested'] as const;
export type DuplicatePolicy = typeof DUPLICATE_POLICIES[number];

export const CONFLICT_MODES = ['skip', 'resolve'] as const;
export type ConflictMode = typeof CONFLICT_MODES[number];

/**
 * Application configuration object
 *
 * All configuration values are read from environment variables with sensible defaults.
 */
export const cfg = {
  // HTTP API
  http: {
    port: numberEnv('PORT', 5000)
  },
  // Spreadsheet source (CSV export of a public Google Sheet)
  sheets: {
    baseUrl: process.env.SHEETS_BASE_URL || 'https://docs.google.com/spreadsheets/d',
    sheetName: process.env.SHEETS_SHEET_NAME || 'Sheet1',
    timeoutMs: numberEnv('SHEETS_TIMEOUT_MS', 30000)
  },
  // Ingestion runs
  ingestion: {
    lockTtlMs: numberEnv('INGEST_LOCK_TTL_MS', 5 * 60 * 1000) // Upper bound on a single game's run
  },
  // Prediction adapters
  predictions: {
    timezone: process.env.PREDICTION_TIMEZONE || 'Asia/Manila', // Draws are scheduled in Philippine time
    seed: process.env.PREDICTION_SEED ? numberEnv('PREDICTION_SEED', 0) : undefined, // Fixed seed makes runs reproducible
    minHistory: numberEnv('PREDICTION_MIN_HISTORY', 10)
  },
  models: {
    gradientBoosting: {
      rounds: numberEnv('GB_ROUNDS', 30),
      learningRate: numberEnv('GB_LEARNING_RATE', 0.1),
      maxDepth: numberEnv('GB_MAX_DEPTH', 2)
    },
    decisionTree: {
      maxDepth: numberEnv('DT_MAX_DEPTH', 4),
      minSamplesLeaf: numberEnv('DT_MIN_SAMPLES_LEAF', 20)
    },
    anomalyDetection: {
      epsilon: numberEnv('ANOMALY_EPSILON', 2.0), // Standard deviations for the boundary
      candidates: numberEnv('ANOMALY_CANDIDATES', 1000)
    },
    reinforcement: {
      learningRate: numberEnv('RL_LEARNING_RATE', 0.1),
      epsilon: numberEnv('RL_EPSILON', 1.0),
      epsilonDecay: numberEnv('RL_EPSILON_DECAY', 0.995),
      epsilonMin: numberEnv('RL_EPSILON_MIN', 0.01)
    }
  },
  // Duplicate removal maintenance job
  maintenance: {
    duplicatePolicy: choiceEnv('DEDUPE_POLICY', DUPLICATE_POLICIES, 'first-seen'),
    onConflict: choiceEnv('DEDUPE_ON_CONFLICT', CONFLICT_MODES, 'skip')
  },
  // Kafka/Redpanda configuration
  kafka: {
    enabled: process.env.KAFKA_ENABLED === 'true',
    brokers: (process.env.KAFKA_BROKERS || 'localhost:9092').split(',').map(b => b.trim()), // Comma-separated list of Kafka broker addresses
    clientId: process.env.KAFKA_CLIENT_ID || 'lotto-forecast-service',
    topicEvents: process.env.KAFKA_TOPIC_EVENTS || 'lotto.events'
  },
  // Redis configuration
  redis: {
    url: process.env.REDIS_URL || 'redis://localhost:6379'
  },
  // Database configuration
  database: {
    host: process.env.DB_HOST || 'localhost',
    port: numberEnv('DB_PORT', 5432),
    user: process.env.DB_USER || 'lotto',
    password: process.env.DB_PASSWORD || 'lotto',
    database: process.env.DB_NAME || 'lotto',
    ssl: process.env.DB_SSL === 'true' ? { rejectUnauthorized: false } : false,
    max: numberEnv('DB_POOL_SIZE', 10), // Connection pool size
    idleTimeoutMillis: numberEnv('DB_IDLE_TIMEOUT_MS', 30000),
    connectionTimeoutMillis: numberEnv('DB_CONNECTION_TIMEOUT_MS', 5000)
  },
  // Logging configuration
  logLevel: process.env.LOG_LEVEL || 'info' // Log level (trace, debug, info, warn, error, fatal, silent)
};
