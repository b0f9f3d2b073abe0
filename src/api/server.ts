/**
 * HTTP API
 *
 * Builds the express application. Stores, lock and publisher are injected so
 * the same app runs against PostgreSQL/Redis/Kafka in production and against
 * in-memory stand-ins in tests.
 */

import express, { type Express } from 'express';
import type { EventPublisher } from '../bus/kafkaProducer.js';
import type { IngestLock } from '../cache/ingestLock.js';
import type { AccuracyStore } from '../db/repositories/predictionAccuracy.js';
import type { DrawStore } from '../db/repositories/drawResults.js';
import type { PredictionStore } from '../db/repositories/predictions.js';
import type { FetchSheetOptions } from '../ingest/sheetFetcher.js';
import type { PredictionAdapter } from '../models/predictors/index.js';
import type { Rng } from '../util/random.js';
import { errorHandler, notFound, requestLogger } from './middleware.js';
import { createAccuracyRouter } from './routes/accuracy.js';
import { createIngestionRouter } from './routes/ingestion.js';
import { createPredictionsRouter } from './routes/predictions.js';
import { createResultsRouter } from './routes/results.js';
import { createStatsRouter } from './routes/stats.js';
import { createSystemRouter } from './routes/system.js';

export interface ApiDeps {
  draws: DrawStore;
  predictions: PredictionStore;
  accuracy: AccuracyStore;
  lock: IngestLock;
  publisher: EventPublisher;
  fetchOptions?: FetchSheetOptions;
  adapters?: PredictionAdapter[];
  rng?: Rng;
}

export function createServer(deps: ApiDeps): Express {
  const app = express();

  app.use(express.json());
  app.use(requestLogger);

  app.use('/api', createSystemRouter());
  app.use('/api/results', createResultsRouter(deps));
  app.use('/api/scrape', createIngestionRouter(deps));
  app.use('/api', createPredictionsRouter(deps));
  app.use('/api/accuracy', createAccuracyRouter(deps));
  app.use('/api/stats', createStatsRouter(deps));

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
