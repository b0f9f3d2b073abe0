/**
 * Lotto Forecast Service - Main Entry Point
 *
 * Serves the REST API over draw history ingested from public spreadsheets,
 * with number statistics, model predictions and prediction accuracy.
 */

import { logger } from './core/logger.js';
import { closeDatabase } from './db/client.js';
import { startApp } from './services/app.js';

// Start the service and handle any uncaught errors
startApp().catch(async (err: unknown) => {
  logger.error({ err }, 'Fatal error occurred');
  await closeDatabase().catch((closeErr: unknown) => {
    logger.warn({ err: closeErr }, 'Error closing database connections');
  });
  process.exit(1);
});
