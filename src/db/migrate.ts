/**
 * Database Migration Runner
 *
 * Runs SQL migration files in order to set up the database schema.
 * Every migration is idempotent (IF NOT EXISTS), so the full set runs on each start.
 */

import { readFileSync, readdirSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { closeDatabase, db } from './client.js';
import { logger } from '../core/logger.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Resolves the migrations directory
 *
 * SQL files are not copied by tsc, so a build under dist/ reads them from the
 * source tree relative to the working directory.
 */
function migrationsDir(): string {
  return __dirname.includes('/dist/')
    ? join(process.cwd(), 'src/db/migrations')
    : join(__dirname, 'migrations');
}

/**
 * Runs all migration files in lexical order
 */
export async function runMigrations(): Promise<void> {
  const dir = migrationsDir();
  const migrations = readdirSync(dir).filter(f => f.endsWith('.sql')).sort();

  for (const migrationFile of migrations) {
    try {
      const sql = readFileSync(join(dir, migrationFile), 'utf-8');
      await db.query(sql);
      logger.info({ migration: migrationFile }, 'Migration applied successfully');
    } catch (err) {
      logger.error({ err, migration: migrationFile }, 'Failed to run migration');
      throw err;
    }
  }

  logger.info({ count: migrations.length }, 'All database migrations completed successfully');
}

// Run migrations if this file is executed directly (not imported)
if (import.meta.url === `file://${process.argv[1]}` || process.argv[1]?.includes('migrate.ts')) {
  runMigrations()
    .then(async () => {
      await closeDatabase();
      process.exit(0);
    })
    .catch((err: unknown) => {
      logger.error({ err }, 'Migration failed');
      process.exit(1);
    });
}
