/**
 * Schema migration script: creates weather_records and adds missing columns
 * Run with: npm run db:migrate
 */

import { MeasurementStore } from './store';
import { getDb, closeDb } from './index';
import { getConfig } from '../lib/config';
import { getLogger } from '../lib/logger';

async function runMigrations() {
  const config = getConfig();
  const logger = getLogger();

  logger.info('Running database migrations...');
  logger.info({ url: config.databaseUrl.replace(/:[^:@]+@/, ':****@') }, 'Database target');

  const store = new MeasurementStore(getDb(), logger.child({ module: 'store' }));

  try {
    await store.ensureSchema();
    logger.info('Migrations completed successfully');
  } finally {
    await closeDb();
  }
}

runMigrations().catch((error) => {
  getLogger().error({ err: error }, 'Migration failed');
  process.exit(1);
});
