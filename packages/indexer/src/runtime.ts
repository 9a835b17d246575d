/**
 * Process wiring shared by the entrypoints
 */

import type pino from 'pino';
import type { WeatherClient } from '@app/api';
import { createSyncOrchestrator, type SyncOrchestrator } from './sync';
import type { MeasurementStore } from './db/store';
import { getDb, closeDb, type Database } from './db';
import { getConfig, type Config } from './lib/config';
import { getLogger } from './lib/logger';
import { closeRedis } from './lib/redis';
import { invalidateCache, WEATHER_CACHE_PATTERN } from './api/middleware/cache';

export interface Runtime {
  config: Config;
  logger: pino.Logger;
  db: Database;
  store: MeasurementStore;
  client: WeatherClient;
  orchestrator: SyncOrchestrator;
}

/**
 * Connect, bring the schema up to date and build the orchestrator
 */
export async function bootstrap(): Promise<Runtime> {
  const config = getConfig();
  const logger = getLogger();
  const db = getDb();

  const { orchestrator, store, client } = createSyncOrchestrator(
    config,
    db,
    logger,
    () => invalidateCache(WEATHER_CACHE_PATTERN)
  );

  await store.ensureSchema();

  return { config, logger, db, store, client, orchestrator };
}

/**
 * Stop jobs, then release connections
 */
export async function teardown(runtime: Runtime): Promise<void> {
  await runtime.orchestrator.stop();
  await runtime.client.close();
  await closeRedis();
  await closeDb();
}

/**
 * Run `shutdown` once on SIGINT/SIGTERM, then exit
 */
export function onShutdownSignal(logger: pino.Logger, shutdown: () => Promise<void>): void {
  let shuttingDown = false;

  const handler = (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down');

    shutdown()
      .then(() => {
        logger.info('Shutdown complete');
        process.exit(0);
      })
      .catch((err) => {
        logger.error({ err }, 'Shutdown failed');
        process.exit(1);
      });
  };

  process.on('SIGINT', handler);
  process.on('SIGTERM', handler);
}
