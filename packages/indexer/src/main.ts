/**
 * Main entry point - runs both API server and scheduled ingestion
 */

import { serve } from '@hono/node-server';
import { createApp } from './api';
import { getLogger } from './lib/logger';
import { bootstrap, onShutdownSignal, teardown } from './runtime';

const logger = getLogger();

async function main() {
  const runtime = await bootstrap();
  const { config, orchestrator, db } = runtime;

  logger.info({ env: config.nodeEnv, cities: orchestrator.cities.length }, 'Starting Weather Indexer');

  // Start API server first (so it's available during the first runs)
  const app = createApp({ orchestrator, db, config, logger });
  const server = serve({
    fetch: app.fetch,
    port: config.port,
    hostname: config.host,
  });

  logger.info({
    host: config.host,
    port: config.port,
  }, 'API server started');

  // Scheduling failures are fatal
  await orchestrator.start();

  logger.info('Weather Indexer started');

  onShutdownSignal(logger, async () => {
    server.close();
    await teardown(runtime);
  });
}

main().catch((error) => {
  logger.fatal({ err: error }, 'Failed to start Weather Indexer');
  process.exit(1);
});
