/**
 * API Server - Hono HTTP server without the scheduler
 */

import { serve } from '@hono/node-server';
import { createApp } from './api';
import { getLogger } from './lib/logger';
import { bootstrap, onShutdownSignal, teardown } from './runtime';

const logger = getLogger();

async function startServer() {
  logger.info('Starting API server');

  const runtime = await bootstrap();
  const { config, orchestrator, db } = runtime;

  const app = createApp({ orchestrator, db, config, logger });
  const server = serve({
    fetch: app.fetch,
    port: config.port,
    hostname: config.host,
  });

  logger.info({ host: config.host, port: config.port }, 'API server started');

  onShutdownSignal(logger, async () => {
    server.close();
    await teardown(runtime);
  });
}

startServer().catch((error) => {
  logger.fatal({ err: error }, 'Failed to start API server');
  process.exit(1);
});
