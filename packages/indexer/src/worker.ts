/**
 * Ingestion worker - scheduled collection without the HTTP API
 */

import { getLogger } from './lib/logger';
import { bootstrap, onShutdownSignal, teardown } from './runtime';

const logger = getLogger();

async function startWorker() {
  logger.info('Starting ingestion worker');

  const runtime = await bootstrap();
  await runtime.orchestrator.start();

  onShutdownSignal(logger, () => teardown(runtime));

  // Keep the process running
  logger.info('Ingestion worker started');
}

startWorker().catch((error) => {
  logger.fatal({ err: error }, 'Failed to start ingestion worker');
  process.exit(1);
});
