/**
 * Backfill runner - one collection pass, then a coverage report
 *
 * Usage: npm run backfill -w @app/indexer
 */

import { getLogger } from './lib/logger';
import { bootstrap, teardown } from './runtime';

const logger = getLogger();

async function runBackfill() {
  logger.info('Starting backfill runner');

  const runtime = await bootstrap();

  try {
    const result = await runtime.orchestrator.triggerBackfill();
    const verdict = await runtime.orchestrator.backfillStatus();

    logger.info({
      result,
      isComplete: verdict.isComplete,
      completeEntities: verdict.completeEntities,
      totalEntitiesExpected: verdict.totalEntitiesExpected,
      missing: verdict.missingEntities,
    }, 'Backfill complete');
  } finally {
    await teardown(runtime);
  }
}

runBackfill().catch((error) => {
  logger.error({ err: error }, 'Backfill failed');
  process.exit(1);
});
