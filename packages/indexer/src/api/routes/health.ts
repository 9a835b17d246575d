/**
 * Health check endpoints
 */

import { Hono } from 'hono';
import { checkDbConnection, type Database } from '../../db';
import type { SyncOrchestrator } from '../../sync';

export function createHealthRouter(db: Database, orchestrator: SyncOrchestrator): Hono {
  const router = new Hono();

  router.get('/', async (c) => {
    const dbConnected = await checkDbConnection(db);

    const status = dbConnected ? 'healthy' : 'unhealthy';
    const statusCode = dbConnected ? 200 : 503;

    return c.json(
      {
        status,
        timestamp: new Date().toISOString(),
        checks: {
          database: dbConnected ? 'connected' : 'disconnected',
          scheduler: orchestrator.isRunning ? 'running' : 'stopped',
        },
      },
      statusCode
    );
  });

  router.get('/live', (c) => {
    return c.json({ status: 'ok' });
  });

  router.get('/ready', async (c) => {
    const dbConnected = await checkDbConnection(db);

    if (!dbConnected) {
      return c.json({ status: 'not ready', reason: 'database not connected' }, 503);
    }

    return c.json({ status: 'ready' });
  });

  return router;
}
