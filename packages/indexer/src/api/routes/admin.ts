/**
 * Admin endpoints: manual runs, job and backfill status
 */

import { Hono } from 'hono';
import { z } from 'zod';
import type { SyncOrchestrator } from '../../sync';

const ManualUpdateSchema = z.object({
  type: z.enum(['current', 'backfill']),
});

export function createAdminRouter(orchestrator: SyncOrchestrator): Hono {
  const router = new Hono();

  /**
   * POST /admin/update - run an update or backfill now
   * Body: { "type": "current" | "backfill" }
   */
  router.post('/update', async (c) => {
    let body: unknown;
    try {
      body = await c.req.json<unknown>();
    } catch (err) {
      return c.json({ error: 'Invalid JSON body', message: err instanceof Error ? err.message : String(err) }, 400);
    }

    const request = ManualUpdateSchema.safeParse(body);
    if (!request.success) {
      return c.json({ error: "Invalid update type. Use 'current' or 'backfill'", details: request.error.format() }, 400);
    }

    const { type } = request.data;
    const result = type === 'current'
      ? await orchestrator.triggerUpdate()
      : await orchestrator.triggerBackfill();

    return c.json({
      message: `Manual ${type} update triggered successfully`,
      result,
      timestamp: new Date().toISOString(),
    });
  });

  /**
   * GET /admin/jobs - scheduled jobs and recent executions
   */
  router.get('/jobs', (c) => {
    return c.json({
      timestamp: new Date().toISOString(),
      jobStatus: orchestrator.jobStatus(),
    });
  });

  router.get('/backfill-status', async (c) => {
    return c.json({
      timestamp: new Date().toISOString(),
      backfillStatus: await orchestrator.backfillStatus(),
    });
  });

  /**
   * GET /admin/status - scheduler, upstream usage, database and backfill
   */
  router.get('/status', async (c) => {
    return c.json(await orchestrator.systemStatus());
  });

  return router;
}
