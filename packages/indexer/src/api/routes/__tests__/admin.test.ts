/**
 * Admin route integration tests
 */

import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import { setupTestDb, cleanDb, closeTestDb, countRecords, type TestDb } from '../../../test/db-helpers';
import { createTestApp, type TestApp } from '../../../test/app-helpers';
import { deferred } from '../../../test/fixtures';

describe('Admin routes', () => {
  let t: TestDb;
  let testApp: TestApp;

  beforeAll(async () => {
    t = await setupTestDb();
  });

  afterEach(async () => {
    await testApp.orchestrator.stop();
    await cleanDb(t.db);
  });

  afterAll(async () => {
    await closeTestDb(t);
  });

  const setup = () => {
    testApp = createTestApp(t);
    return testApp;
  };

  const postUpdate = (body: string) =>
    testApp.app.request('/admin/update', {
      method: 'POST',
      body,
      headers: { 'Content-Type': 'application/json' },
    });

  describe('POST /admin/update', () => {
    it('runs an update and returns its result', async () => {
      setup();

      const res = await postUpdate(JSON.stringify({ type: 'current' }));

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        message: 'Manual current update triggered successfully',
        result: { status: 'success', citiesRequested: 2, recordsRetrieved: 2, recordsInserted: 2 },
      });
      expect(await countRecords(t.db)).toBe(2);
    });

    it('runs a backfill', async () => {
      setup();

      const res = await postUpdate(JSON.stringify({ type: 'backfill' }));

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ message: 'Manual backfill update triggered successfully' });
    });

    it('answers 409 while the same run is in progress', async () => {
      setup();
      const gate = deferred();
      testApp.fetcher.gate = gate.promise;

      const first = postUpdate(JSON.stringify({ type: 'current' }));
      await new Promise(resolve => setTimeout(resolve, 20));
      const res = await postUpdate(JSON.stringify({ type: 'current' }));

      expect(res.status).toBe(409);
      expect(await res.json()).toEqual({ error: 'Conflict', message: 'Job "hourly_weather_update" is already running' });

      gate.resolve();
      expect((await first).status).toBe(200);
    });

    it('rejects an unknown update type', async () => {
      setup();

      const res = await postUpdate(JSON.stringify({ type: 'hourly' }));

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: "Invalid update type. Use 'current' or 'backfill'" });
    });

    it('rejects a body that is not JSON', async () => {
      setup();

      const res = await postUpdate('type=current');

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: 'Invalid JSON body' });
    });
  });

  describe('GET /admin/jobs', () => {
    it('is empty before the orchestrator starts', async () => {
      setup();

      const res = await testApp.app.request('/admin/jobs');

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        jobStatus: { running: false, jobs: [], recentHistory: [], totalHistoryEntries: 0 },
      });
    });

    it('lists the registered jobs once started', async () => {
      setup();
      await testApp.orchestrator.start();

      const res = await testApp.app.request('/admin/jobs');

      expect(await res.json()).toMatchObject({
        jobStatus: {
          running: true,
          jobs: [
            { id: 'hourly_weather_update', state: 'scheduled' },
            { id: 'daily_cleanup', state: 'scheduled' },
            { id: 'weekly_stats_update', state: 'scheduled' },
            { id: 'historical_backfill', state: 'scheduled' },
          ],
        },
      });
    });
  });

  describe('GET /admin/backfill-status', () => {
    it('reports every city as missing on an empty store', async () => {
      setup();

      const res = await testApp.app.request('/admin/backfill-status');

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        backfillStatus: {
          isComplete: false,
          totalEntitiesExpected: 2,
          entitiesWithData: 0,
          missingEntities: ['London', 'Paris'],
          expectedDays: 30,
        },
      });
    });
  });

  describe('GET /admin/status', () => {
    it('reports service status', async () => {
      setup();
      await testApp.orchestrator.start();

      const res = await testApp.app.request('/admin/status');

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        status: 'healthy',
        services: {
          scheduler: { status: 'running' },
          weatherApi: { status: 'configured', usage: { limitPerWindow: 60, windowMs: 60_000 } },
          database: { status: 'connected', stats: { totalRecords: 0, table: 'weather_records' } },
          backfill: { status: 'incomplete', isComplete: false },
        },
      });
    });
  });
});
