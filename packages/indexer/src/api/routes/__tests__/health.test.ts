/**
 * Health route integration tests
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { setupTestDb, closeTestDb, type TestDb } from '../../../test/db-helpers';
import { createTestApp, type TestApp } from '../../../test/app-helpers';

describe('Health routes', () => {
  let t: TestDb;
  let app: TestApp['app'];

  beforeAll(async () => {
    t = await setupTestDb();
    ({ app } = createTestApp(t));
  });

  afterAll(async () => {
    await closeTestDb(t);
  });

  describe('GET /health/live', () => {
    it('returns 200 with status ok', async () => {
      const res = await app.request('/health/live');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ status: 'ok' });
    });
  });

  describe('GET /health', () => {
    it('returns health status with database and scheduler checks', async () => {
      const res = await app.request('/health');

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        status: 'healthy',
        checks: { database: 'connected', scheduler: 'stopped' },
      });
    });
  });

  describe('GET /health/ready', () => {
    it('returns readiness status', async () => {
      const res = await app.request('/health/ready');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ status: 'ready' });
    });
  });

  describe('unknown paths', () => {
    it('returns a JSON 404', async () => {
      const res = await app.request('/nope');

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: 'Not Found', path: '/nope' });
    });
  });
});
