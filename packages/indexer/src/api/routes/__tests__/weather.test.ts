/**
 * Weather and cities route integration tests
 */

import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import { DAY_MS } from '@app/config';
import { setupTestDb, cleanDb, closeTestDb, type TestDb } from '../../../test/db-helpers';
import { createTestApp, type TestApp } from '../../../test/app-helpers';
import { buildMeasurement } from '../../../test/fixtures';

describe('Weather routes', () => {
  let t: TestDb;
  let testApp: TestApp;

  beforeAll(async () => {
    t = await setupTestDb();
    testApp = createTestApp(t);
  });

  afterEach(async () => {
    testApp.fetcher.failing.clear();
    await cleanDb(t.db);
  });

  afterAll(async () => {
    await closeTestDb(t);
  });

  const daysAgo = (days: number) => new Date(Date.now() - days * DAY_MS);

  describe('GET /weather/current/:city', () => {
    it('returns the stored reading', async () => {
      await t.store.upsert([buildMeasurement()]);

      const res = await testApp.app.request('/weather/current/London');

      expect(res.status).toBe(200);
      expect(res.headers.get('X-Cache')).toBe('BYPASS');
      expect(await res.json()).toEqual({
        city: 'London',
        country: 'GB',
        temperature: 15.5,
        feelsLike: 14.9,
        condition: 'Clouds',
        description: 'broken clouds',
        humidity: 72,
        pressure: 1012,
        windSpeed: 4.6,
        timestamp: '2024-06-01T12:00:00.000Z',
        coordinates: { latitude: 51.5085, longitude: -0.1257 },
        source: 'store',
      });
    });

    it('falls back to a live fetch for a city without stored data', async () => {
      const res = await testApp.app.request('/weather/current/Paris');

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ city: 'Paris', country: 'FR', source: 'live' });
    });

    it('returns 404 for a city upstream does not know', async () => {
      testApp.fetcher.failing.add('Atlantis');

      const res = await testApp.app.request('/weather/current/Atlantis');

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: 'No weather data found for Atlantis' });
    });
  });

  describe('GET /weather/history/:city', () => {
    it('returns readings inside the window, newest first', async () => {
      const newer = daysAgo(1);
      const older = daysAgo(2);
      await t.store.upsert([
        buildMeasurement({ observedAt: older, temperature: 11 }),
        buildMeasurement({ observedAt: newer, temperature: 12 }),
        buildMeasurement({ observedAt: daysAgo(10), temperature: 5 }),
      ]);

      const res = await testApp.app.request('/weather/history/london?days=7');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual([
        expect.objectContaining({ date: newer.toISOString(), temperature: 12 }),
        expect.objectContaining({ date: older.toISOString(), temperature: 11 }),
      ]);
    });

    it('rejects a window outside 1..365 days', async () => {
      const res = await testApp.app.request('/weather/history/London?days=0');

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: 'Invalid query parameters' });
    });

    it('returns 404 when there is no history', async () => {
      const res = await testApp.app.request('/weather/history/London');

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: 'No historical weather data found for London' });
    });
  });

  describe('GET /weather/summary/:city', () => {
    it('returns aggregate statistics', async () => {
      await t.store.upsert([
        buildMeasurement({ observedAt: daysAgo(1), temperature: 10 }),
        buildMeasurement({ observedAt: daysAgo(2), temperature: 20 }),
      ]);

      const res = await testApp.app.request('/weather/summary/London?days=3');

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        city: 'London',
        daysAnalyzed: 3,
        totalRecords: 2,
        avgTemperature: 15,
        minTemperature: 10,
        maxTemperature: 20,
        conditions: [{ condition: 'Clouds', count: 2, percentage: 100 }],
      });
    });

    it('returns 404 without data', async () => {
      const res = await testApp.app.request('/weather/summary/London');

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: 'No weather data found for London in the last 7 days' });
    });
  });

  describe('GET /cities', () => {
    it('lists the monitored cities', async () => {
      const res = await testApp.app.request('/cities');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ total: 2, cities: ['London', 'Paris'] });
    });

    it('applies the limit', async () => {
      const res = await testApp.app.request('/cities?limit=1');

      expect(await res.json()).toEqual({ total: 2, cities: ['London'] });
    });
  });
});
