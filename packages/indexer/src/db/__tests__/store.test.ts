/**
 * MeasurementStore integration tests (in-process Postgres via PGlite)
 */

import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import { and, eq, like, sql } from 'drizzle-orm';
import { HOUR_MS } from '@app/config';
import { catalogTables, stagingTableCreatedAt, stagingTableName } from '../schema';
import { MeasurementStore, dedupeByMergeKey } from '../store';
import { StoreUnavailableError } from '../../lib/errors';
import { setupTestDb, cleanDb, closeTestDb, countRecords, type TestDb } from '../../test/db-helpers';
import { buildMeasurement, measurementAt, PARIS, testLogger } from '../../test/fixtures';

const NOW = new Date('2024-06-10T12:00:00.000Z');

describe('MeasurementStore', () => {
  let t: TestDb;

  beforeAll(async () => {
    t = await setupTestDb();
  });

  afterEach(async () => {
    await cleanDb(t.db);
  });

  afterAll(async () => {
    await closeTestDb(t);
  });

  const stagingTableCount = async () => {
    const rows = await t.db
      .select({ name: catalogTables.tableName })
      .from(catalogTables)
      .where(and(
        eq(catalogTables.tableSchema, sql`current_schema()`),
        like(catalogTables.tableName, 'weather\\_staging\\_%'),
      ));
    return rows.length;
  };

  describe('ensureSchema', () => {
    it('is safe to run repeatedly', async () => {
      await t.store.ensureSchema();
      await t.store.ensureSchema();

      expect(await countRecords(t.db)).toBe(0);
    });

    it('adds columns missing from an older table without touching its rows', async () => {
      await t.store.upsert([buildMeasurement()]);
      await t.db.execute(sql`ALTER TABLE weather_records DROP COLUMN snow_3h`);

      await t.store.ensureSchema();
      const latest = await t.store.latest('London');

      expect(latest?.snow3h).toBeNull();
      expect(latest?.temperature).toBe(15.5);
    });
  });

  describe('upsert', () => {
    it('returns 0 and writes nothing for an empty batch', async () => {
      expect(await t.store.upsert([])).toBe(0);
      expect(await countRecords(t.db)).toBe(0);
    });

    it('stores a measurement readable through latest', async () => {
      const inserted = await t.store.upsert([buildMeasurement()]);
      const latest = await t.store.latest('london');

      expect(inserted).toBe(1);
      expect(latest?.cityName).toBe('London');
      expect(latest?.temperature).toBe(15.5);
      expect(latest?.observedAt.toISOString()).toBe('2024-06-01T12:00:00.000Z');
      expect(latest?.conditions).toEqual([
        { id: 803, main: 'Clouds', description: 'broken clouds', icon: '04d' },
      ]);
    });

    it('replaces non-key fields when the same key arrives again', async () => {
      await t.store.upsert([buildMeasurement({ temperature: 15.5 })]);
      await t.store.upsert([buildMeasurement({ temperature: 16.0, humidity: 80 })]);

      const latest = await t.store.latest('London');

      expect(await countRecords(t.db)).toBe(1);
      expect(latest?.temperature).toBe(16);
      expect(latest?.humidity).toBe(80);
    });

    it('keeps the last duplicate within one batch', async () => {
      const merged = await t.store.upsert([
        buildMeasurement({ temperature: 15.5 }),
        buildMeasurement({ temperature: 17.25 }),
      ]);

      expect(merged).toBe(1);
      expect((await t.store.latest('London'))?.temperature).toBe(17.25);
    });

    it('inserts distinct keys side by side', async () => {
      await t.store.upsert([
        measurementAt('2024-06-01T12:00:00Z'),
        measurementAt('2024-06-01T13:00:00Z'),
        buildMeasurement(PARIS),
      ]);

      expect(await countRecords(t.db)).toBe(3);
    });

    it('drops its staging table after a successful merge', async () => {
      await t.store.upsert([buildMeasurement()]);

      expect(await stagingTableCount()).toBe(0);
    });

    it('inserts directly without dedupe and rejects a repeated key', async () => {
      expect(await t.store.upsert([buildMeasurement()], { dedupe: false })).toBe(1);

      await expect(t.store.upsert([buildMeasurement()], { dedupe: false }))
        .rejects.toBeInstanceOf(StoreUnavailableError);
      expect(await countRecords(t.db)).toBe(1);
    });

    it('leaves the durable table unchanged and drops staging when the merge fails', async () => {
      await t.store.upsert([buildMeasurement({ temperature: 15.5 })]);
      // LIKE does not copy CHECK constraints, so only the merge step trips this
      await t.db.execute(sql`ALTER TABLE weather_records ADD CONSTRAINT temperature_cap CHECK (temperature < 50)`);

      try {
        await expect(t.store.upsert([
          buildMeasurement({ temperature: 60 }),
          measurementAt('2024-06-02T12:00:00Z'),
        ])).rejects.toThrow('Store operation "upsert" failed');

        expect(await countRecords(t.db)).toBe(1);
        expect((await t.store.latest('London'))?.temperature).toBe(15.5);
        expect(await stagingTableCount()).toBe(0);
      } finally {
        await t.db.execute(sql`ALTER TABLE weather_records DROP CONSTRAINT temperature_cap`);
      }
    });
  });

  describe('latest', () => {
    it('returns the newest observation', async () => {
      await t.store.upsert([
        measurementAt('2024-06-01T12:00:00Z', { temperature: 10 }),
        measurementAt('2024-06-03T12:00:00Z', { temperature: 12 }),
        measurementAt('2024-06-02T12:00:00Z', { temperature: 11 }),
      ]);

      expect((await t.store.latest('LONDON'))?.temperature).toBe(12);
    });

    it('returns null for an unknown city', async () => {
      expect(await t.store.latest('Atlantis')).toBeNull();
    });
  });

  describe('history', () => {
    it('returns the trailing window newest first', async () => {
      await t.store.upsert([
        measurementAt('2024-06-09T12:00:00Z', { temperature: 20 }),
        measurementAt('2024-06-07T12:00:00Z', { temperature: 18 }),
        measurementAt('2024-05-31T12:00:00Z', { temperature: 9 }),
        buildMeasurement({ ...PARIS, observedAt: new Date('2024-06-09T12:00:00Z') }),
      ]);

      const history = await t.store.history('London', 7, NOW);

      expect(history.map(m => m.temperature)).toEqual([20, 18]);
      expect(history.every(m => m.cityName === 'London')).toBe(true);
    });
  });

  describe('summary', () => {
    it('aggregates the window and ranks conditions', async () => {
      const rain = [{ id: 500, main: 'Rain', description: 'light rain', icon: '10d' }];
      await t.store.upsert([
        measurementAt('2024-06-09T10:00:00Z', { temperature: 10, humidity: 50, pressure: 1000, windSpeed: 1 }),
        measurementAt('2024-06-09T11:00:00Z', { temperature: 20, humidity: 60, pressure: 1010, windSpeed: 2 }),
        measurementAt('2024-06-09T12:00:00Z', {
          temperature: 15, humidity: 70, pressure: 1020, windSpeed: null,
          conditionMain: 'Rain', conditionId: 500, conditions: rain,
        }),
      ]);

      const summary = await t.store.summary('London', 7, NOW);

      expect(summary).toEqual({
        city: 'London',
        daysAnalyzed: 7,
        totalRecords: 3,
        avgTemperature: 15,
        minTemperature: 10,
        maxTemperature: 20,
        avgHumidity: 60,
        avgPressure: 1010,
        avgWindSpeed: 1.5,
        conditions: [
          { condition: 'Clouds', count: 2, percentage: 66.67 },
          { condition: 'Rain', count: 1, percentage: 33.33 },
        ],
      });
    });

    it('returns null when the window is empty', async () => {
      await t.store.upsert([measurementAt('2024-05-01T12:00:00Z')]);

      expect(await t.store.summary('London', 7, NOW)).toBeNull();
    });
  });

  describe('coverageRows', () => {
    it('counts records and distinct UTC days inside the lookback', async () => {
      await t.store.upsert([
        measurementAt('2024-06-01T08:00:00Z'),
        measurementAt('2024-06-01T20:00:00Z'),
        measurementAt('2024-06-05T10:00:00Z'),
        measurementAt('2024-06-09T23:30:00Z'),
        measurementAt('2024-04-01T12:00:00Z'),
      ]);

      const rows = await t.store.coverageRows(['LONDON', 'Paris'], 30, NOW);

      expect(rows).toEqual([{
        city: 'london',
        recordCount: 4,
        earliestDate: '2024-06-01',
        latestDate: '2024-06-09',
        distinctDays: 3,
      }]);
    });

    it('returns nothing for an empty city list', async () => {
      expect(await t.store.coverageRows([], 30, NOW)).toEqual([]);
    });
  });

  describe('databaseStats', () => {
    it('summarizes the whole table', async () => {
      await t.store.upsert([
        measurementAt('2024-06-01T08:00:00Z'),
        measurementAt('2024-06-02T08:00:00Z'),
        buildMeasurement({ ...PARIS, observedAt: new Date('2024-06-02T09:30:00Z') }),
      ]);

      expect(await t.store.databaseStats()).toEqual({
        table: 'weather_records',
        totalRecords: 3,
        uniqueCities: 2,
        uniqueDays: 2,
        earliestRecord: '2024-06-01T08:00:00Z',
        latestRecord: '2024-06-02T09:30:00Z',
      });
    });

    it('reports zeros for an empty table', async () => {
      expect(await t.store.databaseStats()).toEqual({
        table: 'weather_records',
        totalRecords: 0,
        uniqueCities: 0,
        uniqueDays: 0,
        earliestRecord: null,
        latestRecord: null,
      });
    });
  });

  describe('dropOrphanedStagingTables', () => {
    it('drops leftover staging tables', async () => {
      await t.db.execute(sql`CREATE TABLE weather_staging_deadbeef (LIKE weather_records)`);

      expect(await t.store.dropOrphanedStagingTables()).toBe(1);
      expect(await t.store.dropOrphanedStagingTables()).toBe(0);
      expect(await stagingTableCount()).toBe(0);
    });

    it('keeps recent staging tables that another process may still be filling', async () => {
      const fresh = stagingTableName(new Date(NOW.getTime() - 5 * 60_000), 'a'.repeat(32));
      const stale = stagingTableName(new Date(NOW.getTime() - 2 * HOUR_MS), 'b'.repeat(32));
      await t.db.execute(sql`CREATE TABLE ${sql.identifier(fresh)} (LIKE weather_records)`);
      await t.db.execute(sql`CREATE TABLE ${sql.identifier(stale)} (LIKE weather_records)`);

      expect(await t.store.dropOrphanedStagingTables(HOUR_MS, NOW)).toBe(1);
      expect(await stagingTableCount()).toBe(1);

      await t.db.execute(sql`DROP TABLE ${sql.identifier(fresh)}`);
    });

    it('does not break an upsert running through another store instance', async () => {
      const other = new MeasurementStore(t.db, testLogger);

      const upserting = t.store.upsert([buildMeasurement()]);
      const dropped = await other.dropOrphanedStagingTables();

      expect(await upserting).toBe(1);
      expect(dropped).toBe(0);
      expect(await countRecords(t.db)).toBe(1);
    });
  });
});

describe('staging table names', () => {
  it('encode their creation time', () => {
    const name = stagingTableName(NOW, '0123456789abcdef0123456789abcdef');

    expect(name).toBe('weather_staging_1718020800000_0123456789abcdef0123456789abcdef');
    expect(stagingTableCreatedAt(name)).toEqual(NOW);
    expect(stagingTableCreatedAt('weather_staging_deadbeef')).toBeNull();
  });
});

describe('dedupeByMergeKey', () => {
  it('keeps the last record per key in first-seen key order', () => {
    const a1 = measurementAt('2024-06-01T12:00:00Z', { temperature: 1 });
    const b = measurementAt('2024-06-01T13:00:00Z', { temperature: 2 });
    const a2 = measurementAt('2024-06-01T12:00:00Z', { temperature: 3 });

    expect(dedupeByMergeKey([a1, b, a2]).map(m => m.temperature)).toEqual([3, 2]);
  });
});
