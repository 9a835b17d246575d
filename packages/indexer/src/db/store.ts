/**
 * Measurement store - idempotent writes and analytical reads over weather_records
 *
 * Upserts go through a per-call staging table: rows are bulk inserted into
 * `weather_staging_<epochMs>_<uuid>`, then reconciled into the durable table with one
 * INSERT ... SELECT ... ON CONFLICT statement. That statement is atomic, and
 * Postgres row locks serialize concurrent upserts on the same merge key.
 */

import { randomUUID } from 'node:crypto';
import { and, desc, eq, gte, inArray, like, lte, sql, type SQL, type SQLWrapper } from 'drizzle-orm';
import { getTableConfig } from 'drizzle-orm/pg-core';
import type pino from 'pino';
import { createMeasurement, mergeKeyOf, mergeKeyString, type Measurement } from '@app/api';
import { HOUR_MS, subtractDays } from '@app/config';
import {
  MERGE_KEY_COLUMNS,
  STAGING_TABLE_PREFIX,
  catalogColumns,
  catalogTables,
  stagingTable,
  stagingTableCreatedAt,
  stagingTableName,
  weatherRecords,
  type NewWeatherRecord,
  type StagingTable,
  type WeatherRecord,
} from './schema';
import type { Database } from './index';
import { StoreUnavailableError } from '../lib/errors';

/** Staging tables younger than this are never treated as orphans */
export const STAGING_TABLE_MAX_AGE_MS = HOUR_MS;

// ─── Types ──────────────────────────────────────────────────

export interface UpsertOptions {
  /** De-duplicate and merge on the key (default). `false` is a plain insert for trusted input. */
  dedupe?: boolean;
}

export interface ConditionShare {
  condition: string;
  count: number;
  percentage: number;
}

export interface AggregateStats {
  city: string;
  daysAnalyzed: number;
  totalRecords: number;
  avgTemperature: number | null;
  minTemperature: number | null;
  maxTemperature: number | null;
  avgHumidity: number | null;
  avgPressure: number | null;
  avgWindSpeed: number | null;
  conditions: ConditionShare[];
}

/** Per-city coverage inside a lookback window, city name lower-cased */
export interface CoverageRow {
  city: string;
  recordCount: number;
  /** UTC `YYYY-MM-DD` */
  earliestDate: string | null;
  latestDate: string | null;
  distinctDays: number;
}

export interface DatabaseStats {
  table: string;
  totalRecords: number;
  uniqueCities: number;
  uniqueDays: number;
  earliestRecord: string | null;
  latestRecord: string | null;
}

// ─── Helpers ────────────────────────────────────────────────

// Keeps each INSERT well under the 65535 bind-parameter limit
const INSERT_CHUNK_SIZE = 500;

const MERGE_KEY_SET: ReadonlySet<string> = new Set(MERGE_KEY_COLUMNS);

const UTC_DAY = (value: SQLWrapper) => sql`(${value} AT TIME ZONE 'UTC')::date`;
const UTC_DATE_KEY = (value: SQL) => sql<string | null>`to_char(${value} AT TIME ZONE 'UTC', 'YYYY-MM-DD')`;
const UTC_ISO = (value: SQL) => sql<string | null>`to_char(${value} AT TIME ZONE 'UTC', 'YYYY-MM-DD"T"HH24:MI:SS"Z"')`;

function chunked<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

function round2(value: number | null): number | null {
  return value === null ? null : Math.round(value * 100) / 100;
}

/**
 * Keep one measurement per merge key; the last occurrence wins
 */
export function dedupeByMergeKey(records: readonly Measurement[]): Measurement[] {
  const byKey = new Map<string, Measurement>();
  for (const record of records) {
    byKey.set(mergeKeyString(mergeKeyOf(record)), record);
  }
  return [...byKey.values()];
}

function toRow(measurement: Measurement): NewWeatherRecord {
  return { ...measurement, conditions: [...measurement.conditions] };
}

function fromRow(row: WeatherRecord): Measurement {
  return createMeasurement(row);
}

// ─── Store ──────────────────────────────────────────────────

export class MeasurementStore {
  private activeStagingTables = new Set<string>();

  constructor(
    private readonly db: Database,
    private readonly logger: pino.Logger
  ) {}

  /**
   * Create the table if missing and append any missing columns.
   * Never drops or alters existing columns.
   */
  async ensureSchema(): Promise<void> {
    await this.run('ensureSchema', async () => {
      const { columns } = getTableConfig(weatherRecords);
      const keyColumns = columns.filter(c => MERGE_KEY_SET.has(c.name));

      await this.db.execute(sql`
        CREATE TABLE IF NOT EXISTS ${weatherRecords} (
          ${sql.join(keyColumns.map(c => sql`${sql.identifier(c.name)} ${sql.raw(c.getSQLType())} NOT NULL`), sql`, `)},
          CONSTRAINT weather_records_pkey PRIMARY KEY (${sql.join(keyColumns.map(c => sql.identifier(c.name)), sql`, `)})
        )
      `);

      const existing = await this.db
        .select({ name: catalogColumns.columnName })
        .from(catalogColumns)
        .where(and(
          eq(catalogColumns.tableSchema, sql`current_schema()`),
          eq(catalogColumns.tableName, 'weather_records'),
        ));
      const existingNames = new Set(existing.map(c => c.name));

      const added: string[] = [];
      for (const column of columns) {
        if (existingNames.has(column.name)) continue;
        await this.db.execute(sql`
          ALTER TABLE ${weatherRecords}
          ADD COLUMN IF NOT EXISTS ${sql.identifier(column.name)} ${sql.raw(column.getSQLType())}
        `);
        added.push(column.name);
      }

      await this.db.execute(sql`
        CREATE INDEX IF NOT EXISTS weather_records_observed_at_brin
        ON ${weatherRecords} USING brin (observed_at)
      `);
      await this.db.execute(sql`
        CREATE INDEX IF NOT EXISTS weather_records_city_observed_idx
        ON ${weatherRecords} (lower(city_name), observed_at)
      `);

      if (added.length > 0) {
        this.logger.info({ added }, 'Added columns to weather_records');
      }
    });
  }

  /**
   * Write measurements. With dedupe (default) a later record for an existing
   * key replaces every non-key column; returns the number of rows merged.
   */
  async upsert(records: readonly Measurement[], options: UpsertOptions = {}): Promise<number> {
    if (records.length === 0) {
      return 0;
    }

    const dedupe = options.dedupe ?? true;

    return this.run('upsert', async () => {
      if (!dedupe) {
        for (const chunk of chunked(records.map(toRow), INSERT_CHUNK_SIZE)) {
          await this.db.insert(weatherRecords).values(chunk);
        }
        this.logger.info({ inserted: records.length }, 'Inserted weather records');
        return records.length;
      }

      const rows = dedupeByMergeKey(records).map(toRow);

      const merged = await this.withStagingTable(async (staging, name) => {
        for (const chunk of chunked(rows, INSERT_CHUNK_SIZE)) {
          await this.db.insert(staging).values(chunk);
        }
        await this.db.execute(this.mergeStatement(name));
        return rows.length;
      });

      this.logger.info({ received: records.length, merged }, 'Upserted weather records');
      return merged;
    });
  }

  /**
   * Newest measurement for a city (case-insensitive name)
   */
  async latest(city: string): Promise<Measurement | null> {
    return this.run('latest', async () => {
      const rows = await this.db
        .select()
        .from(weatherRecords)
        .where(this.cityFilter(city))
        .orderBy(desc(weatherRecords.observedAt))
        .limit(1);

      const [row] = rows;
      return row ? fromRow(row) : null;
    });
  }

  /**
   * Measurements from the trailing `days`, newest first
   */
  async history(city: string, days: number, now: Date = new Date()): Promise<Measurement[]> {
    return this.run('history', async () => {
      const rows = await this.db
        .select()
        .from(weatherRecords)
        .where(and(
          this.cityFilter(city),
          gte(weatherRecords.observedAt, subtractDays(now, days)),
        ))
        .orderBy(desc(weatherRecords.observedAt));

      return rows.map(fromRow);
    });
  }

  /**
   * Aggregate statistics over the trailing `days`; null when there is no data
   */
  async summary(city: string, days: number, now: Date = new Date()): Promise<AggregateStats | null> {
    return this.run('summary', async () => {
      const filter = and(
        this.cityFilter(city),
        gte(weatherRecords.observedAt, subtractDays(now, days)),
      );

      const [stats] = await this.db
        .select({
          totalRecords: sql<number>`count(*)::int`,
          avgTemperature: sql<number | null>`avg(${weatherRecords.temperature})::float8`,
          minTemperature: sql<number | null>`min(${weatherRecords.temperature})::float8`,
          maxTemperature: sql<number | null>`max(${weatherRecords.temperature})::float8`,
          avgHumidity: sql<number | null>`avg(${weatherRecords.humidity})::float8`,
          avgPressure: sql<number | null>`avg(${weatherRecords.pressure})::float8`,
          avgWindSpeed: sql<number | null>`avg(${weatherRecords.windSpeed})::float8`,
        })
        .from(weatherRecords)
        .where(filter);

      if (!stats || stats.totalRecords === 0) {
        return null;
      }

      const conditions = await this.db
        .select({
          condition: weatherRecords.conditionMain,
          count: sql<number>`count(*)::int`,
        })
        .from(weatherRecords)
        .where(filter)
        .groupBy(weatherRecords.conditionMain)
        .orderBy(sql`count(*) desc`, weatherRecords.conditionMain);

      return {
        city,
        daysAnalyzed: days,
        totalRecords: stats.totalRecords,
        avgTemperature: round2(stats.avgTemperature),
        minTemperature: round2(stats.minTemperature),
        maxTemperature: round2(stats.maxTemperature),
        avgHumidity: round2(stats.avgHumidity),
        avgPressure: round2(stats.avgPressure),
        avgWindSpeed: round2(stats.avgWindSpeed),
        conditions: conditions.map(c => ({
          condition: c.condition,
          count: c.count,
          percentage: round2((c.count / stats.totalRecords) * 100) ?? 0,
        })),
      };
    });
  }

  /**
   * Record counts and day coverage per city inside the trailing window.
   * Cities without any row in the window are absent from the result.
   */
  async coverageRows(cities: readonly string[], lookbackDays: number, now: Date = new Date()): Promise<CoverageRow[]> {
    if (cities.length === 0) {
      return [];
    }

    return this.run('coverageRows', async () => {
      const cityKey = sql<string>`lower(${weatherRecords.cityName})`;

      return await this.db
        .select({
          city: cityKey,
          recordCount: sql<number>`count(*)::int`,
          earliestDate: UTC_DATE_KEY(sql`min(${weatherRecords.observedAt})`),
          latestDate: UTC_DATE_KEY(sql`max(${weatherRecords.observedAt})`),
          distinctDays: sql<number>`count(distinct ${UTC_DAY(weatherRecords.observedAt)})::int`,
        })
        .from(weatherRecords)
        .where(and(
          inArray(cityKey, cities.map(c => c.trim().toLowerCase())),
          gte(weatherRecords.observedAt, subtractDays(now, lookbackDays)),
          lte(weatherRecords.observedAt, now),
        ))
        .groupBy(cityKey);
    });
  }

  async databaseStats(): Promise<DatabaseStats> {
    return this.run('databaseStats', async () => {
      const [row] = await this.db
        .select({
          totalRecords: sql<number>`count(*)::int`,
          uniqueCities: sql<number>`count(distinct ${weatherRecords.cityId})::int`,
          uniqueDays: sql<number>`count(distinct ${UTC_DAY(weatherRecords.observedAt)})::int`,
          earliestRecord: UTC_ISO(sql`min(${weatherRecords.observedAt})`),
          latestRecord: UTC_ISO(sql`max(${weatherRecords.observedAt})`),
        })
        .from(weatherRecords);

      return {
        table: getTableConfig(weatherRecords).name,
        totalRecords: row?.totalRecords ?? 0,
        uniqueCities: row?.uniqueCities ?? 0,
        uniqueDays: row?.uniqueDays ?? 0,
        earliestRecord: row?.earliestRecord ?? null,
        latestRecord: row?.latestRecord ?? null,
      };
    });
  }

  /**
   * Drop staging tables left behind by a crashed process.
   * Tables in use by this store instance are kept, and so is any table created
   * within `maxAgeMs`, which may belong to an upsert running in another process.
   */
  async dropOrphanedStagingTables(maxAgeMs: number = STAGING_TABLE_MAX_AGE_MS, now: Date = new Date()): Promise<number> {
    return this.run('dropOrphanedStagingTables', async () => {
      const rows = await this.db
        .select({ name: catalogTables.tableName })
        .from(catalogTables)
        .where(and(
          eq(catalogTables.tableSchema, sql`current_schema()`),
          like(catalogTables.tableName, `${STAGING_TABLE_PREFIX.replace(/_/g, '\\_')}%`),
        ));

      const cutoff = now.getTime() - maxAgeMs;
      const orphans = rows
        .map(r => r.name)
        .filter(name => {
          if (this.activeStagingTables.has(name)) return false;
          const createdAt = stagingTableCreatedAt(name);
          return createdAt === null || createdAt.getTime() < cutoff;
        });
      for (const name of orphans) {
        await this.db.execute(sql`DROP TABLE IF EXISTS ${sql.identifier(name)}`);
      }

      if (orphans.length > 0) {
        this.logger.info({ dropped: orphans }, 'Dropped orphaned staging tables');
      }
      return orphans.length;
    });
  }

  // ─── Internals ────────────────────────────────────────────

  private cityFilter(city: string): SQL {
    return eq(sql`lower(${weatherRecords.cityName})`, city.trim().toLowerCase());
  }

  private mergeStatement(stagingName: string): SQL {
    const names = getTableConfig(weatherRecords).columns.map(c => c.name);
    const columnList = sql.join(names.map(n => sql.identifier(n)), sql`, `);
    const keyList = sql.join(MERGE_KEY_COLUMNS.map(n => sql.identifier(n)), sql`, `);
    const updates = sql.join(
      names
        .filter(n => !MERGE_KEY_SET.has(n))
        .map(n => sql`${sql.identifier(n)} = excluded.${sql.identifier(n)}`),
      sql`, `
    );

    return sql`
      INSERT INTO ${weatherRecords} (${columnList})
      SELECT ${columnList} FROM ${sql.identifier(stagingName)}
      ON CONFLICT (${keyList}) DO UPDATE SET ${updates}
    `;
  }

  /**
   * Run `fn` with a fresh unlogged staging table that is dropped on every exit path
   */
  private async withStagingTable<T>(fn: (table: StagingTable, name: string) => Promise<T>): Promise<T> {
    const name = stagingTableName(new Date(), randomUUID().replace(/-/g, ''));
    this.activeStagingTables.add(name);

    try {
      await this.db.execute(sql`
        CREATE UNLOGGED TABLE ${sql.identifier(name)} (LIKE ${weatherRecords} INCLUDING DEFAULTS)
      `);
      return await fn(stagingTable(name), name);
    } finally {
      try {
        await this.db.execute(sql`DROP TABLE IF EXISTS ${sql.identifier(name)}`);
      } catch (err) {
        this.logger.warn({ err, table: name }, 'Failed to drop staging table');
      }
      this.activeStagingTables.delete(name);
    }
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof StoreUnavailableError) {
        throw error;
      }
      this.logger.error({ err: error, operation }, 'Store operation failed');
      throw new StoreUnavailableError(operation, error);
    }
  }
}
