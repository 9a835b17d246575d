/**
 * PostgreSQL schema for the weather indexer
 * Using Drizzle ORM
 *
 * `weather_records` holds one row per (country_code, city_id, observed_at).
 * The table evolves additively: `MeasurementStore.ensureSchema` creates the
 * key columns and appends any column below that is missing. Columns are
 * never dropped or retyped, so removing one from this file leaves it in
 * place in existing databases.
 */

import {
  pgTable,
  pgSchema,
  text,
  integer,
  doublePrecision,
  timestamp,
  jsonb,
  index,
  primaryKey,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import type { WeatherCondition } from '@app/api';

/**
 * Column set shared by the durable table and its staging copies.
 * Property names match the Measurement fields one to one.
 */
export function weatherColumns() {
  return {
    // Merge key
    countryCode: text('country_code').notNull(),
    cityId: integer('city_id').notNull(),
    observedAt: timestamp('observed_at', { withTimezone: true }).notNull(),

    cityName: text('city_name').notNull(),
    latitude: doublePrecision('latitude').notNull(),
    longitude: doublePrecision('longitude').notNull(),
    base: text('base'),

    temperature: doublePrecision('temperature').notNull(),
    feelsLike: doublePrecision('feels_like').notNull(),
    tempMin: doublePrecision('temp_min').notNull(),
    tempMax: doublePrecision('temp_max').notNull(),
    pressure: integer('pressure').notNull(),
    humidity: integer('humidity').notNull(),
    seaLevelPressure: integer('sea_level_pressure'),
    groundLevelPressure: integer('ground_level_pressure'),

    conditionId: integer('condition_id'),
    conditionMain: text('condition_main').notNull(),
    conditionDescription: text('condition_description').notNull(),
    conditionIcon: text('condition_icon').notNull(),
    conditions: jsonb('conditions').$type<WeatherCondition[]>().notNull(),

    visibility: integer('visibility'),
    cloudiness: integer('cloudiness'),
    windSpeed: doublePrecision('wind_speed'),
    windDirection: doublePrecision('wind_direction'),
    windGust: doublePrecision('wind_gust'),
    rain1h: doublePrecision('rain_1h'),
    rain3h: doublePrecision('rain_3h'),
    snow1h: doublePrecision('snow_1h'),
    snow3h: doublePrecision('snow_3h'),

    sunrise: timestamp('sunrise', { withTimezone: true }),
    sunset: timestamp('sunset', { withTimezone: true }),
    timezoneOffset: integer('timezone_offset'),
    systemType: integer('system_type'),
    systemId: integer('system_id'),
    cod: integer('cod'),

    ingestedAt: timestamp('ingested_at', { withTimezone: true }).notNull(),
  };
}

// ============================================
// WEATHER RECORDS
// ============================================

export const weatherRecords = pgTable('weather_records', weatherColumns(), (table) => [
  primaryKey({ name: 'weather_records_pkey', columns: [table.countryCode, table.cityId, table.observedAt] }),
  // BRIN: rows arrive roughly in observed_at order
  index('weather_records_observed_at_brin').using('brin', table.observedAt),
  index('weather_records_city_observed_idx').on(sql`lower(${table.cityName})`, table.observedAt),
]);

export const MERGE_KEY_COLUMNS = ['country_code', 'city_id', 'observed_at'] as const;

export const STAGING_TABLE_PREFIX = 'weather_staging_';

const STAGING_NAME_PATTERN = /^weather_staging_(\d{13})_[0-9a-f]{32}$/;

/**
 * `weather_staging_<epochMs>_<hex>`; the creation time lets other processes
 * tell a live staging table from one left behind by a crash
 */
export function stagingTableName(createdAt: Date, suffix: string): string {
  return `${STAGING_TABLE_PREFIX}${createdAt.getTime()}_${suffix}`;
}

/**
 * Creation time encoded in a staging table name; null for names in any other format
 */
export function stagingTableCreatedAt(name: string): Date | null {
  const match = STAGING_NAME_PATTERN.exec(name);
  return match?.[1] ? new Date(Number(match[1])) : null;
}

/**
 * Staging copy with the durable table's columns and no constraints
 */
export function stagingTable(name: string) {
  return pgTable(name, weatherColumns());
}

export type StagingTable = ReturnType<typeof stagingTable>;

// ============================================
// CATALOG (read-only)
// ============================================

const informationSchema = pgSchema('information_schema');

export const catalogTables = informationSchema.table('tables', {
  tableSchema: text('table_schema').notNull(),
  tableName: text('table_name').notNull(),
});

export const catalogColumns = informationSchema.table('columns', {
  tableSchema: text('table_schema').notNull(),
  tableName: text('table_name').notNull(),
  columnName: text('column_name').notNull(),
});

// Type exports
export type WeatherRecord = typeof weatherRecords.$inferSelect;
export type NewWeatherRecord = typeof weatherRecords.$inferInsert;
