/**
 * Shared weather types
 */

import { z } from 'zod';

// Condition schemas
export const WeatherConditionSchema = z.object({
  id: z.number().int(),
  main: z.string(),
  description: z.string(),
  icon: z.string(),
});

export type WeatherCondition = z.infer<typeof WeatherConditionSchema>;

const nonNegative = z.number().nonnegative();
const utcDate = z.date();

/**
 * One city's reading at one instant.
 * Built by the fetcher from an upstream payload or by the store from a row.
 */
export const MeasurementSchema = z.object({
  // Identity
  cityId: z.number().int(),
  cityName: z.string().min(1),
  countryCode: z.string(),

  // Coordinates
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
  base: z.string().nullable(),

  // Temperature-like, in the configured unit system
  temperature: z.number(),
  feelsLike: z.number(),
  tempMin: z.number(),
  tempMax: z.number(),

  // Pressure in hPa, humidity in %
  pressure: z.number().int().positive(),
  humidity: z.number().int().min(0).max(100),
  seaLevelPressure: z.number().int().positive().nullable(),
  groundLevelPressure: z.number().int().positive().nullable(),

  // Primary condition plus the full list
  conditionId: z.number().int().nullable(),
  conditionMain: z.string(),
  conditionDescription: z.string(),
  conditionIcon: z.string(),
  conditions: z.array(WeatherConditionSchema),

  visibility: nonNegative.nullable(),
  cloudiness: z.number().int().min(0).max(100).nullable(),
  windSpeed: nonNegative.nullable(),
  windDirection: z.number().min(0).max(360).nullable(),
  windGust: nonNegative.nullable(),
  rain1h: nonNegative.nullable(),
  rain3h: nonNegative.nullable(),
  snow1h: nonNegative.nullable(),
  snow3h: nonNegative.nullable(),

  // Time
  observedAt: utcDate,
  sunrise: utcDate.nullable(),
  sunset: utcDate.nullable(),
  timezoneOffset: z.number().int().nullable(),

  // Upstream system metadata
  systemType: z.number().int().nullable(),
  systemId: z.number().int().nullable(),
  cod: z.number().int().nullable(),

  ingestedAt: utcDate,
});

export type MeasurementInput = z.input<typeof MeasurementSchema>;
type ParsedMeasurement = z.infer<typeof MeasurementSchema>;

/** Immutable, conditions included */
export type Measurement = Readonly<Omit<ParsedMeasurement, 'conditions'>> & {
  readonly conditions: ReadonlyArray<Readonly<WeatherCondition>>;
};

/**
 * Validate and freeze a measurement. Throws a ZodError on invalid input.
 */
export function createMeasurement(input: MeasurementInput): Measurement {
  const parsed = MeasurementSchema.parse(input);
  return Object.freeze({
    ...parsed,
    conditions: Object.freeze(parsed.conditions.map(condition => Object.freeze(condition))),
  });
}

// Merge key: at most one stored measurement per key
export interface MergeKey {
  countryCode: string;
  cityId: number;
  observedAt: Date;
}

export function mergeKeyOf(measurement: Measurement): MergeKey {
  return {
    countryCode: measurement.countryCode,
    cityId: measurement.cityId,
    observedAt: measurement.observedAt,
  };
}

/**
 * Stable string form of a merge key, for in-memory de-duplication
 */
export function mergeKeyString(key: MergeKey): string {
  return `${key.countryCode}|${key.cityId}|${key.observedAt.toISOString()}`;
}
