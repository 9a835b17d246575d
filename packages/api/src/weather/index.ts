/**
 * Current-weather API client
 * https://api.openweathermap.org/data/2.5/weather
 */

import { z } from 'zod';
import type { Dispatcher } from 'undici';
import { DEFAULT_WEATHER_URL, fromUnixSeconds, type UnitSystem } from '@app/config';
import { ApiClient, createApiClient, type QueryParams } from '../client';
import { BaseAPIError, MalformedResponseError, isRetryableError } from '../errors';
import type { SlidingWindowRateLimiter } from '../rate-limiter';
import { WeatherConditionSchema, createMeasurement, type Measurement } from '../types';

// Upstream payload. Unknown keys are dropped; range checks mirror the Measurement invariants.
export const CurrentWeatherResponseSchema = z.object({
  coord: z.object({
    lon: z.number().min(-180).max(180),
    lat: z.number().min(-90).max(90),
  }),
  weather: z.array(WeatherConditionSchema).default([]),
  base: z.string().optional(),
  main: z.object({
    temp: z.number(),
    feels_like: z.number(),
    temp_min: z.number(),
    temp_max: z.number(),
    pressure: z.number(),
    humidity: z.number().min(0).max(100),
    sea_level: z.number().optional(),
    grnd_level: z.number().optional(),
  }),
  visibility: z.number().nonnegative().optional(),
  wind: z.object({
    speed: z.number().nonnegative(),
    deg: z.number().min(0).max(360).optional(),
    gust: z.number().nonnegative().optional(),
  }).optional(),
  clouds: z.object({
    all: z.number().min(0).max(100),
  }).optional(),
  rain: z.object({
    '1h': z.number().nonnegative().optional(),
    '3h': z.number().nonnegative().optional(),
  }).optional(),
  snow: z.object({
    '1h': z.number().nonnegative().optional(),
    '3h': z.number().nonnegative().optional(),
  }).optional(),
  dt: z.number().int(),
  sys: z.object({
    type: z.number().int().optional(),
    id: z.number().int().optional(),
    country: z.string().default(''),
    sunrise: z.number().int().optional(),
    sunset: z.number().int().optional(),
  }),
  timezone: z.number().int().optional(),
  id: z.number().int(),
  name: z.string(),
  cod: z.coerce.number().int().optional(),
});

export type CurrentWeatherResponse = z.infer<typeof CurrentWeatherResponseSchema>;

/**
 * Flatten an upstream payload into a Measurement.
 * A payload without conditions gets the 'Unknown' placeholder condition.
 */
export function transformMeasurement(raw: CurrentWeatherResponse, ingestedAt: Date = new Date()): Measurement {
  const [primary] = raw.weather;
  const unix = (seconds: number | undefined) => (seconds === undefined ? null : fromUnixSeconds(seconds));

  return createMeasurement({
    cityId: raw.id,
    cityName: raw.name,
    countryCode: raw.sys.country,
    latitude: raw.coord.lat,
    longitude: raw.coord.lon,
    base: raw.base ?? null,
    temperature: raw.main.temp,
    feelsLike: raw.main.feels_like,
    tempMin: raw.main.temp_min,
    tempMax: raw.main.temp_max,
    pressure: raw.main.pressure,
    humidity: raw.main.humidity,
    seaLevelPressure: raw.main.sea_level ?? null,
    groundLevelPressure: raw.main.grnd_level ?? null,
    conditionId: primary?.id ?? null,
    conditionMain: primary?.main ?? 'Unknown',
    conditionDescription: primary?.description ?? 'No description',
    conditionIcon: primary?.icon ?? 'unknown',
    conditions: raw.weather,
    visibility: raw.visibility ?? null,
    cloudiness: raw.clouds?.all ?? null,
    windSpeed: raw.wind?.speed ?? null,
    windDirection: raw.wind?.deg ?? null,
    windGust: raw.wind?.gust ?? null,
    rain1h: raw.rain?.['1h'] ?? null,
    rain3h: raw.rain?.['3h'] ?? null,
    snow1h: raw.snow?.['1h'] ?? null,
    snow3h: raw.snow?.['3h'] ?? null,
    observedAt: fromUnixSeconds(raw.dt),
    sunrise: unix(raw.sys.sunrise),
    sunset: unix(raw.sys.sunset),
    timezoneOffset: raw.timezone ?? null,
    systemType: raw.sys.type ?? null,
    systemId: raw.sys.id ?? null,
    cod: raw.cod ?? null,
    ingestedAt,
  });
}

// ─── Fetcher ────────────────────────────────────────────────

/**
 * Anything that can produce the current measurement for a city
 */
export interface MeasurementFetcher {
  fetch(city: string): Promise<Measurement>;
}

export interface RetryEvent {
  target: string;
  attempt: number;
  delayMs: number;
  error: BaseAPIError;
}

export interface WeatherClientConfig {
  apiKey: string;
  rateLimiter: SlidingWindowRateLimiter;
  baseUrl?: string;
  units?: UnitSystem;
  /** Total per-attempt timeout in ms (default 30s) */
  timeoutMs?: number;
  /** Connect timeout in ms (default 10s), strictly below timeoutMs */
  connectTimeoutMs?: number;
  /** Attempts per fetch, first one included (default 3) */
  retryAttempts?: number;
  /** Backoff unit: wait retryBackoffMs * attempt before the next attempt (default 1s) */
  retryBackoffMs?: number;
  dispatcher?: Dispatcher;
  onRetry?: (event: RetryEvent) => void;
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export class WeatherClient implements MeasurementFetcher {
  private client: ApiClient;
  private rateLimiter: SlidingWindowRateLimiter;
  private retryAttempts: number;
  private retryBackoffMs: number;
  private onRetry?: (event: RetryEvent) => void;

  constructor(config: WeatherClientConfig) {
    this.rateLimiter = config.rateLimiter;
    this.retryAttempts = config.retryAttempts ?? 3;
    this.retryBackoffMs = config.retryBackoffMs ?? 1000;
    this.onRetry = config.onRetry;

    if (!Number.isInteger(this.retryAttempts) || this.retryAttempts < 1) {
      throw new RangeError(`retryAttempts must be a positive integer, got ${this.retryAttempts}`);
    }

    this.client = createApiClient({
      baseUrl: config.baseUrl ?? DEFAULT_WEATHER_URL,
      defaultParams: {
        appid: config.apiKey,
        units: config.units ?? 'metric',
      },
      secretParams: ['appid'],
      timeout: config.timeoutMs,
      connectTimeout: config.connectTimeoutMs,
      dispatcher: config.dispatcher,
    });
  }

  /**
   * Current weather for a city name
   */
  async fetch(city: string): Promise<Measurement> {
    return this.fetchWithRetry({ q: city }, city);
  }

  /**
   * Current weather for an upstream city id
   */
  async fetchById(cityId: number): Promise<Measurement> {
    return this.fetchWithRetry({ id: cityId }, `id:${cityId}`);
  }

  async close(): Promise<void> {
    await this.client.close();
  }

  private async fetchWithRetry(params: QueryParams, target: string): Promise<Measurement> {
    for (let attempt = 1; ; attempt++) {
      // Every attempt is a real request and counts against the window
      await this.rateLimiter.reserve();

      try {
        const raw = await this.client.get('', { params, entity: target }, CurrentWeatherResponseSchema);
        return this.toMeasurement(raw, target);
      } catch (error) {
        if (!isRetryableError(error) || attempt >= this.retryAttempts) {
          throw error;
        }

        const delayMs = this.retryBackoffMs * attempt;
        this.onRetry?.({ target, attempt, delayMs, error });
        await sleep(delayMs);
      }
    }
  }

  private toMeasurement(raw: CurrentWeatherResponse, target: string): Measurement {
    try {
      return transformMeasurement(raw);
    } catch (error) {
      if (error instanceof z.ZodError) {
        throw MalformedResponseError.fromZodError(error, target, raw);
      }
      throw error;
    }
  }
}
