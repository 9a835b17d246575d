/**
 * Measurement fixtures shared by indexer tests
 */

import pino from 'pino';
import {
  EntityNotFoundError,
  createMeasurement,
  type Measurement,
  type MeasurementFetcher,
  type MeasurementInput,
} from '@app/api';

export const testLogger = pino({ level: 'silent' });

export function buildMeasurement(overrides: Partial<MeasurementInput> = {}): Measurement {
  return createMeasurement({
    cityId: 2643743,
    cityName: 'London',
    countryCode: 'GB',
    latitude: 51.5085,
    longitude: -0.1257,
    base: 'stations',
    temperature: 15.5,
    feelsLike: 14.9,
    tempMin: 14.2,
    tempMax: 16.8,
    pressure: 1012,
    humidity: 72,
    seaLevelPressure: 1012,
    groundLevelPressure: 1008,
    conditionId: 803,
    conditionMain: 'Clouds',
    conditionDescription: 'broken clouds',
    conditionIcon: '04d',
    conditions: [{ id: 803, main: 'Clouds', description: 'broken clouds', icon: '04d' }],
    visibility: 10000,
    cloudiness: 75,
    windSpeed: 4.6,
    windDirection: 240,
    windGust: null,
    rain1h: null,
    rain3h: null,
    snow1h: null,
    snow3h: null,
    observedAt: new Date('2024-06-01T12:00:00.000Z'),
    sunrise: new Date('2024-06-01T03:43:00.000Z'),
    sunset: new Date('2024-06-01T20:09:00.000Z'),
    timezoneOffset: 3600,
    systemType: 2,
    systemId: 2075535,
    cod: 200,
    ingestedAt: new Date('2024-06-01T12:05:00.000Z'),
    ...overrides,
  });
}

/**
 * Same city, different instant
 */
export function measurementAt(observedAt: string, overrides: Partial<MeasurementInput> = {}): Measurement {
  return buildMeasurement({ observedAt: new Date(observedAt), ...overrides });
}

export const PARIS = {
  cityId: 2988507,
  cityName: 'Paris',
  countryCode: 'FR',
  latitude: 48.8534,
  longitude: 2.3488,
} satisfies Partial<MeasurementInput>;

/**
 * In-memory fetcher: London and Paris readings at a fixed instant,
 * EntityNotFoundError for any city listed in `failing`.
 * While `gate` is set, every fetch waits on it.
 */
export class StubFetcher implements MeasurementFetcher {
  calls: string[] = [];
  failing = new Set<string>();
  gate: Promise<void> | null = null;

  constructor(private observedAt: Date = new Date('2024-06-01T12:00:00.000Z')) {}

  async fetch(city: string): Promise<Measurement> {
    this.calls.push(city);
    if (this.gate) {
      await this.gate;
    }
    if (this.failing.has(city)) {
      throw new EntityNotFoundError(`https://weather.test/data/2.5/weather?q=${city}`, undefined, city);
    }
    const identity = city.toLowerCase() === 'paris' ? PARIS : {};
    return buildMeasurement({ ...identity, observedAt: this.observedAt });
  }
}

/**
 * A promise with its resolver, for holding a run open
 */
export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>(r => {
    resolve = r;
  });
  return { promise, resolve };
}
