/**
 * @app/config - Shared constants for the weather packages
 *
 * Contains:
 * - Upstream API endpoints
 * - Unit systems
 * - UTC date helpers
 */

// Date/time utilities
export * from './date';

// API endpoints
export const WEATHER_API = {
  base: 'https://api.openweathermap.org',
  currentWeather: '/data/2.5/weather',
} as const;

export const DEFAULT_WEATHER_URL = `${WEATHER_API.base}${WEATHER_API.currentWeather}`;

// Unit systems accepted by the `units` query parameter
export const UNIT_SYSTEMS = ['metric', 'imperial', 'standard'] as const;

export type UnitSystem = (typeof UNIT_SYSTEMS)[number];
