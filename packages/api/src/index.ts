/**
 * @app/api - Upstream weather API client
 *
 * Exports:
 * - Base API client
 * - Error taxonomy
 * - Sliding-window rate limiter
 * - Current-weather client
 * - Shared types
 */

// Base client
export {
  ApiClient,
  createApiClient,
  type ApiClientConfig,
  type QueryParams,
  type RequestOptions,
} from './client';

// Errors
export * from './errors';

// Rate limiting
export {
  SlidingWindowRateLimiter,
  type RateLimiterOptions,
  type RateLimiterUsage,
} from './rate-limiter';

// Current weather
export {
  WeatherClient,
  transformMeasurement,
  CurrentWeatherResponseSchema,
  type CurrentWeatherResponse,
  type MeasurementFetcher,
  type RetryEvent,
  type WeatherClientConfig,
} from './weather';

// Types
export * from './types';
