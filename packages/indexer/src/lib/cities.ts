/**
 * Monitored city list.
 * The bundled list ships as data/cities.json; CITIES overrides it.
 */

import { z } from 'zod';
import bundledCities from '../../data/cities.json';
import type { Config } from './config';

const CityListSchema = z.array(z.string().trim().min(1)).min(1);

export const BUNDLED_CITIES: readonly string[] = CityListSchema.parse(bundledCities);

/**
 * Resolve the cities to monitor: the explicit list if configured,
 * otherwise the first `citiesToMonitor` bundled cities (all by default).
 * Duplicates (case-insensitive) are dropped, first spelling wins.
 */
export function resolveMonitoredCities(
  config: Pick<Config, 'cities' | 'citiesToMonitor'>,
  bundled: readonly string[] = BUNDLED_CITIES
): string[] {
  const source = config.cities && config.cities.length > 0 ? config.cities : bundled;
  const seen = new Set<string>();
  const cities: string[] = [];

  for (const city of source) {
    const key = city.toLowerCase();
    if (!seen.has(key)) {
      seen.add(key);
      cities.push(city);
    }
  }

  return config.citiesToMonitor === undefined ? cities : cities.slice(0, config.citiesToMonitor);
}
