import { describe, it, expect } from 'vitest';
import { BUNDLED_CITIES, resolveMonitoredCities } from '../cities';

describe('resolveMonitoredCities', () => {
  it('uses the whole bundled list by default', () => {
    const cities = resolveMonitoredCities({ cities: undefined, citiesToMonitor: undefined });

    expect(cities).toHaveLength(BUNDLED_CITIES.length);
    expect(cities.slice(0, 3)).toEqual(['London', 'Paris', 'Berlin']);
  });

  it('takes the first N bundled cities', () => {
    expect(resolveMonitoredCities({ cities: undefined, citiesToMonitor: 2 })).toEqual(['London', 'Paris']);
  });

  it('prefers an explicit list and drops case-insensitive duplicates', () => {
    const cities = resolveMonitoredCities(
      { cities: ['Tokyo', 'tokyo', 'Lima', 'TOKYO', 'Oslo'], citiesToMonitor: undefined },
      ['London']
    );

    expect(cities).toEqual(['Tokyo', 'Lima', 'Oslo']);
  });

  it('applies the count to an explicit list as well', () => {
    expect(resolveMonitoredCities({ cities: ['Tokyo', 'Lima', 'Oslo'], citiesToMonitor: 1 })).toEqual(['Tokyo']);
  });

  it('falls back to the bundled list when the override is empty', () => {
    expect(resolveMonitoredCities({ cities: [], citiesToMonitor: 1 }, ['Quito'])).toEqual(['Quito']);
  });
});
