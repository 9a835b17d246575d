/**
 * Upstream payload fixtures for weather client tests
 */

export function buildPayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    coord: { lon: -0.1257, lat: 51.5085 },
    weather: [{ id: 803, main: 'Clouds', description: 'broken clouds', icon: '04d' }],
    base: 'stations',
    main: {
      temp: 15.5,
      feels_like: 14.9,
      temp_min: 14.2,
      temp_max: 16.8,
      pressure: 1012,
      humidity: 72,
      sea_level: 1012,
      grnd_level: 1008,
    },
    visibility: 10000,
    wind: { speed: 4.6, deg: 240, gust: 7.2 },
    clouds: { all: 75 },
    rain: { '1h': 0.25 },
    dt: 1700000000,
    sys: { type: 2, id: 2075535, country: 'GB', sunrise: 1699946000, sunset: 1699978000 },
    timezone: 0,
    id: 2643743,
    name: 'London',
    cod: 200,
    ...overrides,
  };
}
