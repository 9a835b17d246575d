/**
 * Batch collector - best-effort fan-out of current-weather fetches
 */

import type pino from 'pino';
import { getErrorDetails, type Measurement, type MeasurementFetcher } from '@app/api';

export interface CollectionMetrics {
  requested: number;
  succeeded: number;
  failed: number;
  durationMs: number;
  /** Percentage, 2 decimals */
  successRate: number;
  requestsPerSecond: number;
}

export interface BatchCollectorOptions {
  /** Monitored cities used by fetchAll */
  cities: readonly string[];
  maxConcurrent: number;
  onMetrics?: (metrics: CollectionMetrics) => void;
}

export class BatchCollector {
  private cities: readonly string[];
  private maxConcurrent: number;
  private onMetrics?: (metrics: CollectionMetrics) => void;

  constructor(
    private readonly fetcher: MeasurementFetcher,
    private readonly logger: pino.Logger,
    options: BatchCollectorOptions
  ) {
    this.cities = options.cities;
    this.maxConcurrent = options.maxConcurrent;
    this.onMetrics = options.onMetrics;
  }

  /**
   * Fetch every monitored city, or the first `limit` of them
   */
  async fetchAll(limit?: number): Promise<Measurement[]> {
    const cities = limit === undefined ? this.cities : this.cities.slice(0, limit);
    return this.fetchBatch(cities, this.maxConcurrent);
  }

  /**
   * Fetch cities with at most `maxConcurrent` requests in flight.
   * Failed cities are logged and left out; result order is completion order.
   */
  async fetchBatch(cities: readonly string[], maxConcurrent: number = this.maxConcurrent): Promise<Measurement[]> {
    const startTime = Date.now();
    const results: Measurement[] = [];
    let failed = 0;

    if (cities.length > 0) {
      const concurrency = Math.min(Math.max(1, maxConcurrent), cities.length);
      let idx = 0;

      const worker = async () => {
        while (true) {
          const i = idx++;
          const city = cities[i];
          if (city === undefined) return;

          try {
            results.push(await this.fetcher.fetch(city));
          } catch (error) {
            failed++;
            this.logger.warn({ city, ...getErrorDetails(error) }, 'Failed to fetch weather');
          }
        }
      };

      await Promise.all(Array.from({ length: concurrency }, () => worker()));
    }

    const durationMs = Date.now() - startTime;
    const metrics: CollectionMetrics = {
      requested: cities.length,
      succeeded: results.length,
      failed,
      durationMs,
      successRate: cities.length === 0 ? 0 : Math.round((results.length / cities.length) * 10_000) / 100,
      requestsPerSecond: durationMs === 0 ? cities.length : Math.round((cities.length / durationMs) * 100_000) / 100,
    };

    this.logger.info(metrics, 'Batch collection completed');
    this.onMetrics?.(metrics);

    return results;
  }
}
