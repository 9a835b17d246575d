/**
 * Sync orchestrator - wires collection, storage, backfill tracking and scheduling
 */

import type pino from 'pino';
import {
  EntityNotFoundError,
  SlidingWindowRateLimiter,
  WeatherClient,
  getErrorDetails,
  type Measurement,
  type MeasurementFetcher,
  type RateLimiterUsage,
} from '@app/api';
import { HOUR_MS, formatRelativeTime, subtractDays } from '@app/config';
import type { Database } from '../db';
import { MeasurementStore, type AggregateStats, type DatabaseStats } from '../db/store';
import { expectedBackfillDays, type Config } from '../lib/config';
import { resolveMonitoredCities } from '../lib/cities';
import { DataPipelineError } from '../lib/errors';
import { BackfillTracker, type BackfillVerdict } from './backfill';
import { BatchCollector } from './collector';
import { ExecutionHistory } from './history';
import { JobScheduler, type ExecutionEntry, type JobRecord } from './scheduler';

export const JOB_IDS = {
  update: 'hourly_weather_update',
  cleanup: 'daily_cleanup',
  stats: 'weekly_stats_update',
  backfill: 'historical_backfill',
} as const;

const HISTORY_RETENTION_DAYS = 7;

// ─── Types ──────────────────────────────────────────────────

export type OrchestratorConfig = Pick<
  Config,
  'updateIntervalHours' | 'cronjobStartHour' | 'cronjobStartMinute' | 'backfillMonths' | 'backfillDelayMs'
> & {
  apiKeyConfigured: boolean;
};

export interface OrchestratorDependencies {
  store: MeasurementStore;
  collector: BatchCollector;
  tracker: BackfillTracker;
  scheduler: JobScheduler;
  history: ExecutionHistory;
  limiter: SlidingWindowRateLimiter;
  fetcher: MeasurementFetcher;
  cities: readonly string[];
  config: OrchestratorConfig;
  logger: pino.Logger;
  /** Called after new data lands, e.g. to drop cached responses */
  onDataChanged?: () => Promise<unknown>;
}

export interface RunResult {
  status: 'success' | 'warning';
  message?: string;
  citiesRequested: number;
  recordsRetrieved: number;
  recordsInserted: number;
  durationMs: number;
  timestamp: string;
}

export interface CurrentWeather {
  source: 'store' | 'live';
  measurement: Measurement;
}

export interface JobView extends JobRecord {
  /** e.g. "in 42m" */
  nextRunIn: string | null;
}

export interface JobStatus {
  running: boolean;
  jobs: JobView[];
  recentHistory: ExecutionEntry[];
  totalHistoryEntries: number;
}

export interface SystemStatus {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  services: {
    scheduler: { status: 'running' | 'stopped'; jobStatus: JobStatus };
    weatherApi: { status: 'configured' | 'not_configured'; usage: RateLimiterUsage };
    database: { status: 'connected' | 'unavailable'; stats: DatabaseStats | null };
    backfill: { status: 'complete' | 'incomplete' | 'unknown'; isComplete: boolean | null };
  };
}

// ─── Orchestrator ───────────────────────────────────────────

export class SyncOrchestrator {
  private logger: pino.Logger;
  private store: MeasurementStore;
  private collector: BatchCollector;
  private tracker: BackfillTracker;
  private scheduler: JobScheduler;
  private executionHistory: ExecutionHistory;
  private limiter: SlidingWindowRateLimiter;
  private fetcher: MeasurementFetcher;
  private config: OrchestratorConfig;
  private onDataChanged?: () => Promise<unknown>;

  readonly cities: readonly string[];

  constructor(deps: OrchestratorDependencies) {
    this.logger = deps.logger;
    this.store = deps.store;
    this.collector = deps.collector;
    this.tracker = deps.tracker;
    this.scheduler = deps.scheduler;
    this.executionHistory = deps.history;
    this.limiter = deps.limiter;
    this.fetcher = deps.fetcher;
    this.cities = deps.cities;
    this.config = deps.config;
    this.onDataChanged = deps.onDataChanged;

    this.scheduler.addListener(this.executionHistory);
  }

  get expectedDays(): number {
    return expectedBackfillDays(this.config);
  }

  get isRunning(): boolean {
    return this.scheduler.isRunning;
  }

  /**
   * Start the scheduler, register the recurring jobs and queue a backfill
   * when historical coverage is short
   */
  async start(): Promise<void> {
    if (this.scheduler.isRunning) {
      this.logger.warn('Sync orchestrator already running');
      return;
    }

    this.logger.info({ cities: this.cities.length }, 'Starting sync orchestrator');

    this.scheduler.start();
    this.registerJobs();

    const complete = await this.tracker.isComplete(this.cities, this.expectedDays);
    if (complete) {
      this.logger.info('Historical data is complete, no backfill needed');
    } else {
      this.scheduleBackfill();
    }

    this.logger.info('Sync orchestrator started');
  }

  /**
   * Stop scheduling and wait for running jobs, manual runs included
   */
  async stop(): Promise<void> {
    this.logger.info('Stopping sync orchestrator');
    await this.scheduler.stop();
    this.logger.info('Sync orchestrator stopped');
  }

  // ─── Jobs ─────────────────────────────────────────────────

  private registerJobs(): void {
    const { updateIntervalHours, cronjobStartHour, cronjobStartMinute } = this.config;

    this.scheduler.addJob({
      id: JOB_IDS.update,
      name: 'Hourly weather data update',
      trigger: { kind: 'interval', everyMs: updateIntervalHours * HOUR_MS },
      run: () => this.collectAndStore('update'),
    });

    this.scheduler.addJob({
      id: JOB_IDS.cleanup,
      name: 'Daily cleanup',
      trigger: { kind: 'cron', hour: cronjobStartHour, minute: cronjobStartMinute },
      run: () => this.runCleanup(),
    });

    this.scheduler.addJob({
      id: JOB_IDS.stats,
      name: 'Weekly statistics update',
      trigger: { kind: 'cron', dayOfWeek: 0, hour: 3, minute: 0 },
      run: () => this.runStatsUpdate(),
    });
  }

  private scheduleBackfill(): void {
    const runAt = new Date(Date.now() + this.config.backfillDelayMs);

    this.scheduler.addJob({
      id: JOB_IDS.backfill,
      name: 'Historical data backfill',
      trigger: { kind: 'date', runAt },
      run: () => this.collectAndStore('backfill'),
    });

    this.logger.info({ runAt: runAt.toISOString() }, 'Historical backfill scheduled');
  }

  /**
   * Fetch every monitored city and upsert the results, now.
   * Runs under the update job's id, so it never overlaps a scheduled update.
   *
   * @throws SchedulingError when an update is already running
   */
  async triggerUpdate(): Promise<RunResult> {
    return this.scheduler.runNow(JOB_IDS.update, 'Manual weather data update', () => this.collectAndStore('update'));
  }

  /**
   * Backfill by polling: the current-weather endpoint has no history,
   * so each run adds one observation per city
   *
   * @throws SchedulingError when a backfill is already running
   */
  async triggerBackfill(): Promise<RunResult> {
    return this.scheduler.runNow(JOB_IDS.backfill, 'Manual historical backfill', () => this.collectAndStore('backfill'));
  }

  private async collectAndStore(kind: 'update' | 'backfill'): Promise<RunResult> {
    const startTime = Date.now();
    this.logger.info({ kind, cities: this.cities.length }, 'Collecting weather data');

    const measurements = await this.collector.fetchAll();

    if (measurements.length === 0) {
      this.logger.warn({ kind }, 'No weather data retrieved');
      return {
        status: 'warning',
        message: 'No data retrieved',
        citiesRequested: this.cities.length,
        recordsRetrieved: 0,
        recordsInserted: 0,
        durationMs: Date.now() - startTime,
        timestamp: new Date().toISOString(),
      };
    }

    let inserted: number;
    try {
      inserted = await this.store.upsert(measurements, { dedupe: true });
    } catch (error) {
      throw new DataPipelineError(`Failed to store ${measurements.length} measurements`, 'store', error);
    }

    if (this.onDataChanged) {
      await this.onDataChanged();
    }

    const result: RunResult = {
      status: 'success',
      citiesRequested: this.cities.length,
      recordsRetrieved: measurements.length,
      recordsInserted: inserted,
      durationMs: Date.now() - startTime,
      timestamp: new Date().toISOString(),
    };

    this.logger.info({ kind, ...result }, 'Weather data stored');
    return result;
  }

  /**
   * Prune week-old execution history and leftover staging tables
   */
  async runCleanup(): Promise<{ historyEntriesPruned: number; stagingTablesDropped: number }> {
    const historyEntriesPruned = this.executionHistory.prune(subtractDays(new Date(), HISTORY_RETENTION_DAYS));
    const stagingTablesDropped = await this.store.dropOrphanedStagingTables();

    this.logger.info({ historyEntriesPruned, stagingTablesDropped }, 'Daily cleanup completed');
    return { historyEntriesPruned, stagingTablesDropped };
  }

  async runStatsUpdate(): Promise<DatabaseStats> {
    const stats = await this.store.databaseStats();
    this.logger.info({ stats }, 'Weekly database statistics');
    return stats;
  }

  // ─── Queries ──────────────────────────────────────────────

  /**
   * Latest stored measurement, or a live fetch when the store has none.
   * Null when upstream does not know the city.
   */
  async fetchCurrent(city: string): Promise<CurrentWeather | null> {
    const stored = await this.store.latest(city);
    if (stored) {
      return { source: 'store', measurement: stored };
    }

    try {
      return { source: 'live', measurement: await this.fetcher.fetch(city) };
    } catch (error) {
      if (error instanceof EntityNotFoundError) {
        return null;
      }
      throw error;
    }
  }

  async history(city: string, days: number): Promise<Measurement[]> {
    return this.store.history(city, days);
  }

  async summary(city: string, days: number): Promise<AggregateStats | null> {
    return this.store.summary(city, days);
  }

  jobStatus(now: number = Date.now()): JobStatus {
    return {
      running: this.scheduler.isRunning,
      jobs: this.scheduler.getJobs().map(job => ({
        ...job,
        nextRunIn: job.nextRunAt ? formatRelativeTime(job.nextRunAt, now) : null,
      })),
      recentHistory: this.executionHistory.recent(10),
      totalHistoryEntries: this.executionHistory.size,
    };
  }

  async backfillStatus(): Promise<BackfillVerdict> {
    return this.tracker.coverage(this.cities, this.expectedDays);
  }

  async systemStatus(): Promise<SystemStatus> {
    const jobStatus = this.jobStatus();

    let stats: DatabaseStats | null = null;
    try {
      stats = await this.store.databaseStats();
    } catch (error) {
      this.logger.warn(getErrorDetails(error), 'Database statistics unavailable');
    }

    let backfillComplete: boolean | null = null;
    try {
      backfillComplete = (await this.tracker.coverage(this.cities, this.expectedDays)).isComplete;
    } catch (error) {
      this.logger.warn(getErrorDetails(error), 'Could not check backfill status');
    }

    return {
      status: jobStatus.running ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      services: {
        scheduler: { status: jobStatus.running ? 'running' : 'stopped', jobStatus },
        weatherApi: {
          status: this.config.apiKeyConfigured ? 'configured' : 'not_configured',
          usage: this.limiter.usage(),
        },
        database: { status: stats ? 'connected' : 'unavailable', stats },
        backfill: {
          status: backfillComplete === null ? 'unknown' : backfillComplete ? 'complete' : 'incomplete',
          isComplete: backfillComplete,
        },
      },
    };
  }
}

// ─── Composition ────────────────────────────────────────────

export interface SyncComponents {
  orchestrator: SyncOrchestrator;
  store: MeasurementStore;
  client: WeatherClient;
}

/**
 * Build the orchestrator and its collaborators from config
 */
export function createSyncOrchestrator(
  config: Config,
  db: Database,
  logger: pino.Logger,
  onDataChanged?: () => Promise<unknown>
): SyncComponents {
  const cities = resolveMonitoredCities(config);
  const limiter = new SlidingWindowRateLimiter({ maxRequests: config.requestsPerMinute });
  const fetchLogger = logger.child({ module: 'weather-client' });

  const client = new WeatherClient({
    apiKey: config.openWeatherApiKey ?? '',
    rateLimiter: limiter,
    baseUrl: config.openWeatherBaseUrl,
    units: config.openWeatherUnits,
    timeoutMs: config.requestTimeoutMs,
    connectTimeoutMs: config.connectTimeoutMs,
    retryAttempts: config.retryAttempts,
    retryBackoffMs: config.retryBackoffMs,
    onRetry: ({ target, attempt, delayMs, error }) => {
      fetchLogger.warn({ city: target, attempt, delayMs, ...getErrorDetails(error) }, 'Retrying weather request');
    },
  });

  const store = new MeasurementStore(db, logger.child({ module: 'store' }));
  const collector = new BatchCollector(client, logger.child({ module: 'collector' }), {
    cities,
    maxConcurrent: config.maxConcurrentFetches,
  });

  const orchestrator = new SyncOrchestrator({
    store,
    collector,
    tracker: new BackfillTracker(store, logger.child({ module: 'backfill' })),
    scheduler: new JobScheduler(logger.child({ module: 'scheduler' })),
    history: new ExecutionHistory(config.jobHistoryCapacity),
    limiter,
    fetcher: client,
    cities,
    config: { ...config, apiKeyConfigured: config.openWeatherApiKey !== undefined },
    logger: logger.child({ module: 'sync-orchestrator' }),
    onDataChanged,
  });

  return { orchestrator, store, client };
}

export { BackfillTracker, computeCoverage, type BackfillVerdict, type CoverageStatus } from './backfill';
export { BatchCollector, type CollectionMetrics } from './collector';
export { ExecutionHistory } from './history';
export { JobScheduler, nextFireTime, type ExecutionEntry, type JobDefinition, type JobRecord, type JobTrigger } from './scheduler';
