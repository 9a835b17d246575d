/**
 * Weather Indexer - Main exports
 */

// Database
export * from './db';
export { MeasurementStore, dedupeByMergeKey, type AggregateStats, type CoverageRow, type DatabaseStats, type UpsertOptions } from './db/store';

// Sync
export {
  SyncOrchestrator,
  createSyncOrchestrator,
  JOB_IDS,
  BackfillTracker,
  BatchCollector,
  ExecutionHistory,
  JobScheduler,
  type RunResult,
  type JobStatus,
  type SystemStatus,
} from './sync';

// API
export { createApp, type AppDependencies } from './api';

// Config & Logger
export { getConfig, resetConfig, expectedBackfillDays, type Config } from './lib/config';
export { getLogger, createChildLogger } from './lib/logger';
export { resolveMonitoredCities, BUNDLED_CITIES } from './lib/cities';
export * from './lib/errors';
