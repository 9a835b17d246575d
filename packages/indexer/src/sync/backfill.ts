/**
 * Backfill tracker - per-city historical coverage and the system-wide verdict
 */

import type pino from 'pino';
import { daysBetweenUtcDates, toUtcDateKey } from '@app/config';
import type { CoverageRow } from '../db/store';

/** Share of the target (per city) and of the cities (overall) that counts as complete */
export const COMPLETION_RATIO = 0.9;

export interface CoverageStatus {
  recordCount: number;
  earliestDate: string | null;
  latestDate: string | null;
  distinctDays: number;
  expectedDaysTarget: number;
  completionThreshold: number;
  isComplete: boolean;
}

export interface BackfillVerdict {
  isComplete: boolean;
  totalEntitiesExpected: number;
  entitiesWithData: number;
  completeEntities: number;
  missingEntities: string[];
  /** Keyed by the city name as requested */
  details: Record<string, CoverageStatus>;
  expectedDays: number;
}

/**
 * Where coverage rows come from; MeasurementStore in production
 */
export interface CoverageSource {
  coverageRows(cities: readonly string[], lookbackDays: number, now?: Date): Promise<CoverageRow[]>;
}

/**
 * Coverage for one city.
 * A city that started reporting recently is judged against the days it could
 * have reported, not the full window.
 */
export function computeCoverage(
  row: CoverageRow | undefined,
  expectedDays: number,
  todayKey: string
): CoverageStatus {
  if (!row || row.recordCount === 0 || row.earliestDate === null) {
    return {
      recordCount: 0,
      earliestDate: null,
      latestDate: null,
      distinctDays: 0,
      expectedDaysTarget: expectedDays,
      completionThreshold: Math.max(1, Math.round(expectedDays * COMPLETION_RATIO)),
      isComplete: false,
    };
  }

  const daysSinceFirst = daysBetweenUtcDates(row.earliestDate, todayKey) + 1;
  const expectedDaysTarget = Math.max(1, Math.min(expectedDays, daysSinceFirst));
  const completionThreshold = Math.max(1, Math.round(expectedDaysTarget * COMPLETION_RATIO));

  return {
    recordCount: row.recordCount,
    earliestDate: row.earliestDate,
    latestDate: row.latestDate,
    distinctDays: row.distinctDays,
    expectedDaysTarget,
    completionThreshold,
    isComplete: row.distinctDays >= completionThreshold,
  };
}

export class BackfillTracker {
  constructor(
    private readonly source: CoverageSource,
    private readonly logger: pino.Logger
  ) {}

  /**
   * Coverage of the trailing `expectedDays` for each city.
   * Store failures propagate.
   */
  async coverage(cities: readonly string[], expectedDays: number, now: Date = new Date()): Promise<BackfillVerdict> {
    const rows = await this.source.coverageRows(cities, expectedDays, now);
    const byCity = new Map(rows.map(row => [row.city.toLowerCase(), row]));
    const todayKey = toUtcDateKey(now);

    const details: Record<string, CoverageStatus> = {};
    const missingEntities: string[] = [];
    let entitiesWithData = 0;
    let completeEntities = 0;

    for (const city of cities) {
      const status = computeCoverage(byCity.get(city.trim().toLowerCase()), expectedDays, todayKey);
      details[city] = status;

      if (status.recordCount === 0) {
        missingEntities.push(city);
        continue;
      }
      entitiesWithData++;
      if (status.isComplete) completeEntities++;
    }

    const total = cities.length;
    const isComplete =
      total > 0 &&
      missingEntities.length === 0 &&
      completeEntities === total &&
      entitiesWithData / total >= COMPLETION_RATIO;

    const verdict: BackfillVerdict = {
      isComplete,
      totalEntitiesExpected: total,
      entitiesWithData,
      completeEntities,
      missingEntities,
      details,
      expectedDays,
    };

    this.logger.info({
      isComplete,
      totalEntitiesExpected: total,
      entitiesWithData,
      completeEntities,
      missing: missingEntities.length,
      expectedDays,
    }, 'Backfill coverage checked');

    return verdict;
  }

  /**
   * Verdict as a boolean; a failed check counts as incomplete
   */
  async isComplete(cities: readonly string[], expectedDays: number, now: Date = new Date()): Promise<boolean> {
    try {
      const verdict = await this.coverage(cities, expectedDays, now);
      return verdict.isComplete;
    } catch (err) {
      this.logger.warn({ err }, 'Backfill coverage check failed, assuming incomplete');
      return false;
    }
  }
}
