/**
 * Job scheduler - interval and one-shot jobs on timers, calendar jobs on node-cron (UTC)
 *
 * At most one run per job id is in flight. A trigger that fires while the
 * previous run is still going is skipped, and the next occurrence is armed as usual.
 */

import cron, { type ScheduledTask } from 'node-cron';
import type pino from 'pino';
import { DAY_MS } from '@app/config';
import { SchedulingError } from '../lib/errors';

// ─── Types ──────────────────────────────────────────────────

export type JobTrigger =
  | { kind: 'interval'; everyMs: number }
  /** Fires when the UTC clock reads hour:minute, on `dayOfWeek` (0 = Sunday) if given */
  | { kind: 'cron'; minute: number; hour: number; dayOfWeek?: number }
  | { kind: 'date'; runAt: Date };

export interface JobDefinition {
  id: string;
  name: string;
  trigger: JobTrigger;
  /** Resolved value is recorded as the run's result and should be JSON-safe */
  run: () => Promise<unknown>;
}

export type JobState = 'scheduled' | 'running';

export interface JobRecord {
  id: string;
  name: string;
  trigger: JobTrigger;
  lastRunAt: Date | null;
  nextRunAt: Date | null;
  state: JobState;
}

export interface ExecutionEntry {
  jobId: string;
  jobName: string;
  scheduledRunTime: Date;
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  status: 'success' | 'error';
  result?: unknown;
  error?: { message: string; stack?: string };
}

export interface JobExecutionListener {
  onJobExecuted(entry: ExecutionEntry): void;
}

interface ScheduledJob {
  definition: JobDefinition;
  timer: NodeJS.Timeout | null;
  task: ScheduledTask | null;
  nextRunAt: Date | null;
  lastRunAt: Date | null;
}

type RunOutcome<T> = { ok: true; value: T } | { ok: false; error: unknown };

// setTimeout overflows above 2^31-1 ms (~24.8 days)
const MAX_TIMER_DELAY_MS = 2_147_483_647;

// ─── Trigger math ───────────────────────────────────────────

/**
 * node-cron expression for a calendar trigger
 */
export function cronExpression(trigger: { minute: number; hour: number; dayOfWeek?: number }): string {
  return `${trigger.minute} ${trigger.hour} * * ${trigger.dayOfWeek ?? '*'}`;
}

/**
 * Next fire time strictly after `after`; null once a one-shot job has fired.
 * For calendar jobs this is reporting only, node-cron does the firing.
 */
export function nextFireTime(trigger: JobTrigger, after: Date): Date | null {
  switch (trigger.kind) {
    case 'interval':
      return new Date(after.getTime() + trigger.everyMs);

    case 'date':
      return trigger.runAt.getTime() > after.getTime() ? trigger.runAt : null;

    case 'cron': {
      const candidate = new Date(after.getTime());
      candidate.setUTCHours(trigger.hour, trigger.minute, 0, 0);
      if (candidate.getTime() <= after.getTime()) {
        candidate.setTime(candidate.getTime() + DAY_MS);
      }
      if (trigger.dayOfWeek !== undefined) {
        while (candidate.getUTCDay() !== trigger.dayOfWeek) {
          candidate.setTime(candidate.getTime() + DAY_MS);
        }
      }
      return candidate;
    }
  }
}

function validateTrigger(trigger: JobTrigger): void {
  switch (trigger.kind) {
    case 'interval':
      if (!(trigger.everyMs >= 1000)) {
        throw new SchedulingError(`Interval must be at least 1s, got ${trigger.everyMs}ms`);
      }
      return;
    case 'cron':
      if (!cron.validate(cronExpression(trigger))) {
        throw new SchedulingError(`Invalid calendar trigger "${cronExpression(trigger)}"`);
      }
      return;
    case 'date':
      if (Number.isNaN(trigger.runAt.getTime())) {
        throw new SchedulingError('Invalid run date');
      }
      return;
  }
}

// ─── Scheduler ──────────────────────────────────────────────

export class JobScheduler {
  private jobs = new Map<string, ScheduledJob>();
  /** Settles when the run finishes; keyed by job id, so it outlives a replaced job */
  private inFlight = new Map<string, Promise<void>>();
  private listeners: JobExecutionListener[] = [];
  private running = false;
  private stopped = false;

  constructor(private readonly logger: pino.Logger) {}

  get isRunning(): boolean {
    return this.running;
  }

  addListener(listener: JobExecutionListener): void {
    this.listeners.push(listener);
  }

  /**
   * Register a job, replacing any job with the same id.
   * A run of the replaced job that is still in flight keeps blocking new runs.
   */
  addJob(definition: JobDefinition): void {
    validateTrigger(definition.trigger);

    const previous = this.jobs.get(definition.id);
    if (previous) {
      this.disarm(previous);
    }

    const job: ScheduledJob = {
      definition,
      timer: null,
      task: null,
      nextRunAt: null,
      lastRunAt: previous?.lastRunAt ?? null,
    };
    this.jobs.set(definition.id, job);

    if (this.running) {
      this.arm(job, new Date());
    }

    this.logger.info({ jobId: definition.id, trigger: definition.trigger, replaced: previous !== undefined }, 'Job registered');
  }

  hasJob(id: string): boolean {
    return this.jobs.has(id);
  }

  start(): void {
    if (this.running) {
      throw new SchedulingError('Scheduler is already running');
    }

    try {
      this.running = true;
      this.stopped = false;
      const now = new Date();
      for (const job of this.jobs.values()) {
        this.arm(job, now);
      }
    } catch (error) {
      this.running = false;
      this.disarmAll();
      throw new SchedulingError('Failed to start scheduler', { cause: error });
    }

    this.logger.info({ jobs: this.jobs.size }, 'Scheduler started');
  }

  /**
   * Stop dispatching and wait for in-flight runs, manual ones included, to finish.
   * No new manual runs are accepted until the next start.
   */
  async stop(): Promise<void> {
    const wasRunning = this.running;
    this.running = false;
    this.stopped = true;
    this.disarmAll();

    const pending = [...this.inFlight.values()];
    if (pending.length > 0) {
      this.logger.info({ inFlight: pending.length }, 'Waiting for running jobs to finish');
    }

    try {
      await Promise.all(pending);
    } catch (error) {
      throw new SchedulingError('Failed to stop scheduler', { cause: error });
    }

    if (wasRunning) {
      this.logger.info('Scheduler stopped');
    }
  }

  /**
   * Run `run` now under job id `id`, outside its schedule.
   * Shares the one-run-per-id guard with scheduled firings, is recorded in the
   * execution history and is awaited by stop(). Works before start().
   *
   * @throws SchedulingError when a run of `id` is already in flight or the scheduler was stopped
   */
  async runNow<T>(id: string, name: string, run: () => Promise<T>): Promise<T> {
    if (this.stopped) {
      throw new SchedulingError('Scheduler is stopped');
    }
    if (this.inFlight.has(id)) {
      throw new SchedulingError(`Job "${id}" is already running`);
    }

    const outcome = this.execute(id, name, run, new Date());
    this.track(id, outcome);

    const settled = await outcome;
    if (!settled.ok) {
      throw settled.error;
    }
    return settled.value;
  }

  getJobs(): JobRecord[] {
    return [...this.jobs.values()].map(job => ({
      id: job.definition.id,
      name: job.definition.name,
      trigger: job.definition.trigger,
      lastRunAt: job.lastRunAt,
      nextRunAt: job.nextRunAt,
      state: this.inFlight.has(job.definition.id) ? 'running' : 'scheduled',
    }));
  }

  getJob(id: string): JobRecord | undefined {
    return this.getJobs().find(job => job.id === id);
  }

  // ─── Internals ────────────────────────────────────────────

  private disarm(job: ScheduledJob): void {
    if (job.timer) {
      clearTimeout(job.timer);
      job.timer = null;
    }
    if (job.task) {
      job.task.stop();
      job.task = null;
    }
  }

  private disarmAll(): void {
    for (const job of this.jobs.values()) {
      this.disarm(job);
    }
  }

  private arm(job: ScheduledJob, now: Date): void {
    const { trigger } = job.definition;

    switch (trigger.kind) {
      case 'cron':
        job.nextRunAt = nextFireTime(trigger, now);
        job.task = cron.schedule(cronExpression(trigger), () => this.onCronTick(job), { timezone: 'UTC' });
        return;
      case 'date':
        // A one-shot date already in the past still fires, immediately
        job.nextRunAt = trigger.runAt;
        this.setTimer(job);
        return;
      case 'interval':
        job.nextRunAt = nextFireTime(trigger, now);
        this.setTimer(job);
        return;
    }
  }

  private isCurrent(job: ScheduledJob): boolean {
    return this.running && this.jobs.get(job.definition.id) === job;
  }

  private setTimer(job: ScheduledJob): void {
    if (job.nextRunAt === null) {
      job.timer = null;
      return;
    }

    const delay = Math.min(Math.max(0, job.nextRunAt.getTime() - Date.now()), MAX_TIMER_DELAY_MS);
    job.timer = setTimeout(() => this.onTimer(job), delay);
  }

  private onTimer(job: ScheduledJob): void {
    job.timer = null;
    if (!this.isCurrent(job) || job.nextRunAt === null) {
      return;
    }

    // Long delays are clamped; keep waiting
    if (job.nextRunAt.getTime() > Date.now()) {
      this.setTimer(job);
      return;
    }

    this.fire(job, job.nextRunAt);
  }

  private onCronTick(job: ScheduledJob): void {
    if (!this.isCurrent(job)) {
      return;
    }

    const scheduledRunTime = new Date();
    scheduledRunTime.setUTCMilliseconds(0);
    this.fire(job, scheduledRunTime);
  }

  private fire(job: ScheduledJob, scheduledRunTime: Date): void {
    const { definition } = job;
    const { trigger } = definition;

    switch (trigger.kind) {
      case 'date':
        job.nextRunAt = null;
        break;
      case 'cron':
        job.nextRunAt = nextFireTime(trigger, scheduledRunTime);
        break;
      case 'interval':
        job.nextRunAt = nextFireTime(trigger, new Date(Math.max(Date.now(), scheduledRunTime.getTime())));
        this.setTimer(job);
        break;
    }

    if (this.inFlight.has(definition.id)) {
      this.logger.warn({ jobId: definition.id, scheduledRunTime }, 'Previous run still in progress, skipping');
      // A skipped one-shot has nothing left to run
      if (trigger.kind === 'date') {
        this.jobs.delete(definition.id);
      }
      return;
    }

    const outcome = this.execute(definition.id, definition.name, definition.run, scheduledRunTime);
    this.track(definition.id, outcome);

    if (trigger.kind === 'date') {
      this.jobs.delete(definition.id);
    }
  }

  private track(id: string, outcome: Promise<RunOutcome<unknown>>): void {
    const settled: Promise<void> = outcome.then(() => {
      if (this.inFlight.get(id) === settled) {
        this.inFlight.delete(id);
      }
    });
    this.inFlight.set(id, settled);
  }

  /**
   * Run a job body once and notify listeners. Never rejects.
   */
  private async execute<T>(
    jobId: string,
    jobName: string,
    run: () => Promise<T>,
    scheduledRunTime: Date
  ): Promise<RunOutcome<T>> {
    const startedAt = new Date();
    const job = this.jobs.get(jobId);
    if (job) job.lastRunAt = startedAt;

    this.logger.info({ jobId }, 'Job started');

    let outcome: RunOutcome<T>;
    let entry: ExecutionEntry;
    try {
      const value = await run();
      const finishedAt = new Date();
      outcome = { ok: true, value };
      entry = {
        jobId,
        jobName,
        scheduledRunTime,
        startedAt,
        finishedAt,
        durationMs: finishedAt.getTime() - startedAt.getTime(),
        status: 'success',
        result: value,
      };
      this.logger.info({ jobId, durationMs: entry.durationMs }, 'Job completed');
    } catch (error) {
      const finishedAt = new Date();
      outcome = { ok: false, error };
      entry = {
        jobId,
        jobName,
        scheduledRunTime,
        startedAt,
        finishedAt,
        durationMs: finishedAt.getTime() - startedAt.getTime(),
        status: 'error',
        error: error instanceof Error
          ? { message: error.message, stack: error.stack }
          : { message: String(error) },
      };
      this.logger.error({ jobId, err: error }, 'Job failed');
    }

    for (const listener of this.listeners) {
      try {
        listener.onJobExecuted(entry);
      } catch (err) {
        this.logger.error({ err, jobId }, 'Execution listener failed');
      }
    }

    return outcome;
  }
}
