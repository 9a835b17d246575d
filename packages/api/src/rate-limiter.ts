/**
 * Sliding-window rate limiter for outbound API calls
 *
 * Admission: at most `maxRequests` calls in any trailing `windowMs`.
 * Callers are admitted strictly in arrival order. Each admission
 * (prune, check, record) runs to completion before the next caller's
 * check starts, because reservations are chained on a single promise.
 */

import { DAY_MS, HOUR_MS, MINUTE_MS } from '@app/config';

export interface RateLimiterOptions {
  /** Calls allowed per window (default 60) */
  maxRequests?: number;
  /** Window length in ms (default 60s) */
  windowMs?: number;
}

export interface RateLimiterUsage {
  requestsLastMinute: number;
  requestsLastHour: number;
  requestsLastDay: number;
  limitPerWindow: number;
  windowMs: number;
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export class SlidingWindowRateLimiter {
  readonly maxRequests: number;
  readonly windowMs: number;

  /** Admissions inside the current window, oldest first */
  private window: number[] = [];
  /** Admissions over the last 24h, for usage reporting only */
  private usageLog: number[] = [];
  private queue: Promise<void> = Promise.resolve();

  constructor(options: RateLimiterOptions = {}) {
    this.maxRequests = options.maxRequests ?? 60;
    this.windowMs = options.windowMs ?? MINUTE_MS;

    if (!Number.isInteger(this.maxRequests) || this.maxRequests < 1) {
      throw new RangeError(`maxRequests must be a positive integer, got ${this.maxRequests}`);
    }
    if (this.windowMs <= 0) {
      throw new RangeError(`windowMs must be positive, got ${this.windowMs}`);
    }
  }

  /**
   * Resolve once one more call fits in the window, and record it
   */
  reserve(): Promise<void> {
    const admission = this.queue.then(() => this.admit());
    this.queue = admission;
    return admission;
  }

  usage(): RateLimiterUsage {
    const now = Date.now();
    this.pruneUsage(now);
    const since = (ms: number) => this.usageLog.filter(t => now - t < ms).length;

    return {
      requestsLastMinute: since(MINUTE_MS),
      requestsLastHour: since(HOUR_MS),
      requestsLastDay: this.usageLog.length,
      limitPerWindow: this.maxRequests,
      windowMs: this.windowMs,
    };
  }

  private async admit(): Promise<void> {
    for (;;) {
      const now = Date.now();
      this.prune(now);

      const oldest = this.window[0];
      if (oldest === undefined || this.window.length < this.maxRequests) {
        this.window.push(now);
        this.usageLog.push(now);
        this.pruneUsage(now);
        return;
      }

      const waitMs = this.windowMs - (now - oldest);
      if (waitMs > 0) {
        await sleep(waitMs);
      }
    }
  }

  private prune(now: number): void {
    let expired = 0;
    while (expired < this.window.length && now - (this.window[expired] ?? now) >= this.windowMs) {
      expired++;
    }
    if (expired > 0) {
      this.window.splice(0, expired);
    }
  }

  private pruneUsage(now: number): void {
    const firstLive = this.usageLog.findIndex(t => now - t < DAY_MS);
    if (firstLive === -1) {
      this.usageLog = [];
    } else if (firstLive > 0) {
      this.usageLog.splice(0, firstLive);
    }
  }
}
