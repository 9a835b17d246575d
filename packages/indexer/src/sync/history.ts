/**
 * Bounded job execution history
 */

import type { ExecutionEntry, JobExecutionListener } from './scheduler';

export const DEFAULT_HISTORY_CAPACITY = 1000;

/**
 * Ring buffer of execution entries; once full, each new entry evicts the oldest
 */
export class ExecutionHistory implements JobExecutionListener {
  private buffer: Array<ExecutionEntry | undefined>;
  private start = 0;
  private count = 0;

  constructor(readonly capacity: number = DEFAULT_HISTORY_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
    }
    this.buffer = new Array<ExecutionEntry | undefined>(capacity);
  }

  get size(): number {
    return this.count;
  }

  onJobExecuted(entry: ExecutionEntry): void {
    this.record(entry);
  }

  record(entry: ExecutionEntry): void {
    if (this.count < this.capacity) {
      this.buffer[(this.start + this.count) % this.capacity] = entry;
      this.count++;
      return;
    }
    this.buffer[this.start] = entry;
    this.start = (this.start + 1) % this.capacity;
  }

  /**
   * All entries, oldest first
   */
  entries(): ExecutionEntry[] {
    const result: ExecutionEntry[] = [];
    for (let i = 0; i < this.count; i++) {
      const entry = this.buffer[(this.start + i) % this.capacity];
      if (entry) result.push(entry);
    }
    return result;
  }

  /**
   * The last `limit` entries, oldest first
   */
  recent(limit = 10): ExecutionEntry[] {
    if (limit <= 0) return [];
    return this.entries().slice(-limit);
  }

  /**
   * Drop entries that finished before `olderThan`; returns how many were dropped
   */
  prune(olderThan: Date): number {
    const kept = this.entries().filter(e => e.finishedAt.getTime() >= olderThan.getTime());
    const removed = this.count - kept.length;

    this.buffer = new Array<ExecutionEntry | undefined>(this.capacity);
    kept.forEach((entry, i) => {
      this.buffer[i] = entry;
    });
    this.start = 0;
    this.count = kept.length;

    return removed;
  }
}
