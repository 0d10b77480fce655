/**
 * Shared in-process fakes for unit tests
 *
 * @module tests/unit/helpers
 */

import { zeroProgress, type ProgressPatch, type ProgressRecord } from '../../src/models/progress.js';
import { definedFields, type ProgressBackend } from '../../src/services/progress/types.js';
import { PersistenceFailureError } from '../../src/services/jobs/errors.js';
import type { JobQueue, QueuedJob } from '../../src/services/jobs/launcher.js';

/**
 * Progress backend held in a Map, with scripted write failures
 */
export class MemoryProgressBackend implements ProgressBackend {
  readonly kind = 'file' as const;
  readonly records = new Map<string, ProgressRecord>();
  readonly writes: Array<{ jobKey: string; patch: ProgressPatch }> = [];

  /** Number of upcoming writes that fail */
  failNextWrites = 0;
  /** Error thrown by a failing write */
  makeError: () => Error = () => new PersistenceFailureError('store offline', 'progress.write');
  /** Answer of locateResult */
  reachableResult: string | null = null;

  async read(jobKey: string): Promise<ProgressRecord | null> {
    const record = this.records.get(jobKey);
    return record ? { ...record } : null;
  }

  async write(jobKey: string, patch: ProgressPatch): Promise<void> {
    this.writes.push({ jobKey, patch });
    if (this.failNextWrites > 0) {
      this.failNextWrites--;
      throw this.makeError();
    }
    const base = this.records.get(jobKey) ?? zeroProgress(jobKey);
    this.records.set(jobKey, { ...base, ...definedFields(patch), jobKey });
  }

  async locateResult(): Promise<string | null> {
    return this.reachableResult;
  }

  /** Every percent written for a key, in order */
  percentsFor(jobKey: string): number[] {
    return this.writes
      .filter((w) => w.jobKey === jobKey && w.patch.percent !== undefined)
      .map((w) => w.patch.percent ?? 0);
  }
}

/**
 * In-process stand-in for the Bull queue
 */
export class FakeJobQueue implements JobQueue {
  readonly jobs: QueuedJob[] = [];
  closed = false;
  failEnqueue = false;

  async enqueue(job: QueuedJob): Promise<void> {
    if (this.failEnqueue) throw new Error('Redis connection refused');
    this.jobs.push(job);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/** Retry settings that keep terminal-write retries fast in tests */
export const FAST_RETRY = { baseDelayMs: 1, maxDelayMs: 1, jitterFraction: 0 };
