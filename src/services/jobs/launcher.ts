/**
 * Job Launchers
 *
 * How a submitted job reaches a JobRunner. The variant is picked once from
 * configuration:
 * - sync: runs inside the submitting call, which blocks until the job ends
 * - background: runs on this process, submission returns at once
 * - queue: hands the job to a Bull queue consumed by the worker process
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module services/jobs/launcher
 */

import type Bull from 'bull';
import type { PageSourceSpec } from '../../models/job.js';
import type { JobRunner } from './runner.js';

export type LaunchMode = 'sync' | 'background' | 'queue';

export interface QueuedJob {
  jobKey: string;
  source: PageSourceSpec;
}

export interface JobLauncher {
  readonly mode: LaunchMode;
  launch(jobKey: string, source: PageSourceSpec): Promise<void>;
  /** Release resources; in-process variants wait for running jobs first */
  close(): Promise<void>;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ═══════════════════════════════════════════════════════════════════════════════
// SYNC
// ═══════════════════════════════════════════════════════════════════════════════

export class SyncJobLauncher implements JobLauncher {
  readonly mode = 'sync';

  constructor(private readonly runner: JobRunner) {}

  async launch(jobKey: string, source: PageSourceSpec): Promise<void> {
    await this.runner.runJob(jobKey, source);
  }

  async close(): Promise<void> {}
}

// ═══════════════════════════════════════════════════════════════════════════════
// BACKGROUND
// ═══════════════════════════════════════════════════════════════════════════════

export class BackgroundJobLauncher implements JobLauncher {
  readonly mode = 'background';
  private readonly inFlight = new Set<Promise<void>>();

  constructor(private readonly runner: JobRunner) {}

  async launch(jobKey: string, source: PageSourceSpec): Promise<void> {
    // Start on a later turn of the event loop so the caller gets its key first
    const task: Promise<void> = new Promise<void>((resolve) => setImmediate(resolve))
      .then(() => this.runner.runJob(jobKey, source))
      .then(
        () => undefined,
        (error: unknown) => {
          console.error(`[Launcher] Background job ${jobKey} escaped its runner: ${errorMessage(error)}`);
        }
      )
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }

  get activeCount(): number {
    return this.inFlight.size;
  }

  /**
   * Wait until every job started so far has finished
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  async close(): Promise<void> {
    if (this.inFlight.size > 0) {
      console.error(`[Launcher] Waiting for ${this.inFlight.size} background job(s) to finish`);
    }
    await this.drain();
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// QUEUE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * The part of a queue the launcher uses
 */
export interface JobQueue {
  enqueue(job: QueuedJob): Promise<void>;
  close(): Promise<void>;
}

/**
 * Adapt a Bull queue. The job key doubles as the Bull job id, so submitting
 * the same key twice queues it once. The runner records failures itself,
 * so Bull never retries.
 */
export function bullJobQueue(queue: Bull.Queue<QueuedJob>): JobQueue {
  return {
    async enqueue(job: QueuedJob): Promise<void> {
      await queue.add(job, {
        jobId: job.jobKey,
        attempts: 1,
        removeOnComplete: { age: 24 * 3600, count: 1000 },
        removeOnFail: { age: 7 * 24 * 3600 },
      });
    },
    async close(): Promise<void> {
      await queue.close();
    },
  };
}

export class QueueJobLauncher implements JobLauncher {
  readonly mode = 'queue';

  constructor(private readonly queue: JobQueue) {}

  async launch(jobKey: string, source: PageSourceSpec): Promise<void> {
    await this.queue.enqueue({ jobKey, source });
    console.error(`[Launcher] Queued job ${jobKey}`);
  }

  async close(): Promise<void> {
    await this.queue.close();
  }
}
