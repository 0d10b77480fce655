/**
 * Job Runner
 *
 * Owns one job's lifecycle: opens the page source, drives the pipeline, and
 * makes sure the ledger ends with exactly one terminal record whichever
 * stage fails. runJob never rejects.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module services/jobs/runner
 */

import type { PageSourceSpec, JobResult } from '../../models/job.js';
import type { ProgressError } from '../../models/progress.js';
import type { BlobSink } from '../storage/blob-sink.js';
import type { ProgressLedger } from '../progress/ledger.js';
import type { SegmentedPipelineDriver } from '../pipeline/driver.js';
import type { PageSource } from '../text/page-source.js';
import { toProgressError, traceLines } from './errors.js';

export type PageSourceFactory = (spec: PageSourceSpec) => PageSource;

export type JobOutcome =
  | { status: 'completed'; jobKey: string; result: JobResult }
  | { status: 'failed'; jobKey: string; error: ProgressError; errorLocator: string | null };

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class JobRunner {
  constructor(
    private readonly driver: SegmentedPipelineDriver,
    private readonly ledger: ProgressLedger,
    private readonly sink: BlobSink,
    private readonly openSource: PageSourceFactory
  ) {}

  async runJob(jobKey: string, spec: PageSourceSpec): Promise<JobOutcome> {
    console.error(`[JobRunner] Starting job ${jobKey} (${spec.type} source)`);
    const startTime = Date.now();

    let source: PageSource | null = null;
    try {
      source = this.openSource(spec);
      const result = await this.driver.run(jobKey, source);
      console.error(
        `[JobRunner] Job ${jobKey} completed in ${Date.now() - startTime}ms: ` +
          `${result.anomalyCount} anomalies, ${result.criticalCount} critical`
      );
      return { status: 'completed', jobKey, result };
    } catch (error) {
      return this.recordFailure(jobKey, error);
    } finally {
      if (source) {
        try {
          await source.close();
        } catch (closeError) {
          console.error(`[JobRunner] Failed to close page source for ${jobKey}: ${errorMessage(closeError)}`);
        }
      }
    }
  }

  /**
   * Failure path: error artifact first, then the terminal error record
   * pointing at it (or at nothing when the artifact could not be written).
   */
  private async recordFailure(
    jobKey: string,
    error: unknown
  ): Promise<JobOutcome> {
    const progressError = toProgressError(error);
    console.error(`[JobRunner] Job ${jobKey} failed [${progressError.code}]: ${progressError.message}`);

    let errorLocator: string | null = null;
    try {
      errorLocator = await this.sink.writeErrorArtifact(
        jobKey,
        errorMessage(error),
        traceLines(error)
      );
    } catch (artifactError) {
      console.error(`[JobRunner] Could not write error artifact for ${jobKey}: ${errorMessage(artifactError)}`);
    }

    try {
      await this.ledger.fail(jobKey, progressError, errorLocator);
    } catch (ledgerError) {
      console.error(
        `[JobRunner] CRITICAL: terminal record for ${jobKey} not stored, pollers will not see the failure: ${errorMessage(ledgerError)}`
      );
    }

    return { status: 'failed', jobKey, error: progressError, errorLocator };
  }
}
