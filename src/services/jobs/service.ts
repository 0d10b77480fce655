/**
 * Job Service
 *
 * Submission and polling: submit creates the zeroed record and hands the job
 * to the launcher; poll reads the ledger. A job the launcher refuses is
 * failed on the ledger before the error reaches the caller.
 *
 * @module services/jobs/service
 */

import { v4 as uuidv4 } from 'uuid';
import type { PageSourceSpec } from '../../models/job.js';
import type { ProgressRecord } from '../../models/progress.js';
import type { ProgressLedger } from '../progress/ledger.js';
import { toProgressError } from './errors.js';
import type { JobLauncher } from './launcher.js';

export interface SubmittedJob {
  jobKey: string;
}

export class JobService {
  constructor(
    private readonly ledger: ProgressLedger,
    private readonly launcher: JobLauncher
  ) {}

  async submit(source: PageSourceSpec): Promise<SubmittedJob> {
    const jobKey = uuidv4();
    await this.ledger.createJob(jobKey);
    try {
      await this.launcher.launch(jobKey, source);
    } catch (error) {
      const progressError = toProgressError(error);
      console.error(`[Jobs] Launch failed for ${jobKey}: ${progressError.message}`);
      try {
        await this.ledger.fail(jobKey, progressError, null);
      } catch (failError) {
        console.error(
          `[Jobs] Could not record launch failure for ${jobKey}: ${failError instanceof Error ? failError.message : String(failError)}`
        );
      }
      throw error;
    }
    return { jobKey };
  }

  async poll(jobKey: string): Promise<ProgressRecord> {
    return this.ledger.getProgress(jobKey);
  }
}
