/**
 * Progress ledger records
 *
 * The pollable view of one asynchronous job. Created zeroed at submission,
 * advanced by monotonic percent updates, closed by exactly one terminal write.
 */

/**
 * Structured job error as stored on the ledger
 */
export interface ProgressError {
  code?: string;
  message: string;
}

export interface ProgressRecord {
  jobKey: string;
  /** Integer in [0, 100], non-decreasing until terminal */
  percent: number;
  done: boolean;
  /** Blob-sink locator of the final artifact, or of the error artifact on failure */
  resultLocator: string | null;
  error: ProgressError | null;
  /** True when some checkpointed segments could not be merged into the final artifact */
  partial: boolean;
}

/**
 * Partial update. Fields left undefined are not changed.
 */
export interface ProgressPatch {
  percent?: number;
  resultLocator?: string | null;
  done?: boolean;
  error?: ProgressError | null;
  partial?: boolean;
}

export function zeroProgress(jobKey: string): ProgressRecord {
  return {
    jobKey,
    percent: 0,
    done: false,
    resultLocator: null,
    error: null,
    partial: false,
  };
}

/**
 * Percent of pages processed, floored to an integer
 */
export function computePercent(pagesProcessed: number, totalPages: number): number {
  if (totalPages <= 0) return 0;
  return Math.floor((pagesProcessed / totalPages) * 100);
}
