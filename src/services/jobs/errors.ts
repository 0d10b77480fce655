/**
 * Job Error Classes
 *
 * Infrastructure and parse-level faults raised while running a validation job.
 * Data-quality findings (missing, out-of-range, inconsistent) are anomalies
 * and never use these classes.
 */

import type { ProgressError } from '../../models/progress.js';

export type JobErrorCategory = 'DEPENDENCY_UNAVAILABLE' | 'EXTRACTION_FAILURE' | 'PERSISTENCE_FAILURE';

export class JobError extends Error {
  constructor(
    message: string,
    public readonly category: JobErrorCategory,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'JobError';
  }
}

/**
 * The page-text backend (binary or service) is not available. The job fails
 * before any page is read.
 */
export class DependencyUnavailableError extends JobError {
  constructor(
    message: string,
    public readonly dependency: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'DEPENDENCY_UNAVAILABLE', options);
    this.name = 'DependencyUnavailableError';
  }
}

/**
 * Unexpected fault while reading or processing a page
 */
export class ExtractionFailureError extends JobError {
  constructor(
    message: string,
    public readonly pageIndex: number | null,
    options?: { cause?: unknown }
  ) {
    super(message, 'EXTRACTION_FAILURE', options);
    this.name = 'ExtractionFailureError';
  }
}

/**
 * A ledger or blob-sink write failed
 */
export class PersistenceFailureError extends JobError {
  constructor(
    message: string,
    public readonly operation: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'PERSISTENCE_FAILURE', options);
    this.name = 'PersistenceFailureError';
  }
}

export function isPersistenceFailure(error: unknown): error is PersistenceFailureError {
  return error instanceof PersistenceFailureError;
}

/**
 * Convert any thrown value into the structured error stored on the ledger
 */
export function toProgressError(error: unknown): ProgressError {
  if (error instanceof JobError) {
    return { code: error.category, message: error.message };
  }
  if (error instanceof Error) {
    return { code: 'INTERNAL_ERROR', message: error.message };
  }
  return { code: 'INTERNAL_ERROR', message: String(error) };
}

/**
 * Stack trace lines of a thrown value, for the error artifact
 */
export function traceLines(error: unknown): string[] {
  if (error instanceof Error && error.stack) {
    const lines = error.stack.split('\n').map((line) => line.trimEnd());
    if (error.cause instanceof Error && error.cause.stack) {
      lines.push('Caused by:', ...error.cause.stack.split('\n').map((line) => line.trimEnd()));
    }
    return lines.filter((line) => line.length > 0);
  }
  return [String(error)];
}
