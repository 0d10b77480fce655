/**
 * Progress Ledger
 *
 * Keyed job-progress records behind an injected backend. Constructed once
 * per process and handed to every job runner and to the polling surface.
 *
 * Guarantees for one job key:
 * - percent never decreases (a smaller value is clamped to the stored one)
 * - a terminal record (done, with a result locator or an error) is never
 *   changed again
 * - done implies a result locator or an error; a done record with neither is
 *   a torn terminal write and the next terminal write completes it
 *
 * Reads repair records left at 100% without done=true (a writer that crashed
 * between the two updates) when the result artifact is reachable.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module services/progress/ledger
 */

import {
  zeroProgress,
  type ProgressError,
  type ProgressPatch,
  type ProgressRecord,
} from '../../models/progress.js';
import { withRetry, type RetryConfig } from '../../utils/backoff.js';
import { ValidationError } from '../../utils/validation.js';
import { isPersistenceFailure } from '../jobs/errors.js';
import { definedFields, type ProgressBackend, type ProgressBackendKind } from './types.js';

/** Job keys double as file names and hash keys */
const VALID_KEY_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

export function assertJobKey(jobKey: string): void {
  if (!VALID_KEY_PATTERN.test(jobKey)) {
    throw new ValidationError(
      `Invalid job key "${jobKey}". Only alphanumeric characters, underscores, and hyphens are allowed.`
    );
  }
}

/**
 * Outcome written by the one terminal transition
 */
export type TerminalOutcome =
  | { kind: 'completed'; resultLocator: string; partial: boolean }
  | { kind: 'failed'; error: ProgressError; resultLocator: string | null };

export interface ProgressLedgerOptions {
  /** Retry policy for the terminal write */
  terminalRetry: Partial<RetryConfig>;
}

function isTerminal(record: ProgressRecord | null): boolean {
  return record !== null && record.done && (record.resultLocator !== null || record.error !== null);
}

function clampPercent(percent: number): number {
  if (!Number.isFinite(percent)) return 0;
  return Math.min(100, Math.max(0, Math.floor(percent)));
}

export class ProgressLedger {
  private readonly terminalRetry: Partial<RetryConfig>;

  constructor(
    private readonly backend: ProgressBackend,
    options?: Partial<ProgressLedgerOptions>
  ) {
    this.terminalRetry = { label: 'Ledger', ...options?.terminalRetry };
  }

  get backendKind(): ProgressBackendKind {
    return this.backend.kind;
  }

  /**
   * Write the zeroed record for a newly submitted job
   */
  async createJob(jobKey: string): Promise<ProgressRecord> {
    assertJobKey(jobKey);
    const record = zeroProgress(jobKey);
    await this.backend.write(jobKey, {
      percent: record.percent,
      done: record.done,
      resultLocator: record.resultLocator,
      error: record.error,
      partial: record.partial,
    });
    return record;
  }

  /**
   * Partial, non-terminal update.
   *
   * @returns false when the record is already done and the update was ignored
   * @throws PersistenceFailureError when the backend could not store it
   */
  async setProgress(jobKey: string, patch: ProgressPatch): Promise<boolean> {
    assertJobKey(jobKey);
    if (patch.done === true) {
      throw new Error('setProgress cannot mark a job done; use complete() or fail()');
    }

    const current = (await this.backend.read(jobKey)) ?? zeroProgress(jobKey);
    if (isTerminal(current)) {
      console.error(`[Ledger] Ignoring update for finished job ${jobKey}`);
      return false;
    }

    const update = definedFields(patch);
    if (update.percent !== undefined) {
      update.percent = Math.max(current.percent, clampPercent(update.percent));
      if (update.percent === current.percent && Object.keys(update).length === 1) {
        return true;
      }
    }
    await this.backend.write(jobKey, update);
    return true;
  }

  /**
   * The single terminal transition: percent 100, done, and either a result
   * locator or an error. Retried with backoff on persistence failures.
   *
   * @returns false when the job had already reached a terminal state
   */
  async finish(jobKey: string, outcome: TerminalOutcome): Promise<boolean> {
    assertJobKey(jobKey);
    const patch: ProgressPatch =
      outcome.kind === 'completed'
        ? {
            percent: 100,
            resultLocator: outcome.resultLocator,
            error: null,
            partial: outcome.partial,
            done: true,
          }
        : {
            percent: 100,
            resultLocator: outcome.resultLocator,
            error: outcome.error,
            done: true,
          };

    return withRetry(
      async () => {
        const current = await this.backend.read(jobKey);
        if (isTerminal(current)) {
          console.error(`[Ledger] Job ${jobKey} already finished, terminal write skipped`);
          return false;
        }
        await this.backend.write(jobKey, patch);
        return true;
      },
      isPersistenceFailure,
      this.terminalRetry
    );
  }

  async complete(jobKey: string, resultLocator: string, partial = false): Promise<boolean> {
    return this.finish(jobKey, { kind: 'completed', resultLocator, partial });
  }

  async fail(jobKey: string, error: ProgressError, resultLocator: string | null): Promise<boolean> {
    return this.finish(jobKey, { kind: 'failed', error, resultLocator });
  }

  /**
   * Current record, zeroed when the key is unknown. A record at 100% that is
   * not done is promoted to done when its result artifact is reachable.
   */
  async getProgress(jobKey: string): Promise<ProgressRecord> {
    assertJobKey(jobKey);
    const record = await this.backend.read(jobKey);
    if (!record) return zeroProgress(jobKey);
    if (record.percent < 100 || record.done) return record;

    const locator = await this.backend.locateResult(record);
    if (!locator) return record;

    const healed: ProgressRecord = { ...record, done: true, resultLocator: locator };
    try {
      // Same values from every concurrent reader, so racing heals agree
      await this.backend.write(jobKey, { done: true, resultLocator: locator });
      console.error(`[Ledger] Promoted stalled job ${jobKey} to done (result: ${locator})`);
    } catch (error) {
      console.error(
        `[Ledger] Could not persist promotion of ${jobKey}, will retry on next read: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    return healed;
  }
}
