/**
 * Progress backend contract
 *
 * Two interchangeable stores sit behind the ledger: a centralized Redis hash
 * per job and a local JSON file per job. The variant is chosen once, from
 * configuration, when the process starts.
 *
 * @module services/progress/types
 */

import type { ProgressPatch, ProgressRecord } from '../../models/progress.js';

export type ProgressBackendKind = 'file' | 'redis';

export interface ProgressBackend {
  readonly kind: ProgressBackendKind;

  /** Current record, or null when the key has never been written */
  read(jobKey: string): Promise<ProgressRecord | null>;

  /**
   * Apply a partial update. Fields left undefined in the patch are unchanged.
   * @throws PersistenceFailureError when nothing could be stored
   */
  write(jobKey: string, patch: ProgressPatch): Promise<void>;

  /**
   * Locator of a reachable result artifact for a record stuck at 100% but
   * not done, or null when none is reachable.
   */
  locateResult(record: ProgressRecord): Promise<string | null>;
}

/**
 * Drop undefined fields so that spreading a patch never clears a value
 */
export function definedFields(patch: ProgressPatch): ProgressPatch {
  const out: ProgressPatch = {};
  if (patch.percent !== undefined) out.percent = patch.percent;
  if (patch.resultLocator !== undefined) out.resultLocator = patch.resultLocator;
  if (patch.done !== undefined) out.done = patch.done;
  if (patch.error !== undefined) out.error = patch.error;
  if (patch.partial !== undefined) out.partial = patch.partial;
  return out;
}
