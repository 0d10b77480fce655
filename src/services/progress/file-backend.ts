/**
 * Local-file progress backend
 *
 * One JSON file per job key. Every write serializes the whole record to a
 * temporary file and renames it over the old one, so a reader in another
 * process sees either the old record or the new one. A patch is merged into
 * the record currently on disk. No lock is taken; a single job runner owns
 * each key.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module services/progress/file-backend
 */

import { promises as fs } from 'fs';
import { join } from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { zeroProgress, type ProgressPatch, type ProgressRecord } from '../../models/progress.js';
import { PersistenceFailureError } from '../jobs/errors.js';
import { definedFields, type ProgressBackend } from './types.js';

/**
 * Where a job's result artifact should be and whether a locator resolves.
 * The filesystem blob sink provides both.
 */
export interface ResultProbe {
  expectedLocator(jobKey: string): string;
  exists(locator: string): Promise<boolean>;
}

const StoredRecordSchema = z.object({
  jobKey: z.string(),
  percent: z.number().int().min(0).max(100).catch(0),
  done: z.boolean().catch(false),
  resultLocator: z.string().nullable().catch(null),
  error: z
    .object({ code: z.string().optional(), message: z.string() })
    .nullable()
    .catch(null),
  partial: z.boolean().catch(false),
});

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileProgressBackend implements ProgressBackend {
  readonly kind = 'file' as const;

  constructor(
    private readonly directory: string,
    private readonly probe: ResultProbe
  ) {}

  async read(jobKey: string): Promise<ProgressRecord | null> {
    let content: string;
    try {
      content = await fs.readFile(this.pathFor(jobKey), 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
    const parsed = StoredRecordSchema.safeParse({ jobKey, ...JSON.parse(content) });
    if (!parsed.success) {
      throw new Error(`Corrupt progress record for ${jobKey}: ${parsed.error.message}`);
    }
    return { ...parsed.data, jobKey };
  }

  async write(jobKey: string, patch: ProgressPatch): Promise<void> {
    // Another process may have advanced the file since this one last wrote it
    const base = await this.readForMerge(jobKey);
    const record: ProgressRecord = { ...base, ...definedFields(patch), jobKey };

    const target = this.pathFor(jobKey);
    const tempPath = `${target}.${process.pid}.${uuidv4()}.tmp`;
    try {
      await fs.mkdir(this.directory, { recursive: true });
      await fs.writeFile(tempPath, JSON.stringify(record), 'utf-8');
      await fs.rename(tempPath, target);
    } catch (error) {
      await fs.rm(tempPath, { force: true }).catch((rmError: unknown) => {
        console.error(
          `[FileBackend] Could not remove ${tempPath}: ${rmError instanceof Error ? rmError.message : String(rmError)}`
        );
      });
      throw new PersistenceFailureError(
        `Failed to persist progress for ${jobKey}: ${error instanceof Error ? error.message : String(error)}`,
        'progress.write',
        { cause: error }
      );
    }
  }

  async locateResult(record: ProgressRecord): Promise<string | null> {
    const candidates = [record.resultLocator, this.probe.expectedLocator(record.jobKey)];
    for (const locator of candidates) {
      if (locator && (await this.probe.exists(locator))) {
        return locator;
      }
    }
    return null;
  }

  private async readForMerge(jobKey: string): Promise<ProgressRecord> {
    try {
      return (await this.read(jobKey)) ?? zeroProgress(jobKey);
    } catch (error) {
      console.error(
        `[FileBackend] Unreadable record for ${jobKey}, rewriting from zero: ${error instanceof Error ? error.message : String(error)}`
      );
      return zeroProgress(jobKey);
    }
  }

  private pathFor(jobKey: string): string {
    return join(this.directory, `${jobKey}.json`);
  }
}
