/**
 * Redis progress backend
 *
 * One hash per job key. The fields of one update are written in a single
 * MULTI/EXEC; reads fetch the whole hash in one HGETALL. When the atomic
 * write fails, each field is written on its own so that the update is not
 * lost, at the cost of a window where the fields are not visible together.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module services/progress/redis-backend
 */

import type { Redis } from 'ioredis';
import { z } from 'zod';
import type { ProgressError, ProgressPatch, ProgressRecord } from '../../models/progress.js';
import { PersistenceFailureError } from '../jobs/errors.js';
import type { ProgressBackend } from './types.js';

/**
 * The hash commands the backend needs
 */
export interface HashStore {
  hgetall(key: string): Promise<Record<string, string>>;
  /** Set several fields in one atomic step */
  hsetAtomic(key: string, fields: Record<string, string>): Promise<void>;
  hsetField(key: string, field: string, value: string): Promise<void>;
}

/**
 * HashStore over an ioredis client
 */
export function ioredisHashStore(client: Redis): HashStore {
  return {
    hgetall: (key) => client.hgetall(key),
    async hsetAtomic(key, fields) {
      const results = await client.multi().hset(key, fields).exec();
      if (!results) {
        throw new Error('MULTI transaction was discarded');
      }
      for (const [error] of results) {
        if (error) throw error;
      }
    },
    async hsetField(key, field, value) {
      await client.hset(key, field, value);
    },
  };
}

const ErrorSchema = z.object({ code: z.string().optional(), message: z.string() });

function encodePatch(patch: ProgressPatch): Record<string, string> {
  const fields: Record<string, string> = {};
  if (patch.percent !== undefined) fields.percent = String(patch.percent);
  if (patch.done !== undefined) fields.done = patch.done ? 'true' : 'false';
  if (patch.resultLocator !== undefined) fields.result_locator = patch.resultLocator ?? '';
  if (patch.error !== undefined) fields.error = patch.error ? JSON.stringify(patch.error) : '';
  if (patch.partial !== undefined) fields.partial = patch.partial ? 'true' : 'false';
  return fields;
}

function decodeError(raw: string | undefined): ProgressError | null {
  if (!raw) return null;
  try {
    const parsed = ErrorSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : { message: raw };
  } catch {
    // Not JSON: keep the text as the message
    return { message: raw };
  }
}

function decodePercent(raw: string | undefined): number {
  const value = Number.parseInt(raw ?? '', 10);
  if (!Number.isFinite(value)) return 0;
  return Math.min(100, Math.max(0, value));
}

function decodeBoolean(raw: string | undefined): boolean {
  return raw === 'true' || raw === '1' || raw === 'True';
}

export interface RedisProgressBackendOptions {
  /** Key prefix for progress hashes (default: 'progress:') */
  keyPrefix: string;
}

export class RedisProgressBackend implements ProgressBackend {
  readonly kind = 'redis' as const;
  private readonly keyPrefix: string;

  constructor(
    private readonly store: HashStore,
    options?: Partial<RedisProgressBackendOptions>
  ) {
    this.keyPrefix = options?.keyPrefix ?? 'progress:';
  }

  async read(jobKey: string): Promise<ProgressRecord | null> {
    const hash = await this.store.hgetall(this.keyFor(jobKey));
    if (Object.keys(hash).length === 0) return null;
    return {
      jobKey,
      percent: decodePercent(hash.percent),
      done: decodeBoolean(hash.done),
      resultLocator: hash.result_locator ? hash.result_locator : null,
      error: decodeError(hash.error),
      partial: decodeBoolean(hash.partial),
    };
  }

  async write(jobKey: string, patch: ProgressPatch): Promise<void> {
    const key = this.keyFor(jobKey);
    const fields = encodePatch(patch);
    if (Object.keys(fields).length === 0) return;

    try {
      await this.store.hsetAtomic(key, fields);
      return;
    } catch (error) {
      console.error(
        `[RedisBackend] Atomic write failed for ${key}, falling back to per-field writes: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    // done goes last so a partial fallback never marks a record finished
    const ordered = Object.entries(fields).sort(
      ([a], [b]) => Number(a === 'done') - Number(b === 'done')
    );
    try {
      for (const [field, value] of ordered) {
        await this.store.hsetField(key, field, value);
      }
    } catch (error) {
      throw new PersistenceFailureError(
        `Failed to persist progress for ${jobKey}: ${error instanceof Error ? error.message : String(error)}`,
        'progress.write',
        { cause: error }
      );
    }
  }

  /**
   * A remote store cannot see the artifact; a recorded locator is enough
   */
  async locateResult(record: ProgressRecord): Promise<string | null> {
    return record.resultLocator ? record.resultLocator : null;
  }

  private keyFor(jobKey: string): string {
    return `${this.keyPrefix}${jobKey}`;
  }
}
