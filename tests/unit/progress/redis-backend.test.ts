/**
 * Unit tests for the Redis progress backend, over an in-process hash store
 *
 * @module tests/unit/progress/redis-backend
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { RedisProgressBackend, type HashStore } from '../../../src/services/progress/redis-backend.js';
import { PersistenceFailureError } from '../../../src/services/jobs/errors.js';
import { ProgressLedger } from '../../../src/services/progress/ledger.js';
import { zeroProgress } from '../../../src/models/progress.js';
import { FAST_RETRY } from '../helpers.js';

class FakeHashStore implements HashStore {
  readonly hashes = new Map<string, Record<string, string>>();
  atomicFails = false;
  fieldFails = false;
  fieldWrites = 0;
  /** Fail the field write made after this many successful ones, once */
  failFieldAfter: number | null = null;

  async hgetall(key: string): Promise<Record<string, string>> {
    return { ...(this.hashes.get(key) ?? {}) };
  }

  async hsetAtomic(key: string, fields: Record<string, string>): Promise<void> {
    if (this.atomicFails) throw new Error('EXECABORT');
    this.hashes.set(key, { ...(this.hashes.get(key) ?? {}), ...fields });
  }

  async hsetField(key: string, field: string, value: string): Promise<void> {
    if (this.fieldFails) throw new Error('connection lost');
    if (this.failFieldAfter !== null && this.fieldWrites >= this.failFieldAfter) {
      this.failFieldAfter = null;
      throw new Error('connection lost');
    }
    this.fieldWrites++;
    this.hashes.set(key, { ...(this.hashes.get(key) ?? {}), [field]: value });
  }
}

describe('RedisProgressBackend', () => {
  let store: FakeHashStore;
  let backend: RedisProgressBackend;

  beforeEach(() => {
    store = new FakeHashStore();
    backend = new RedisProgressBackend(store);
  });

  it('stores each job under a prefixed hash with string fields', async () => {
    await backend.write('job-1', {
      percent: 100,
      done: true,
      resultLocator: 'job-1_validation_results.csv',
      error: null,
      partial: false,
    });

    expect(store.hashes.get('progress:job-1')).toEqual({
      percent: '100',
      done: 'true',
      result_locator: 'job-1_validation_results.csv',
      error: '',
      partial: 'false',
    });
  });

  it('honors a custom key prefix', async () => {
    const custom = new RedisProgressBackend(store, { keyPrefix: 'qa:' });
    await custom.write('job-1', { percent: 5 });
    expect(store.hashes.has('qa:job-1')).toBe(true);
  });

  it('reads back what it wrote', async () => {
    const error = { code: 'EXTRACTION_FAILURE', message: 'bad page' };
    await backend.write('job-1', { percent: 100, done: true, resultLocator: 'err.csv', error });

    expect(await backend.read('job-1')).toEqual({
      jobKey: 'job-1',
      percent: 100,
      done: true,
      resultLocator: 'err.csv',
      error,
      partial: false,
    });
  });

  it('returns null for an absent hash', async () => {
    expect(await backend.read('job-1')).toBeNull();
  });

  it('skips empty patches', async () => {
    await backend.write('job-1', {});
    expect(store.hashes.size).toBe(0);
  });

  it('decodes hand-written fields leniently', async () => {
    store.hashes.set('progress:job-1', {
      percent: 'abc',
      done: '1',
      result_locator: '',
      error: 'disk full',
      partial: 'True',
    });

    expect(await backend.read('job-1')).toEqual({
      jobKey: 'job-1',
      percent: 0,
      done: true,
      resultLocator: null,
      error: { message: 'disk full' },
      partial: true,
    });
  });

  it('bounds a stored percent to 0..100', async () => {
    store.hashes.set('progress:job-1', { percent: '250' });
    expect((await backend.read('job-1'))?.percent).toBe(100);
  });

  it('falls back to per-field writes when the atomic write fails', async () => {
    store.atomicFails = true;

    await backend.write('job-1', { percent: 40, partial: true });

    expect(store.fieldWrites).toBe(2);
    expect(await backend.read('job-1')).toEqual({
      ...zeroProgress('job-1'),
      percent: 40,
      partial: true,
    });
  });

  it('raises PersistenceFailureError when both write paths fail', async () => {
    store.atomicFails = true;
    store.fieldFails = true;

    await expect(backend.write('job-1', { percent: 40 })).rejects.toBeInstanceOf(PersistenceFailureError);
  });

  it('writes done last when falling back to per-field writes', async () => {
    store.hashes.set('progress:job-1', { percent: '60', done: 'false' });
    store.atomicFails = true;
    store.failFieldAfter = 2;

    await expect(
      backend.write('job-1', {
        percent: 100,
        resultLocator: 'job-1_validation_summary.csv',
        error: null,
        partial: false,
        done: true,
      })
    ).rejects.toBeInstanceOf(PersistenceFailureError);

    expect(store.hashes.get('progress:job-1')).toEqual({
      percent: '100',
      done: 'false',
      result_locator: 'job-1_validation_summary.csv',
    });
  });

  it('finishes a job on retry after a per-field write breaks off', async () => {
    const ledger = new ProgressLedger(backend, { terminalRetry: FAST_RETRY });
    await ledger.createJob('job-1');
    store.atomicFails = true;
    store.failFieldAfter = store.fieldWrites + 2;

    expect(await ledger.complete('job-1', 'job-1_validation_summary.csv')).toBe(true);
    expect(await ledger.getProgress('job-1')).toEqual({
      jobKey: 'job-1',
      percent: 100,
      done: true,
      resultLocator: 'job-1_validation_summary.csv',
      error: null,
      partial: false,
    });
  });

  it('locates a result only through the recorded locator', async () => {
    expect(await backend.locateResult({ ...zeroProgress('job-1'), percent: 100 })).toBeNull();
    expect(
      await backend.locateResult({ ...zeroProgress('job-1'), percent: 100, resultLocator: 'r.csv' })
    ).toBe('r.csv');
  });
});
