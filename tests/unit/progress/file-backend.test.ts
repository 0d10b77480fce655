/**
 * Unit tests for the local-file progress backend
 *
 * @module tests/unit/progress/file-backend
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { FileProgressBackend, type ResultProbe } from '../../../src/services/progress/file-backend.js';
import { PersistenceFailureError } from '../../../src/services/jobs/errors.js';
import { ProgressLedger } from '../../../src/services/progress/ledger.js';
import { zeroProgress } from '../../../src/models/progress.js';
import { FAST_RETRY } from '../helpers.js';

function probeOver(existing: Set<string>): ResultProbe {
  return {
    expectedLocator: (jobKey) => `${jobKey}_validation_results.csv`,
    exists: async (locator) => existing.has(locator),
  };
}

describe('FileProgressBackend', () => {
  let dir: string;
  let existing: Set<string>;
  let backend: FileProgressBackend;

  beforeEach(async () => {
    dir = await fs.mkdtemp(join(tmpdir(), 'test-progress-'));
    existing = new Set();
    backend = new FileProgressBackend(join(dir, 'progress'), probeOver(existing));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('returns null for a key that was never written', async () => {
    expect(await backend.read('job-1')).toBeNull();
  });

  it('merges partial writes into the stored record', async () => {
    await backend.write('job-1', { percent: 10 });
    await backend.write('job-1', { resultLocator: 'a.csv' });

    expect(await backend.read('job-1')).toEqual({
      ...zeroProgress('job-1'),
      percent: 10,
      resultLocator: 'a.csv',
    });
  });

  it('makes writes visible to another instance on the same directory', async () => {
    await backend.write('job-1', { percent: 55, partial: true });

    const other = new FileProgressBackend(join(dir, 'progress'), probeOver(existing));
    expect(await other.read('job-1')).toMatchObject({ percent: 55, partial: true, done: false });
  });

  it('merges into what another instance wrote since its own last write', async () => {
    const other = new FileProgressBackend(join(dir, 'progress'), probeOver(existing));
    await backend.write('job-1', { percent: 10 });
    await other.write('job-1', { percent: 70 });
    await backend.write('job-1', { resultLocator: 'a.csv' });

    expect(await other.read('job-1')).toEqual({
      ...zeroProgress('job-1'),
      percent: 70,
      resultLocator: 'a.csv',
    });
  });

  it('keeps percent when the ledger heals a record another instance advanced', async () => {
    const ledger = new ProgressLedger(backend, { terminalRetry: FAST_RETRY });
    await ledger.createJob('job-1');
    const worker = new FileProgressBackend(join(dir, 'progress'), probeOver(existing));
    await worker.write('job-1', { percent: 100 });
    existing.add('job-1_validation_results.csv');

    const healed = {
      jobKey: 'job-1',
      percent: 100,
      done: true,
      resultLocator: 'job-1_validation_results.csv',
      error: null,
      partial: false,
    };
    expect(await ledger.getProgress('job-1')).toEqual(healed);
    expect(await ledger.getProgress('job-1')).toEqual(healed);
  });

  it('stores one JSON file per key and leaves no temporary files', async () => {
    await backend.write('job-1', { percent: 10 });
    await backend.write('job-1', { percent: 20 });
    await backend.write('job-2', { percent: 5 });

    const files = (await fs.readdir(join(dir, 'progress'))).sort();
    expect(files).toEqual(['job-1.json', 'job-2.json']);
  });

  it('replaces out-of-range fields with their zero values', async () => {
    await fs.mkdir(join(dir, 'progress'), { recursive: true });
    await fs.writeFile(
      join(dir, 'progress', 'job-1.json'),
      JSON.stringify({ percent: 'abc', done: true, resultLocator: 7, error: null, partial: false })
    );

    expect(await backend.read('job-1')).toEqual({ ...zeroProgress('job-1'), done: true });
  });

  it('rejects a record that is not JSON, and rewrites it from zero on the next write', async () => {
    await fs.mkdir(join(dir, 'progress'), { recursive: true });
    await fs.writeFile(join(dir, 'progress', 'job-1.json'), '{not json');

    await expect(backend.read('job-1')).rejects.toThrow();

    await backend.write('job-1', { percent: 30 });
    expect(await backend.read('job-1')).toEqual({ ...zeroProgress('job-1'), percent: 30 });
  });

  it('raises PersistenceFailureError when the directory cannot be created', async () => {
    const blocker = join(dir, 'blocker');
    await fs.writeFile(blocker, 'not a directory');
    const blocked = new FileProgressBackend(join(blocker, 'progress'), probeOver(existing));

    await expect(blocked.write('job-1', { percent: 10 })).rejects.toBeInstanceOf(PersistenceFailureError);
  });

  describe('locateResult', () => {
    it('prefers the recorded locator when it exists', async () => {
      existing.add('recorded.csv');
      existing.add('job-1_validation_results.csv');

      const record = { ...zeroProgress('job-1'), percent: 100, resultLocator: 'recorded.csv' };
      expect(await backend.locateResult(record)).toBe('recorded.csv');
    });

    it('falls back to the expected artifact locator', async () => {
      existing.add('job-1_validation_results.csv');

      const record = { ...zeroProgress('job-1'), percent: 100, resultLocator: 'gone.csv' };
      expect(await backend.locateResult(record)).toBe('job-1_validation_results.csv');
    });

    it('returns null when nothing is reachable', async () => {
      expect(await backend.locateResult({ ...zeroProgress('job-1'), percent: 100 })).toBeNull();
    });
  });
});
