/**
 * Unit tests for input validation schemas and path sanitization
 *
 * @module tests/unit/validation/schemas
 */

import { describe, it, expect } from 'vitest';
import { homedir, tmpdir } from 'os';
import { join, resolve } from 'path';
import {
  QueuedJobSchema,
  ValidateProgressInput,
  ValidateSubmitInput,
  ValidationError,
  expandHome,
  sanitizePath,
  validateInput,
} from '../../../src/utils/validation.js';

describe('validateInput', () => {
  it('should return parsed data', () => {
    expect(validateInput(ValidateSubmitInput, { file_path: '/docs/a.pdf', source_type: 'pdf' })).toEqual({
      file_path: '/docs/a.pdf',
      source_type: 'pdf',
    });
  });

  it('should list every failing path in one message', () => {
    expect(() => validateInput(ValidateSubmitInput, { file_path: '', source_type: 'docx' })).toThrow(
      "file_path: file_path is required; source_type: Invalid enum value. Expected 'pdf' | 'text', received 'docx'"
    );
  });

  it.each(['', 'a/b', 'key with spaces', 'x'.repeat(129)])('should reject job key %j', (jobKey) => {
    expect(() => validateInput(ValidateProgressInput, { job_key: jobKey })).toThrow(ValidationError);
  });

  it('should accept uuid job keys', () => {
    const jobKey = '3f1b2c4d-5e6f-4a7b-8c9d-0e1f2a3b4c5d';
    expect(validateInput(ValidateProgressInput, { job_key: jobKey })).toEqual({ job_key: jobKey });
  });
});

describe('QueuedJobSchema', () => {
  it('should accept every source variant', () => {
    for (const source of [
      { type: 'pdf', path: '/docs/a.pdf' },
      { type: 'text', path: '/docs/a.txt' },
      { type: 'inline', pages: ['one', 'two'] },
    ]) {
      expect(QueuedJobSchema.safeParse({ jobKey: 'job-1', source }).success).toBe(true);
    }
  });

  it('should reject payloads that did not come from a launcher', () => {
    expect(QueuedJobSchema.safeParse({ jobKey: 'job-1', source: { type: 'docx', path: 'x' } }).success).toBe(false);
    expect(QueuedJobSchema.safeParse({ jobKey: '../x', source: { type: 'inline', pages: [] } }).success).toBe(false);
    expect(QueuedJobSchema.safeParse({ source: { type: 'inline', pages: [] } }).success).toBe(false);
  });
});

describe('expandHome', () => {
  it('should expand a leading ~ only', () => {
    expect(expandHome('~')).toBe(homedir());
    expect(expandHome('~/docs')).toBe(join(homedir(), 'docs'));
    expect(expandHome('/srv/~docs')).toBe('/srv/~docs');
  });
});

describe('sanitizePath', () => {
  const base = resolve(tmpdir(), 'qa-inbox');

  it('should resolve paths inside an allowed directory', () => {
    expect(sanitizePath(join(base, 'sub', '..', 'a.pdf'), [base])).toBe(join(base, 'a.pdf'));
  });

  it('should reject traversal out of the allowed directories', () => {
    expect(() => sanitizePath(`${base}/../other/a.pdf`, [base])).toThrow(ValidationError);
  });

  it('should not treat a sibling with a shared prefix as inside', () => {
    expect(() => sanitizePath(`${base}-evil/a.pdf`, [base])).toThrow('is outside allowed directories');
  });

  it('should reject null bytes', () => {
    expect(() => sanitizePath(`${base}/a\0.pdf`, [base])).toThrow('Path contains null bytes');
  });

  it('should fall back to the default directories when none are given', () => {
    const inTmp = join(tmpdir(), 'a.pdf');
    expect(sanitizePath(inTmp, [])).toBe(resolve(inTmp));
  });
});
