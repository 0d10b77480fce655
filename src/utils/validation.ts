/**
 * Zod Validation Schemas
 *
 * Input validation for every tool and for the process environment.
 * Each schema carries its constraints, descriptive messages, and defaults.
 *
 * @module utils/validation
 */

import { z } from 'zod';
import * as path from 'path';
import { homedir, tmpdir } from 'os';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Custom validation error with descriptive message
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @param schema - Zod schema to validate against
 * @param input - Input value to validate
 * @returns Validated and typed input data
 * @throws ValidationError listing every failing path
 */
export function validateInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const where = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${where}${e.message}`;
    });
    throw new ValidationError(errors.join('; '));
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED BASE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Job keys are uuid v4 strings in practice; anything matching the
 * filename-safe pattern is accepted.
 */
export const JobKey = z
  .string()
  .min(1, 'job_key is required')
  .max(128, 'job_key must be at most 128 characters')
  .regex(/^[A-Za-z0-9_-]+$/, 'job_key may only contain letters, digits, "_" and "-"');

export const SourceType = z.enum(['pdf', 'text']);

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL INPUT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const ValidateSubmitInput = z.object({
  file_path: z.string().min(1, 'file_path is required'),
  source_type: SourceType.optional(),
});

export const ValidateProgressInput = z.object({
  job_key: JobKey,
});

export const ValidateArtifactsInput = z.object({
  job_key: JobKey,
});

export const HealthCheckInput = z.object({});

// ═══════════════════════════════════════════════════════════════════════════════
// ENVIRONMENT SCHEMA
// ═══════════════════════════════════════════════════════════════════════════════

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.trim() === '' ? undefined : v.trim()));

/** Expands a leading "~" to the home directory */
export function expandHome(p: string): string {
  if (p === '~') return homedir();
  if (p.startsWith('~/')) return path.join(homedir(), p.slice(2));
  return p;
}

const dirWithDefault = (fallback: string) =>
  optionalString.transform((v) => path.resolve(expandHome(v ?? fallback)));

const intWithDefault = (fallback: number, min: number) =>
  optionalString.pipe(
    z
      .string()
      .regex(/^\d+$/, 'must be a non-negative integer')
      .transform(Number)
      .pipe(z.number().int().min(min))
      .optional()
      .transform((v) => v ?? fallback)
  );

/**
 * Process environment, parsed once at startup into ServerConfig fields.
 * Blank values count as unset.
 */
export const EnvSchema = z.object({
  DOCQA_EXPORTS_PATH: dirWithDefault('~/.docqa/exports'),
  DOCQA_PROGRESS_BACKEND: optionalString.pipe(
    z.enum(['file', 'redis']).default('file')
  ),
  DOCQA_PROGRESS_PATH: dirWithDefault('~/.docqa/progress'),
  REDIS_URL: optionalString.pipe(
    z
      .string()
      .regex(/^rediss?:\/\//, 'must start with redis:// or rediss://')
      .optional()
      .transform((v) => v ?? 'redis://localhost:6379/0')
  ),
  DOCQA_LAUNCH_MODE: optionalString.pipe(
    z.enum(['sync', 'background', 'queue']).default('background')
  ),
  DOCQA_QUEUE_NAME: optionalString.transform((v) => v ?? 'docqa-validation'),
  PAGE_SEGMENT_SIZE: intWithDefault(4, 1),
  PDFTOTEXT_PATH: optionalString.transform((v) => v ?? 'pdftotext'),
  PDFINFO_PATH: optionalString.transform((v) => v ?? 'pdfinfo'),
  DOCQA_PAGE_TIMEOUT_MS: intWithDefault(30_000, 1),
  DOCQA_ALLOWED_DIRS: optionalString.transform((v) =>
    v
      ? v
          .split(',')
          .map((d) => d.trim())
          .filter((d) => d.length > 0)
          .map((d) => path.resolve(expandHome(d)))
      : []
  ),
});

export type ParsedEnv = z.output<typeof EnvSchema>;

// ═══════════════════════════════════════════════════════════════════════════════
// PATH SANITIZATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Directories a submitted path may live in when no explicit list is given
 */
export function defaultAllowedBaseDirs(): string[] {
  return [path.resolve(homedir()), path.resolve(tmpdir()), path.resolve(process.cwd())];
}

/**
 * Resolve a user-supplied file path and reject traversal outside the
 * allowed directories.
 *
 * @returns The resolved path
 * @throws ValidationError if the path contains null bytes or escapes allowed directories
 */
export function sanitizePath(filePath: string, allowedBaseDirs?: readonly string[]): string {
  if (filePath.includes('\0')) {
    throw new ValidationError('Path contains null bytes');
  }

  const resolved = path.resolve(expandHome(filePath));
  const baseDirs =
    allowedBaseDirs && allowedBaseDirs.length > 0 ? allowedBaseDirs : defaultAllowedBaseDirs();

  const resolvedBases = baseDirs.map((d) => path.resolve(d));
  const withinAllowed = resolvedBases.some(
    (base) => resolved === base || resolved.startsWith(base + path.sep)
  );
  if (!withinAllowed) {
    throw new ValidationError(
      `Path "${resolved}" is outside allowed directories: ${resolvedBases.join(', ')}. ` +
        `To allow this path, set the DOCQA_ALLOWED_DIRS environment variable ` +
        `(comma-separated list of directories).`
    );
  }

  return resolved;
}

// ═══════════════════════════════════════════════════════════════════════════════
// QUEUE PAYLOAD SCHEMA
// ═══════════════════════════════════════════════════════════════════════════════

export const PageSourceSpecSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('pdf'), path: z.string().min(1) }),
  z.object({ type: z.literal('text'), path: z.string().min(1) }),
  z.object({ type: z.literal('inline'), pages: z.array(z.string()) }),
]);

/**
 * Payload of one queued validation job, checked again by the worker since
 * it crossed Redis as JSON
 */
export const QueuedJobSchema = z.object({
  jobKey: JobKey,
  source: PageSourceSpecSchema,
});
