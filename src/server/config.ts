/**
 * Configuration Loading
 *
 * Parses the process environment once into a ServerConfig. Invalid values
 * stop startup with a CONFIGURATION_ERROR naming every bad variable.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module server/config
 */

import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { EnvSchema, ValidationError, validateInput, type ParsedEnv } from '../utils/validation.js';
import { configurationError } from './errors.js';
import type { ServerConfig } from './types.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * Load .env from the first candidate that exists:
 * 1. DOCQA_ENV_FILE (explicit override)
 * 2. CWD/.env (project-local)
 * 3. Package root/.env (development)
 *
 * @returns The file that was loaded, or null
 */
export function loadEnvFile(): string | null {
  const envCandidates = [
    process.env.DOCQA_ENV_FILE,
    path.resolve(process.cwd(), '.env'),
    path.resolve(__dirname, '..', '..', '.env'),
  ].filter((p): p is string => typeof p === 'string' && p.length > 0);

  for (const envPath of envCandidates) {
    if (fs.existsSync(envPath)) {
      dotenv.config({ path: envPath, quiet: true });
      return envPath;
    }
  }
  return null;
}

function parseEnv(env: NodeJS.ProcessEnv): ParsedEnv {
  try {
    return validateInput(EnvSchema, env);
  } catch (error) {
    if (error instanceof ValidationError) {
      throw configurationError(`Invalid configuration: ${error.message}`);
    }
    throw error;
  }
}

/**
 * Resolve configuration from environment variables
 *
 * @throws ToolError (CONFIGURATION_ERROR) when a variable is invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = parseEnv(env);

  return {
    exportsPath: parsed.DOCQA_EXPORTS_PATH,
    progressBackend: parsed.DOCQA_PROGRESS_BACKEND,
    progressPath: parsed.DOCQA_PROGRESS_PATH,
    redisUrl: parsed.REDIS_URL,
    launchMode: parsed.DOCQA_LAUNCH_MODE,
    queueName: parsed.DOCQA_QUEUE_NAME,
    segmentSize: parsed.PAGE_SEGMENT_SIZE,
    pdftotextPath: parsed.PDFTOTEXT_PATH,
    pdfinfoPath: parsed.PDFINFO_PATH,
    pageTimeoutMs: parsed.DOCQA_PAGE_TIMEOUT_MS,
    allowedDirs: parsed.DOCQA_ALLOWED_DIRS,
  };
}

/**
 * One-line description of the active configuration for the startup log
 */
export function describeConfig(config: ServerConfig): string {
  return (
    `backend=${config.progressBackend} launch=${config.launchMode} ` +
    `segment_size=${config.segmentSize} exports=${config.exportsPath}`
  );
}
