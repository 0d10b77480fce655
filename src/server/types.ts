/**
 * Server Type Definitions
 *
 * Tool result envelope and the resolved server configuration.
 *
 * @module server/types
 */

import type { ProgressBackendKind } from '../services/progress/types.js';
import type { LaunchMode } from '../services/jobs/launcher.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL RESULT TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Successful tool result
 */
interface ToolResultSuccess<T = unknown> {
  success: true;
  data: T;
}

/**
 * Helper to create success result
 */
export function successResult<T>(data: T): ToolResultSuccess<T> {
  return { success: true, data };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Server configuration, resolved once at startup
 */
export interface ServerConfig {
  /** Directory of the filesystem blob sink */
  exportsPath: string;

  /** Which ledger backend stores progress records */
  progressBackend: ProgressBackendKind;

  /** Directory of the file ledger backend */
  progressPath: string;

  /** Redis connection for the centralized backend and the job queue */
  redisUrl: string;

  /** How submitted jobs are run */
  launchMode: LaunchMode;

  /** Bull queue name used by the queue launcher and the worker */
  queueName: string;

  /** Pages per checkpointed segment */
  segmentSize: number;

  /** pdftotext binary */
  pdftotextPath: string;

  /** pdfinfo binary */
  pdfinfoPath: string;

  /** Timeout of one external page-text call in milliseconds */
  pageTimeoutMs: number;

  /** Directories submitted files must resolve inside (empty: home, tmp, cwd) */
  allowedDirs: string[];
}
