/**
 * Shared Startup Validation
 *
 * Checks optional dependencies and prints warnings. Used by both the MCP
 * server (src/index.ts) and the queue worker (src/bin-worker.ts).
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module server/startup
 */

import { isCommandAvailable } from '../services/text/page-source.js';
import { describeConfig } from './config.js';
import type { ServerConfig } from './types.js';

/**
 * Warnings only: a missing PDF binary breaks PDF jobs, not the server.
 *
 * @returns The warnings that were printed
 */
export async function validateStartupDependencies(config: ServerConfig): Promise<string[]> {
  const warnings: string[] = [];

  const [pdftotext, pdfinfo] = await Promise.all([
    isCommandAvailable(config.pdftotextPath),
    isCommandAvailable(config.pdfinfoPath),
  ]);
  if (!pdftotext) {
    warnings.push(
      `${config.pdftotextPath} not found. PDF jobs will fail; install poppler-utils or set PDFTOTEXT_PATH`
    );
  }
  if (!pdfinfo) {
    warnings.push(
      `${config.pdfinfoPath} not found. PDF jobs will fail; install poppler-utils or set PDFINFO_PATH`
    );
  }
  if (config.launchMode === 'sync') {
    warnings.push('DOCQA_LAUNCH_MODE=sync: each submission blocks until its document is processed');
  }

  if (warnings.length > 0) {
    console.error('=== STARTUP WARNINGS ===');
    for (const w of warnings) {
      console.error(`  - ${w}`);
    }
    console.error('========================');
  }

  console.error(`[Config] ${describeConfig(config)}`);
  return warnings;
}
