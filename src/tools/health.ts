/**
 * Health Check MCP Tools
 *
 * Tools: qa_health_check
 *
 * Reports the active configuration and whether the PDF text binaries can
 * be spawned.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/health
 */

import type { AppContext } from '../server/context.js';
import { successResult } from '../server/types.js';
import { isCommandAvailable } from '../services/text/page-source.js';
import { HealthCheckInput, validateInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

export function createHealthTools(ctx: AppContext): Record<string, ToolDefinition> {
  async function handleHealthCheck(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      validateInput(HealthCheckInput, params);
      const { config } = ctx;

      const [pdftotext, pdfinfo] = await Promise.all([
        isCommandAvailable(config.pdftotextPath),
        isCommandAvailable(config.pdfinfoPath),
      ]);

      const nextSteps: Array<{ tool: string; description: string }> = [];
      if (!pdftotext || !pdfinfo) {
        nextSteps.push({
          tool: 'qa_validate_submit',
          description:
            'PDF submissions will fail with DEPENDENCY_UNAVAILABLE; submit .txt files or install poppler-utils',
        });
      }

      return formatResponse(
        successResult({
          progress_backend: ctx.ledger.backendKind,
          launch_mode: ctx.launcher.mode,
          segment_size: ctx.driver.getSegmentSize(),
          exports_path: ctx.sink.getBasePath(),
          dependencies: {
            pdftotext: { path: config.pdftotextPath, available: pdftotext },
            pdfinfo: { path: config.pdfinfoPath, available: pdfinfo },
          },
          next_steps: nextSteps,
        })
      );
    } catch (error) {
      return handleError(error);
    }
  }

  return {
    qa_health_check: {
      description:
        'Report progress backend, launch mode, segment size, and whether the PDF text dependency is installed.',
      inputSchema: HealthCheckInput.shape,
      handler: handleHealthCheck,
    },
  };
}
