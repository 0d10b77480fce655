/**
 * Validation Job MCP Tools
 *
 * Tools: qa_validate_submit, qa_validate_progress, qa_validate_artifacts
 *
 * Submit a document, poll its progress record, then fetch the artifact
 * locators once the record is done.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/jobs
 */

import { promises as fs } from 'fs';
import path from 'path';
import type { AppContext } from '../server/context.js';
import { jobNotFoundError, pathNotFoundError } from '../server/errors.js';
import { successResult } from '../server/types.js';
import {
  ValidateArtifactsInput,
  ValidateProgressInput,
  ValidateSubmitInput,
  sanitizePath,
  validateInput,
} from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

/**
 * PDFs go through pdftotext; anything else is read as form-feed separated text
 */
export function inferSourceType(filePath: string): 'pdf' | 'text' {
  return path.extname(filePath).toLowerCase() === '.pdf' ? 'pdf' : 'text';
}

async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return false;
    throw error;
  }
}

export function createJobTools(ctx: AppContext): Record<string, ToolDefinition> {
  // ═════════════════════════════════════════════════════════════════════════════
  // HANDLER: qa_validate_submit
  // ═════════════════════════════════════════════════════════════════════════════

  async function handleSubmit(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(ValidateSubmitInput, params);
      const filePath = sanitizePath(input.file_path, ctx.config.allowedDirs);
      if (!(await isRegularFile(filePath))) {
        throw pathNotFoundError(filePath);
      }

      const sourceType = input.source_type ?? inferSourceType(filePath);
      const { jobKey } = await ctx.service.submit({ type: sourceType, path: filePath });
      console.error(`[Jobs] Submitted ${filePath} as job ${jobKey}`);

      return formatResponse(
        successResult({
          job_key: jobKey,
          source_type: sourceType,
          launch_mode: ctx.launcher.mode,
          next_steps: [{ tool: 'qa_validate_progress', description: 'Poll until done is true' }],
        })
      );
    } catch (error) {
      return handleError(error);
    }
  }

  // ═════════════════════════════════════════════════════════════════════════════
  // HANDLER: qa_validate_progress
  // ═════════════════════════════════════════════════════════════════════════════

  async function handleProgress(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(ValidateProgressInput, params);
      const record = await ctx.service.poll(input.job_key);

      return formatResponse(
        successResult({
          job_key: record.jobKey,
          percent: record.percent,
          done: record.done,
          result_locator: record.resultLocator,
          error: record.error,
          partial: record.partial,
        })
      );
    } catch (error) {
      return handleError(error);
    }
  }

  // ═════════════════════════════════════════════════════════════════════════════
  // HANDLER: qa_validate_artifacts
  // ═════════════════════════════════════════════════════════════════════════════

  async function handleArtifacts(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(ValidateArtifactsInput, params);
      const record = await ctx.service.poll(input.job_key);
      if (!record.done) {
        throw jobNotFoundError(input.job_key, `job is not done (${record.percent}%)`);
      }

      const basePath = ctx.sink.getBasePath();
      const locate = (locator: string | null) => ({
        locator,
        path: locator ? path.join(basePath, locator) : null,
      });

      if (record.error) {
        return formatResponse(
          successResult({
            job_key: record.jobKey,
            status: 'failed',
            error: record.error,
            error_artifact: locate(record.resultLocator),
          })
        );
      }

      return formatResponse(
        successResult({
          job_key: record.jobKey,
          status: 'completed',
          partial: record.partial,
          result: locate(record.resultLocator),
          summary: locate(ctx.sink.locatorFor(record.jobKey, 'summary')),
          anomalies: locate(ctx.sink.locatorFor(record.jobKey, 'anomalies')),
        })
      );
    } catch (error) {
      return handleError(error);
    }
  }

  // ═════════════════════════════════════════════════════════════════════════════
  // TOOL DEFINITIONS EXPORT
  // ═════════════════════════════════════════════════════════════════════════════

  return {
    qa_validate_submit: {
      description:
        '[ESSENTIAL] Submit a PDF or form-feed separated text document for field extraction and validation. Returns a job_key to poll.',
      inputSchema: ValidateSubmitInput.shape,
      handler: handleSubmit,
    },
    qa_validate_progress: {
      description:
        '[ESSENTIAL] Progress of a validation job: percent, done, result_locator, error. Unknown keys report 0%.',
      inputSchema: ValidateProgressInput.shape,
      handler: handleProgress,
    },
    qa_validate_artifacts: {
      description:
        'Artifact locators of a finished job: per-page results, field summary, and anomaly report (or the error artifact on failure).',
      inputSchema: ValidateArtifactsInput.shape,
      handler: handleArtifacts,
    },
  };
}
