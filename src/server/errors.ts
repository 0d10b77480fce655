/**
 * Tool Error Handling
 *
 * Every tool failure becomes a ToolError with a category, and every category
 * carries a recovery hint naming the tool to call next.
 *
 * @module server/errors
 */

import { ValidationError } from '../utils/validation.js';
import { JobError } from '../services/jobs/errors.js';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

export type ErrorCategory =
  // Input
  | 'VALIDATION_ERROR'
  | 'PATH_NOT_FOUND'

  // Jobs
  | 'JOB_NOT_FOUND'

  // Job faults, mirrored from JobError categories
  | 'DEPENDENCY_UNAVAILABLE'
  | 'EXTRACTION_FAILURE'
  | 'PERSISTENCE_FAILURE'

  // Setup
  | 'CONFIGURATION_ERROR'

  | 'INTERNAL_ERROR';

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class ToolError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ToolError';
    this.category = category;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ToolError);
    }
  }

  /**
   * Create error from unknown caught value
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): ToolError {
    if (error instanceof ToolError) {
      return error;
    }

    if (error instanceof ValidationError) {
      return new ToolError('VALIDATION_ERROR', error.message);
    }

    if (error instanceof JobError) {
      return new ToolError(error.category, error.message, {
        originalName: error.name,
        stack: error.stack,
      });
    }

    if (error instanceof Error) {
      return new ToolError(defaultCategory, error.message, {
        originalName: error.name,
        stack: error.stack,
      });
    }

    return new ToolError(defaultCategory, String(error), {
      originalValue: error,
    });
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
      stack: this.stack,
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// RECOVERY HINTS
// ═══════════════════════════════════════════════════════════════════════════════

export interface RecoveryHint {
  tool: string;
  hint: string;
}

const RECOVERY_HINTS: Record<ErrorCategory, RecoveryHint> = {
  VALIDATION_ERROR: { tool: 'qa_validate_submit', hint: 'Check parameter types and required fields' },
  PATH_NOT_FOUND: {
    tool: 'qa_validate_submit',
    hint: 'Verify the file path exists and lies inside DOCQA_ALLOWED_DIRS',
  },
  JOB_NOT_FOUND: {
    tool: 'qa_validate_progress',
    hint: 'Poll qa_validate_progress until done is true before fetching artifacts',
  },
  DEPENDENCY_UNAVAILABLE: {
    tool: 'qa_health_check',
    hint: 'Install poppler-utils or set PDFTOTEXT_PATH and PDFINFO_PATH',
  },
  EXTRACTION_FAILURE: {
    tool: 'qa_validate_submit',
    hint: 'The document could not be read; check that it is a text PDF or form-feed text file',
  },
  PERSISTENCE_FAILURE: {
    tool: 'qa_health_check',
    hint: 'Check that DOCQA_EXPORTS_PATH and DOCQA_PROGRESS_PATH are writable, or that Redis is reachable',
  },
  CONFIGURATION_ERROR: {
    tool: 'qa_health_check',
    hint: 'Check environment variable configuration (DOCQA_*, REDIS_URL, PAGE_SEGMENT_SIZE)',
  },
  INTERNAL_ERROR: { tool: 'qa_health_check', hint: 'Run qa_health_check for diagnostics' },
};

export function getRecoveryHint(category: ErrorCategory): RecoveryHint {
  return RECOVERY_HINTS[category];
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format ToolError for tool response
 * ALWAYS includes category, message, recovery hint, and optional details.
 */
export function formatErrorResponse(error: ToolError): {
  success: false;
  error: {
    category: ErrorCategory;
    message: string;
    recovery: RecoveryHint;
    details?: Record<string, unknown>;
  };
} {
  return {
    success: false,
    error: {
      category: error.category,
      message: error.message,
      recovery: RECOVERY_HINTS[error.category],
      details: error.details,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export function validationError(message: string, details?: Record<string, unknown>): ToolError {
  return new ToolError('VALIDATION_ERROR', message, details);
}

export function configurationError(message: string, details?: Record<string, unknown>): ToolError {
  return new ToolError('CONFIGURATION_ERROR', message, details);
}

export function pathNotFoundError(path: string): ToolError {
  return new ToolError('PATH_NOT_FOUND', `Path does not exist: ${path}`, {
    path,
  });
}

/**
 * Artifacts were requested for a job that has not finished successfully
 */
export function jobNotFoundError(jobKey: string, reason: string): ToolError {
  return new ToolError('JOB_NOT_FOUND', `No artifacts for job ${jobKey}: ${reason}`, {
    jobKey,
  });
}
