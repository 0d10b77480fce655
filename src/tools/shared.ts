/**
 * Shared Tool Utilities
 *
 * Common types, formatters, and error handlers used across all tool modules.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/shared
 */

import { z } from 'zod';
import { ToolError, formatErrorResponse } from '../server/errors.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

/** MCP tool response format */
export type ToolResponse = { content: Array<{ type: 'text'; text: string }>; isError?: boolean };

/** Tool handler function signature */
type ToolHandler = (params: Record<string, unknown>) => Promise<ToolResponse>;

/** Tool definition with description, schema, and handler */
export interface ToolDefinition {
  description: string;
  inputSchema: Record<string, z.ZodTypeAny>;
  handler: ToolHandler;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format tool result as MCP content response
 */
export function formatResponse(result: unknown): ToolResponse {
  return { content: [{ type: 'text', text: JSON.stringify(result, null, 2) }] };
}

/**
 * Handle errors uniformly
 */
export function handleError(error: unknown): ToolResponse {
  const toolError = ToolError.fromUnknown(error);
  console.error(`[ERROR] ${toolError.category}: ${toolError.message}`);
  return {
    content: [{ type: 'text', text: JSON.stringify(formatErrorResponse(toolError), null, 2) }],
    isError: true,
  };
}
