/**
 * Shared Tool Registration
 *
 * Registers all MCP tools on a given McpServer instance.
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module server/register-tools
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ToolDefinition } from '../tools/shared.js';
import type { AppContext } from './context.js';
import { createJobTools } from '../tools/jobs.js';
import { createHealthTools } from '../tools/health.js';

/**
 * Every tool module, in registration order
 */
export function buildToolModules(ctx: AppContext): Record<string, ToolDefinition>[] {
  return [createJobTools(ctx), createHealthTools(ctx)];
}

/**
 * Register all tools on the given MCP server instance.
 *
 * @returns Number of tools registered
 * @throws Error if two modules define the same tool name
 */
export function registerAllTools(server: McpServer, ctx: AppContext): number {
  const registeredToolNames = new Set<string>();
  let toolCount = 0;

  for (const toolModule of buildToolModules(ctx)) {
    for (const [name, tool] of Object.entries(toolModule)) {
      if (registeredToolNames.has(name)) {
        throw new Error(`Duplicate tool name detected: "${name}". Each tool must have a unique name.`);
      }
      registeredToolNames.add(name);
      server.tool(
        name,
        tool.description,
        tool.inputSchema as Record<string, unknown>,
        tool.handler
      );
      toolCount++;
    }
  }

  return toolCount;
}
