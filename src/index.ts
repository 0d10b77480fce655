/**
 * Document QA Validation MCP Server
 *
 * Entry point for the MCP server using stdio transport.
 * Exposes job submission, progress polling and artifact lookup via JSON-RPC.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module index
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig, loadEnvFile } from './server/config.js';
import { createAppContext } from './server/context.js';
import { registerAllTools } from './server/register-tools.js';
import { validateStartupDependencies } from './server/startup.js';

// =============================================================================
// SERVER INITIALIZATION
// =============================================================================

const envFile = loadEnvFile();
if (envFile) {
  console.error(`[Config] Loaded ${envFile}`);
}

const ctx = createAppContext(loadConfig());

const server = new McpServer({
  name: 'docqa-validator',
  version: '1.0.0',
});

// =============================================================================
// TOOL REGISTRATION
// =============================================================================

const toolCount = registerAllTools(server, ctx);

// =============================================================================
// SERVER STARTUP
// =============================================================================

async function main(): Promise<void> {
  await validateStartupDependencies(ctx.config);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`Document QA Validation MCP Server running on stdio`);
  console.error(`Tools registered: ${toolCount}`);
}

// Graceful shutdown handler
function handleShutdown(signal: string): void {
  console.error(`[Shutdown] Received ${signal}, shutting down gracefully...`);
  server
    .close()
    .then(() => ctx.close())
    .then(() => {
      console.error('[Shutdown] Server closed successfully');
      process.exit(0);
    })
    .catch((err) => {
      console.error(`[Shutdown] Error closing server: ${err}`);
      process.exit(1);
    });
  // Force exit if background jobs do not drain in time
  setTimeout(() => {
    console.error('[Shutdown] Forced exit after timeout');
    process.exit(1);
  }, 30_000).unref();
}

process.on('SIGTERM', () => handleShutdown('SIGTERM'));
process.on('SIGINT', () => handleShutdown('SIGINT'));

main().catch((error) => {
  console.error('Fatal error starting MCP server:', error);
  process.exit(1);
});
