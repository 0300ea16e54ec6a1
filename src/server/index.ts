/**
 * MCP Server setup
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { AppContext } from '../context.js';
import { registerTools } from './tools/index.js';

export interface ServerOptions {
  name?: string;
  version?: string;
}

export async function createServer(
  context: AppContext,
  options: ServerOptions = {}
): Promise<McpServer> {
  const server = new McpServer({
    name: options.name ?? 'lexiphrase',
    version: options.version ?? '1.0.0',
  });

  registerTools(server, context);

  return server;
}

export async function startStdioServer(
  context: AppContext,
  options: ServerOptions = {}
): Promise<void> {
  const server = await createServer(context, options);
  const transport = new StdioServerTransport();

  await server.connect(transport);

  const shutdown = () => {
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('Shutdown failed:', error instanceof Error ? error.message : String(error));
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

export { registerTools } from './tools/index.js';
