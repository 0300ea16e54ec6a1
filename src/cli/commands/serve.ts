/**
 * serve command - Start the MCP server
 */

import { Command } from 'commander';
import { createAppContext } from '../../context.js';
import { startStdioServer } from '../../server/index.js';
import { errorMessage, resolveConfig } from '../options.js';

interface ServeCommandOptions {
  config?: string;
}

export const serveCommand = new Command('serve')
  .description('Start the MCP server for word lookup and paraphrasing')
  .option('-c, --config <path>', 'Path to a config file')
  .action(async (options: ServeCommandOptions) => {
    try {
      const config = await resolveConfig(options.config ?? process.env['LEXIPHRASE_CONFIG']);
      const context = await createAppContext(config);

      await startStdioServer(context, {
        name: 'lexiphrase',
        version: '1.0.0',
      });

    } catch (error) {
      // Log to stderr since stdout is used for MCP communication
      console.error('Error starting server:', errorMessage(error));
      process.exit(1);
    }
  });
