#!/usr/bin/env node

import { Command } from 'commander';
import { loadConfig, type HlConfig } from './config.js';
import { HighlightsDatabase } from './database.js';
import { aiAuthor } from './entry.js';
import { describeError } from './errors.js';
import { installServer, uninstallServer } from './install.js';
import { createLogger } from './logger.js';
import { createHighlightsServer } from './server.js';
import { startStdioTransport } from './transports/stdio.js';
import { startHttpTransport } from './transports/http.js';

interface ServeOptions {
  mode: string;
  dbPath: string;
  port: string;
  agent: string;
}

let config: HlConfig;
try {
  config = loadConfig();
} catch (error) {
  console.error(describeError(error));
  process.exit(1);
}
const logger = createLogger(config.debug, '[hl-mcp]');

const program = new Command();

program
  .name('hl-mcp')
  .description('MCP server exposing the hl highlight store to AI agents')
  .version('1.0.0');

program
  .command('serve')
  .description('Run the MCP server (started by the agent host)')
  .option('--mode <mode>', 'Transport mode (stdio|http)', process.env.HL_MCP_MODE || 'stdio')
  .option('--db-path <path>', 'Database file path', config.dbPath)
  .option('--port <number>', 'HTTP port (only for http mode)', process.env.HL_MCP_PORT || '3000')
  .option('--agent <name>', 'Agent name recorded as ai:<name>', config.agentName)
  .action(async (options: ServeOptions) => {
    const { mode } = options;

    if (mode !== 'stdio' && mode !== 'http') {
      console.error('Error: --mode must be either "stdio" or "http"');
      process.exit(1);
    }

    try {
      aiAuthor(options.agent);

      // Initialize database
      const db = new HighlightsDatabase(options.dbPath, { busyTimeoutMs: config.busyTimeoutMs });
      process.on('exit', () => db.close());

      const serverOptions = { agentName: options.agent, busyRetries: config.busyRetries, logger };

      // Start appropriate transport
      if (mode === 'stdio') {
        await startStdioTransport(createHighlightsServer(db, serverOptions), logger);
      } else {
        const port = parseInt(options.port, 10);
        if (Number.isNaN(port) || port < 1 || port > 65535) {
          console.error('Error: --port must be a valid port number (1-65535)');
          process.exit(1);
        }
        await startHttpTransport(() => createHighlightsServer(db, serverOptions), port, logger);
      }
    } catch (error) {
      console.error(`Error starting server: ${describeError(error)}`);
      process.exit(1);
    }
  });

program
  .command('install')
  .description('Register the hl MCP server in ./.mcp.json')
  .action(() => {
    const path = installServer();
    console.log(`Registered hl MCP server in ${path}`);
    console.log('  Restart your agent host to activate.');
  });

program
  .command('uninstall')
  .description('Remove the hl MCP server from ./.mcp.json')
  .action(() => {
    if (uninstallServer()) {
      console.log('Removed hl MCP server registration.');
    } else {
      console.log('hl MCP server not registered.');
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error(describeError(error));
  process.exit(1);
});
