import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Logger } from '../logger.js';

/**
 * Starts the MCP server using stdio transport.
 * Ensures the transport closes cleanly on process signals.
 */
export async function startStdioTransport(server: McpServer, logger: Logger): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.debug('MCP server listening on stdio');

  const shutdown = () => {
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Error closing stdio transport', { error: String(error) });
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
