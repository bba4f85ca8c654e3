import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerAllTools } from './tools/index.js';
import type { AppConfig } from './config.js';
import { logger } from './utils/index.js';

export function createServer(config: AppConfig): McpServer {
  const server = new McpServer({
    name: 'vcf-tools',
    version: '0.1.0',
  });

  registerAllTools(server, config);

  logger.info('MCP server created, region:', config.region);

  return server;
}
