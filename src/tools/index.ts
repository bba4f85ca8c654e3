import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppConfig } from '../config.js';
import { registerProcessTool } from './process.js';
import { registerListTool } from './list.js';
import { registerDeleteTool } from './delete.js';

export function registerAllTools(server: McpServer, config: AppConfig): void {
  registerProcessTool(server, config);
  registerListTool(server);
  registerDeleteTool(server, config);
}
