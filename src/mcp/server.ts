import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { APP_VERSION } from '../config.js';
import { type Services } from '../services.js';
import { registerResourcesAndPrompts } from './resources.js';
import { registerTools } from './tools.js';

export const createMcpServer = (services: Services): McpServer => {
  const server = new McpServer(
    {
      name: 'finance-tracker',
      version: APP_VERSION
    },
    {
      capabilities: { logging: {} }
    }
  );

  registerTools(server, services);
  registerResourcesAndPrompts(server, services);
  return server;
};
