import cors from 'cors';
import { type Express } from 'express';
import { createMcpExpressApp } from '@modelcontextprotocol/sdk/server/express.js';
import { errorHandler, notFoundHandler, requestLogger } from './api/middleware.js';
import { createApiRouter } from './api/routes.js';
import { createMcpHttpEndpoint, type McpHttpEndpoint } from './mcp/http.js';
import { createMcpServer } from './mcp/server.js';
import { type Services } from './services.js';

export interface FinanceApp {
  app: Express
  mcp: McpHttpEndpoint
}

export interface AppOptions {
  /**
   * Interface the server binds to. Loopback hosts get Host-header validation
   * from the MCP SDK; any other host accepts every Host header.
   */
  host?: string
}

/**
 * Express app serving the REST API under /api and the MCP endpoint under /mcp.
 */
export const createApp = (services: Services, { host = '127.0.0.1' }: AppOptions = {}): FinanceApp => {
  const app = createMcpExpressApp({ host });
  const mcp = createMcpHttpEndpoint(() => createMcpServer(services));

  app.use(cors({ exposedHeaders: ['mcp-session-id'] }));
  app.use(requestLogger);
  app.use('/api', createApiRouter(services));
  app.use('/mcp', mcp.router);
  app.use(notFoundHandler);
  app.use(errorHandler);

  return { app, mcp };
};
