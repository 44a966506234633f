import { Router, type Request, type Response } from 'express';
import { randomUUID } from 'node:crypto';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { isInitializeRequest } from '@modelcontextprotocol/sdk/types.js';
import { logger } from '../logger.js';
import { InMemoryEventStore } from './inMemoryEventStore.js';

export interface McpHttpEndpoint {
  router: Router
  sessionCount: () => number
  close: () => Promise<void>
}

const sessionIdOf = (req: Request): string | undefined => {
  const header = req.headers['mcp-session-id'];
  const value = Array.isArray(header) ? header[0] : header;
  return value === undefined || value === '' ? undefined : value;
};

const jsonRpcError = (res: Response, status: number, code: number, message: string): void => {
  res.status(status).json({ jsonrpc: '2.0', error: { code, message }, id: null });
};

/**
 * Streamable-HTTP MCP endpoint with one transport and server per session.
 * Mount the router at the path clients connect to.
 */
export const createMcpHttpEndpoint = (getServer: () => McpServer): McpHttpEndpoint => {
  const transports = new Map<string, StreamableHTTPServerTransport>();

  const postHandler = async (req: Request, res: Response): Promise<void> => {
    const sessionId = sessionIdOf(req);
    try {
      if (sessionId !== undefined) {
        logger.debug('Received MCP request', { sessionId });
        const existing = transports.get(sessionId);
        if (existing === undefined) {
          jsonRpcError(res, 404, -32001, 'Session not found');
          return;
        }
        await existing.handleRequest(req, res, req.body);
        return;
      }

      if (!isInitializeRequest(req.body)) {
        jsonRpcError(res, 400, -32000, 'Bad Request: No valid session ID provided');
        return;
      }

      const eventStore = new InMemoryEventStore();
      const transport = new StreamableHTTPServerTransport({
        sessionIdGenerator: () => randomUUID(),
        eventStore,
        onsessioninitialized: (sid: string) => {
          logger.info('MCP session initialized', { sessionId: sid });
          transports.set(sid, transport);
        }
      });
      transport.onclose = () => {
        eventStore.clear();
        const sid = transport.sessionId;
        if (sid !== undefined && transports.delete(sid)) {
          logger.info('MCP transport closed', { sessionId: sid });
        }
      };

      await getServer().connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      logger.error('Error handling MCP request', { error: String(error) });
      if (!res.headersSent) {
        jsonRpcError(res, 500, -32603, 'Internal server error');
      }
    }
  };

  // GET opens the SSE stream, DELETE ends the session.
  const sessionHandler = async (req: Request, res: Response): Promise<void> => {
    const sessionId = sessionIdOf(req);
    const transport = sessionId === undefined ? undefined : transports.get(sessionId);
    if (transport === undefined) {
      res.status(400).send('Invalid or missing session ID');
      return;
    }
    if (req.method === 'DELETE') {
      logger.info('Received MCP session termination request', { sessionId });
    }
    try {
      await transport.handleRequest(req, res);
    } catch (error) {
      logger.error('Error handling MCP session request', { method: req.method, sessionId, error: String(error) });
      if (!res.headersSent) {
        res.status(500).send('Error processing MCP session request');
      }
    }
  };

  const router = Router();
  router.post('/', (req, res) => { void postHandler(req, res); });
  router.get('/', (req, res) => { void sessionHandler(req, res); });
  router.delete('/', (req, res) => { void sessionHandler(req, res); });

  const close = async (): Promise<void> => {
    for (const [sessionId, transport] of transports.entries()) {
      try {
        logger.debug('Closing MCP transport', { sessionId });
        await transport.close();
      } catch (error) {
        logger.error('Error closing MCP transport', { sessionId, error: String(error) });
      }
      transports.delete(sessionId);
    }
  };

  return { router, sessionCount: () => transports.size, close };
};
