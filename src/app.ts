/**
 * Express application for the helpdesk MCP server.
 *
 * Streamable HTTP transport with an in-memory session store. Kept separate
 * from server.ts so tests can drive it with supertest.
 */

import express, { type Request, type Response } from 'express';
import { randomUUID } from 'crypto';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { isInitializeRequest } from '@modelcontextprotocol/sdk/types.js';
import { logger } from './lib/logger.js';
import { createMcpServer, SERVER_VERSION } from './mcp/tools/index.js';

export const app = express();

app.use(express.json());

// Session store: Map<sessionId, transport>
export const transports: Map<string, StreamableHTTPServerTransport> = new Map();

function sessionIdOf(req: Request): string | undefined {
  const header = req.headers['mcp-session-id'];
  return typeof header === 'string' && header.length > 0 ? header : undefined;
}

function sendJsonRpcError(res: Response, status: number, code: number, message: string): void {
  res.status(status).json({
    jsonrpc: '2.0',
    error: { code, message },
    id: null,
  });
}

/**
 * Health check endpoint
 */
app.get('/health', (_req: Request, res: Response) => {
  res.status(200).json({
    status: 'healthy',
    version: SERVER_VERSION,
    sessions: transports.size,
  });
});

/**
 * MCP POST endpoint - handles requests and initializes new sessions
 */
app.post('/mcp', async (req: Request, res: Response) => {
  const sessionId = sessionIdOf(req);

  logger.debug('Received MCP POST request', { sessionId: sessionId ?? 'none' });

  try {
    const existing = sessionId ? transports.get(sessionId) : undefined;

    if (existing) {
      await existing.handleRequest(req, res, req.body);
    } else if (!sessionId && isInitializeRequest(req.body)) {
      logger.info('Initializing new MCP session');

      const transport = new StreamableHTTPServerTransport({
        sessionIdGenerator: () => randomUUID(),
        onsessioninitialized: (id) => {
          transports.set(id, transport);
          logger.info('Session initialized', { sessionId: id });
        },
      });

      transport.onclose = () => {
        for (const [id, t] of transports.entries()) {
          if (t === transport) {
            transports.delete(id);
            logger.info('Session closed', { sessionId: id });
            break;
          }
        }
      };

      const server = createMcpServer();
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } else if (sessionId) {
      logger.warn('Invalid session ID provided', { sessionId });
      sendJsonRpcError(res, 400, -32000, 'Invalid session ID. Session may have expired.');
    } else {
      logger.warn('Missing session ID for non-initialize request');
      sendJsonRpcError(res, 400, -32000, 'Missing mcp-session-id header. Initialize session first.');
    }
  } catch (error) {
    logger.error('Error handling MCP request', {
      error: error instanceof Error ? error.message : String(error),
    });
    if (!res.headersSent) {
      sendJsonRpcError(res, 500, -32603, 'Internal server error');
    }
  }
});

/**
 * MCP GET endpoint - Server-Sent Events for server-to-client notifications
 */
app.get('/mcp', async (req: Request, res: Response) => {
  const sessionId = sessionIdOf(req);
  const transport = sessionId ? transports.get(sessionId) : undefined;

  if (!transport) {
    logger.warn('SSE request with invalid session', { sessionId: sessionId ?? 'none' });
    sendJsonRpcError(res, 400, -32000, 'Invalid or missing session ID');
    return;
  }

  logger.debug('SSE connection established', { sessionId });
  await transport.handleRequest(req, res);
});

/**
 * MCP DELETE endpoint - explicit session termination
 */
app.delete('/mcp', async (req: Request, res: Response) => {
  const sessionId = sessionIdOf(req);
  const transport = sessionId ? transports.get(sessionId) : undefined;

  if (!sessionId || !transport) {
    logger.warn('DELETE request with invalid session', { sessionId: sessionId ?? 'none' });
    sendJsonRpcError(res, 400, -32000, 'Invalid or missing session ID');
    return;
  }

  logger.info('Terminating session via DELETE', { sessionId });
  await transport.handleRequest(req, res);
  transports.delete(sessionId);
});
