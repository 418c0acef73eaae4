/**
 * HTTP transports for the docs server
 *
 * Endpoints:
 * - GET  /health              - Health check
 * - GET  /sse                 - Open an SSE session
 * - POST /messages?sessionId  - Send a message to an SSE session
 * - ALL  /mcp                 - Streamable HTTP, stateless, JSON responses
 */

import express, { type ErrorRequestHandler, type RequestHandler } from 'express';
import type { Server as HttpServer } from 'http';
import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { createScopedLogger, errorMessage } from '@docs-mcp/shared';
import { createServer } from './server';
import { healthRouter } from './routes/health';
import type { ToolContext } from './tools/index';

export type HttpTransport = 'sse' | 'streamable-http';

const log = createScopedLogger('http');

function closeQuietly(what: string, close: () => Promise<void>): void {
  close().catch((error) => log.warn(`Failed to close ${what}`, { error: errorMessage(error) }));
}

function sseRoutes(context: ToolContext, sessions: Map<string, SSEServerTransport>): express.Router {
  const router = express.Router();

  const open: RequestHandler = async (_req, res, next) => {
    try {
      const transport = new SSEServerTransport('/messages', res);
      const server = createServer(context);
      sessions.set(transport.sessionId, transport);
      log.info('SSE session opened', { sessionId: transport.sessionId });

      res.on('close', () => {
        sessions.delete(transport.sessionId);
        log.info('SSE session closed', { sessionId: transport.sessionId });
        closeQuietly('MCP server', () => server.close());
      });

      await server.connect(transport);
    } catch (error) {
      next(error);
    }
  };

  const message: RequestHandler = async (req, res, next) => {
    const sessionId = req.query.sessionId;
    const transport = typeof sessionId === 'string' ? sessions.get(sessionId) : undefined;
    if (!transport) {
      res.status(400).json({ error: 'Unknown or missing sessionId' });
      return;
    }

    try {
      await transport.handlePostMessage(req, res, req.body);
    } catch (error) {
      next(error);
    }
  };

  router.get('/sse', open);
  router.post('/messages', message);
  return router;
}

function streamableRoutes(context: ToolContext): express.Router {
  const router = express.Router();

  const handle: RequestHandler = async (req, res, next) => {
    try {
      const server = createServer(context);
      const transport = new StreamableHTTPServerTransport({
        sessionIdGenerator: undefined,
        enableJsonResponse: true,
      });

      res.on('close', () => {
        closeQuietly('transport', () => transport.close());
        closeQuietly('MCP server', () => server.close());
      });

      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      next(error);
    }
  };

  router.all('/mcp', handle);
  return router;
}

const notFound: RequestHandler = (req, res) => {
  res.status(404).json({ error: `Not found: ${req.method} ${req.path}` });
};

const internalError: ErrorRequestHandler = (error, _req, res, next) => {
  log.error('Request failed', error);
  if (res.headersSent) {
    next(error);
    return;
  }
  res.status(500).json({ error: 'Internal server error' });
};

export interface DocsApp {
  app: express.Express;
  /** Open SSE sessions by session id */
  sessions: Map<string, SSEServerTransport>;
}

export function createApp(transport: HttpTransport, context: ToolContext): DocsApp {
  const app = express();
  const sessions = new Map<string, SSEServerTransport>();

  app.use(express.json());
  app.use('/health', healthRouter);

  if (transport === 'sse') {
    app.use(sseRoutes(context, sessions));
  } else {
    app.use(streamableRoutes(context));
  }

  app.use(notFound);
  app.use(internalError);

  return { app, sessions };
}

/**
 * Listen on host:port, resolving once the socket is bound
 */
export function listen(app: express.Express, host: string, port: number): Promise<HttpServer> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.once('listening', () => resolve(server));
    server.once('error', reject);
  });
}
