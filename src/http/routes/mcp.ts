import { randomUUID } from 'node:crypto';
import type { HttpBindings } from '@hono/node-server';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { isInitializeRequest } from '@modelcontextprotocol/sdk/types.js';
import { toFetchResponse, toReqRes } from 'fetch-to-node';
import { type Context, Hono } from 'hono';
import { logger } from '../../utils/logger.js';

const MCP_SESSION_HEADER = 'Mcp-Session-Id';

type Env = { Bindings: HttpBindings };

function rpcError(c: Context<Env>, status: 400 | 404 | 405 | 500, code: number, message: string) {
  return c.json({ jsonrpc: '2.0', error: { code, message }, id: null }, status);
}

/**
 * Streamable HTTP endpoint. Each session gets its own transport and its own
 * McpServer, created on `initialize` and torn down on DELETE or close.
 */
export function buildMcpRoutes(params: {
  createServer: () => McpServer;
  transports: Map<string, StreamableHTTPServerTransport>;
}) {
  const { createServer, transports } = params;
  const app = new Hono<Env>();

  app.post('/', async (c) => {
    const { req, res } = toReqRes(c.req.raw);
    const sessionIdHeader = c.req.header(MCP_SESSION_HEADER);

    try {
      let body: unknown;
      try {
        body = await c.req.json();
      } catch (error) {
        logger.warning('mcp_request', {
          message: 'Request body is not JSON',
          error: error instanceof Error ? error.message : String(error),
        });
        return rpcError(c, 400, -32700, 'Parse error');
      }

      const isInitialize = isInitializeRequest(body);
      logger.debug('mcp_request', {
        message: 'Processing MCP request',
        sessionId: sessionIdHeader,
        isInitialize,
      });

      let transport = sessionIdHeader ? transports.get(sessionIdHeader) : undefined;
      if (!transport) {
        if (!isInitialize) {
          return rpcError(c, 400, -32000, 'Bad Request: No valid session ID provided');
        }

        const server = createServer();
        const created = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          onsessioninitialized: (sid) => {
            transports.set(sid, created);
            logger.info('mcp', { message: 'Session initialized', sessionId: sid });
          },
        });
        created.onclose = () => {
          const sid = created.sessionId;
          if (sid) {
            transports.delete(sid);
            logger.info('mcp', { message: 'Session closed', sessionId: sid });
          }
        };
        created.onerror = (error) => {
          logger.error('transport', { message: 'Transport error', error: error.message });
        };
        await server.connect(created);
        transport = created;
      }

      await transport.handleRequest(req, res, body);
      return toFetchResponse(res);
    } catch (error) {
      logger.error('mcp_request', {
        message: 'POST request error',
        sessionId: sessionIdHeader,
        error: error instanceof Error ? error.message : String(error),
      });
      return rpcError(c, 500, -32603, 'Internal server error');
    }
  });

  const handleSessionRequest = async (c: Context<Env>, closeAfter: boolean) => {
    const { req, res } = toReqRes(c.req.raw);
    const sessionIdHeader = c.req.header(MCP_SESSION_HEADER);

    if (!sessionIdHeader) {
      logger.warning('mcp_request', {
        message: `${c.req.method} request rejected - no session header`,
      });
      return rpcError(c, 405, -32000, 'Method not allowed - no session');
    }

    const transport = transports.get(sessionIdHeader);
    if (!transport) {
      logger.warning('mcp_request', {
        message: `${c.req.method} request rejected - invalid session`,
        sessionId: sessionIdHeader,
      });
      return c.text('Invalid session', 404);
    }

    try {
      await transport.handleRequest(req, res);
      if (closeAfter) {
        transports.delete(sessionIdHeader);
        await transport.close();
        logger.info('mcp_request', {
          message: 'Session cleaned up',
          sessionId: sessionIdHeader,
          remainingTransports: transports.size,
        });
      }
      return toFetchResponse(res);
    } catch (error) {
      logger.error('mcp_request', {
        message: `${c.req.method} request error`,
        sessionId: sessionIdHeader,
        error: error instanceof Error ? error.message : String(error),
      });
      return rpcError(c, 500, -32603, 'Internal server error');
    }
  };

  app.get('/', (c) => handleSessionRequest(c, false));
  app.delete('/', (c) => handleSessionRequest(c, true));

  return app;
}
