import type { HttpBindings } from '@hono/node-server';
import type { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { Hono } from 'hono';
import { config } from '../config/env.js';
import { serverMetadata } from '../config/metadata.js';
import { buildServer } from '../core/mcp.js';
import type { Services } from '../services/index.js';
import { corsMiddleware } from './middlewares/cors.js';
import { healthRoutes } from './routes/health.js';
import { buildMcpRoutes } from './routes/mcp.js';

export function buildHttpApp(services: Services): Hono<{ Bindings: HttpBindings }> {
  const app = new Hono<{ Bindings: HttpBindings }>();
  const transports = new Map<string, StreamableHTTPServerTransport>();

  const createServer = () =>
    buildServer({
      name: config.MCP_TITLE || serverMetadata.title,
      version: config.MCP_VERSION,
      instructions: config.MCP_INSTRUCTIONS ?? serverMetadata.instructions,
      services,
    });

  app.use('*', corsMiddleware(config.ALLOWED_ORIGINS));

  app.route('/', healthRoutes());
  app.route('/mcp', buildMcpRoutes({ createServer, transports }));

  return app;
}
