import 'dotenv/config';
import { serve } from '@hono/node-server';
import { config } from './config/env.js';
import { buildHttpApp } from './http/app.js';
import { createServices } from './services/index.js';
import { logger } from './utils/logger.js';

function main(): void {
  logger.setLevel(config.LOG_LEVEL);
  try {
    const app = buildHttpApp(createServices(config));
    serve({ fetch: app.fetch, port: config.PORT, hostname: config.HOST });
    logger.info('server', {
      message: `MCP server started on http://${config.HOST}:${config.PORT}`,
      environment: config.NODE_ENV,
    });
  } catch (error) {
    logger.error('server', {
      message: 'Server startup failed',
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
}

process.on('SIGINT', () => {
  logger.info('server', { message: 'Received SIGINT, shutting down' });
  process.exit(0);
});

process.on('SIGTERM', () => {
  logger.info('server', { message: 'Received SIGTERM, shutting down' });
  process.exit(0);
});

main();
