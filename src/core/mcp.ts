import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { type LoggingLevel, SetLevelRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import type { Services } from '../services/index.js';
import { registerTools } from '../tools/index.js';
import { type LogLevel, logger } from '../utils/logger.js';
import { buildCapabilities } from './capabilities.js';

export interface ServerOptions {
  name: string;
  version: string;
  instructions?: string;
  services: Services;
}

/** MCP has eight syslog levels; the local logger has four. */
const LEVEL_MAP: Record<LoggingLevel, LogLevel> = {
  debug: 'debug',
  info: 'info',
  notice: 'info',
  warning: 'warning',
  error: 'error',
  critical: 'error',
  alert: 'error',
  emergency: 'error',
};

/**
 * Builds one MCP server. The HTTP layer creates a server per session, so
 * everything registered here must be cheap and stateless apart from `services`.
 */
export function buildServer(options: ServerOptions): McpServer {
  const { name, version, instructions, services } = options;

  const server = new McpServer(
    { name, version },
    {
      capabilities: buildCapabilities(),
      instructions,
    },
  );

  registerTools(server, services);

  // Mirror log lines to this session as notifications/message
  const detach = logger.attach((level, loggerName, data) =>
    server.server.sendLoggingMessage({ level, logger: loggerName, data }),
  );
  server.server.onclose = detach;

  // Required when the logging capability is advertised
  server.server.setRequestHandler(SetLevelRequestSchema, async (request) => {
    const level = request.params.level;
    logger.setLevel(LEVEL_MAP[level]);
    logger.info('mcp', { message: 'Log level changed', level });
    return {};
  });

  return server;
}
