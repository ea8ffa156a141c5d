import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { config } from '../config/env.js';
import type { Services } from '../services/index.js';
import { logger } from '../utils/logger.js';
import { executeTool, tools } from './registry.js';

/**
 * Register every tool with the MCP server. Handlers receive the shared
 * services plus the request's abort signal and id.
 */
export function registerTools(server: McpServer, services: Services): void {
  for (const tool of tools) {
    server.registerTool(
      tool.name,
      {
        title: tool.title,
        description: tool.description,
        inputSchema: tool.inputShape,
        ...(tool.outputSchema && { outputSchema: tool.outputSchema }),
        ...(tool.annotations && { annotations: tool.annotations }),
      },
      (args, extra) =>
        executeTool(tool.name, args, {
          services,
          signal: extra.signal,
          requestId: String(extra.requestId),
          includeJsonInContent: config.TOOLS_INCLUDE_JSON_IN_CONTENT,
        }),
    );
    logger.debug('tools', { message: 'Registered tool', toolName: tool.name });
  }

  logger.info('tools', {
    message: `Registered ${tools.length} tools`,
    toolNames: tools.map((t) => t.name),
  });
}
