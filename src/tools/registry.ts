/**
 * Tool registry for the agent tools server.
 */

import { calendarTools } from './calendar.tool.js';
import { gmailTools } from './gmail.tool.js';
import { healthTool } from './health.tool.js';
import { searchAndPlayTool } from './spotify-play.tool.js';
import type { RegisteredTool, ToolContext, ToolResult } from './types.js';
import { weatherTools } from './weather.tool.js';

export type { RegisteredTool, ToolContext, ToolResult } from './types.js';

export const tools: readonly RegisteredTool[] = [
  ...gmailTools,
  ...calendarTools,
  searchAndPlayTool,
  ...weatherTools,
  healthTool,
];

export function getTool(name: string): RegisteredTool | undefined {
  return tools.find((t) => t.name === name);
}

export function getToolNames(): string[] {
  return tools.map((t) => t.name);
}

function cancelled(): ToolResult {
  return {
    content: [{ type: 'text', text: 'Operation was cancelled' }],
    isError: true,
  };
}

/**
 * Execute a tool by name.
 * Handles cancellation, output-schema compliance, and error wrapping.
 */
export async function executeTool(
  name: string,
  args: unknown,
  context: ToolContext,
): Promise<ToolResult> {
  const tool = getTool(name);
  if (!tool) {
    return {
      content: [{ type: 'text', text: `Unknown tool: ${name}` }],
      isError: true,
    };
  }

  if (context.signal?.aborted) {
    return cancelled();
  }

  try {
    const result = await tool.execute(args, context);

    if (tool.outputSchema && !result.isError && !result.structuredContent) {
      return {
        content: [
          {
            type: 'text',
            text: 'Tool with outputSchema must return structuredContent (unless isError is true)',
          },
        ],
        isError: true,
      };
    }

    return result;
  } catch (error) {
    if (context.signal?.aborted) {
      return cancelled();
    }
    const message = error instanceof Error ? error.message : String(error);
    return {
      content: [{ type: 'text', text: `Tool error: ${message}` }],
      isError: true,
    };
  }
}
