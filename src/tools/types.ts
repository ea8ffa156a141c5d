import type { CallToolResult, ToolAnnotations } from '@modelcontextprotocol/sdk/types.js';
import type { ZodObject, ZodRawShape, z } from 'zod';
import type { Services } from '../services/index.js';

export type ToolResult = CallToolResult;

/**
 * Per-invocation context handed to tool handlers.
 */
export interface ToolContext {
  services: Services;
  signal?: AbortSignal;
  requestId?: string;
  /** Also append the structured result as JSON text. */
  includeJsonInContent?: boolean;
}

export interface ToolDefinition<Shape extends ZodRawShape> {
  name: string;
  title: string;
  description: string;
  inputSchema: ZodObject<Shape>;
  outputSchema?: ZodRawShape;
  annotations?: ToolAnnotations;
  handler: (args: z.infer<ZodObject<Shape>>, context: ToolContext) => Promise<ToolResult>;
}

/**
 * Type-erased tool as stored in the registry. `execute` validates raw
 * arguments against the input schema before calling the typed handler.
 */
export interface RegisteredTool {
  name: string;
  title: string;
  description: string;
  inputShape: ZodRawShape;
  outputSchema?: ZodRawShape;
  annotations?: ToolAnnotations;
  execute: (args: unknown, context: ToolContext) => Promise<ToolResult>;
}

export function defineTool<Shape extends ZodRawShape>(
  definition: ToolDefinition<Shape>,
): RegisteredTool {
  const { inputSchema, handler, ...rest } = definition;
  return {
    ...rest,
    inputShape: inputSchema.shape,
    execute: async (args, context) => {
      const parsed = inputSchema.safeParse(args ?? {});
      if (!parsed.success) {
        const errors = parsed.error.errors
          .map((e) => `${e.path.join('.')}: ${e.message}`)
          .join(', ');
        return {
          content: [{ type: 'text', text: `Invalid input: ${errors}` }],
          isError: true,
        };
      }
      return handler(parsed.data, context);
    },
  };
}
