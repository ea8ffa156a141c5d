import { toolsMetadata } from '../config/metadata.js';
import { HealthInputSchema } from '../schemas/inputs.js';
import { HealthOutput } from '../schemas/outputs.js';
import { logger } from '../utils/logger.js';
import { defineTool } from './types.js';

const startTime = Date.now();

export const healthTool = defineTool({
  ...toolsMetadata.health,
  inputSchema: HealthInputSchema,
  outputSchema: HealthOutput.shape,
  annotations: { readOnlyHint: true, openWorldHint: false },
  handler: async (args, context) => {
    logger.debug('health', { message: 'Health check requested', requestId: context.requestId });

    const now = Date.now();
    const result: HealthOutput = {
      status: 'ok',
      timestamp: now,
      uptime: now - startTime,
      runtime: 'node',
    };
    if (args.verbose) {
      result.nodeVersion = process.version;
      result.memoryUsage = process.memoryUsage().heapUsed;
    }

    return {
      content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
      structuredContent: result,
    };
  },
});
