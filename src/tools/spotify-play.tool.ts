import { toolsMetadata } from '../config/metadata.js';
import { SearchAndPlayInputSchema } from '../schemas/inputs.js';
import { SearchAndPlayOutput } from '../schemas/outputs.js';
import { type PlaybackOutcome, searchAndPlay } from '../services/spotify/playback.js';
import { logger } from '../utils/logger.js';
import { validateDev } from '../utils/validate.js';
import { errorResult, textResult } from './result.js';
import { defineTool } from './types.js';

export function toSearchAndPlayOutput(outcome: PlaybackOutcome): SearchAndPlayOutput {
  if (!outcome.ok) {
    return {
      _msg: outcome.message,
      ok: false,
      reason: outcome.reason,
      retried: outcome.retried,
    };
  }
  return {
    _msg: outcome.message,
    ok: true,
    retried: outcome.retried,
    track: {
      id: outcome.track.id,
      uri: outcome.track.uri,
      name: outcome.track.name,
      artists: outcome.track.artists.map((a) => a.name),
    },
    device: {
      id: outcome.device.id,
      name: outcome.device.name,
      was_active: outcome.deviceWasActive,
    },
  };
}

/**
 * A missing match or device is a normal answer (`ok: false`), not a tool
 * error; only transport failures set `isError`.
 */
export const searchAndPlayTool = defineTool({
  ...toolsMetadata.search_and_play,
  inputSchema: SearchAndPlayInputSchema,
  outputSchema: SearchAndPlayOutput.shape,
  annotations: { readOnlyHint: false, idempotentHint: false, openWorldHint: true },
  handler: async (args, context) => {
    try {
      const outcome = await searchAndPlay(
        args.query,
        { searchType: args.search_type },
        context.services.playback,
      );
      const structured = toSearchAndPlayOutput(outcome);
      return textResult(validateDev(SearchAndPlayOutput, structured), context);
    } catch (error) {
      logger.error('spotify_playback', { query: args.query, error: String(error) });
      return errorResult('An error occurred during playback', error);
    }
  },
});
