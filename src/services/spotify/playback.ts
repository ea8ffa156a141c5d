import { logger } from '../../utils/logger.js';
import {
  type ParsedQuery,
  parseQuery,
  primaryArtist,
  rankCandidates,
  type SearchType,
  type TrackCandidate,
} from './matching.js';

export type Device = {
  id: string;
  name: string;
  type?: string;
  isActive: boolean;
};

/**
 * What search-and-play needs from the outside world. `search` and `play`
 * reject with `TransportError`; `launchDesktopClient` rejects with `LaunchError`.
 */
export type PlaybackDeps = {
  search: (query: string, type: SearchType, limit: number) => Promise<TrackCandidate[]>;
  listDevices: () => Promise<Device[]>;
  play: (deviceId: string, trackUri: string) => Promise<void>;
  launchDesktopClient: () => Promise<void>;
  sleep?: (ms: number) => Promise<void>;
  searchLimit?: number;
  launchDelayMs?: number;
};

export type PlaybackFailureReason = 'no_match' | 'no_device' | 'launch_failed';

export type PlaybackOutcome =
  | {
      ok: true;
      track: TrackCandidate;
      device: Device;
      deviceWasActive: boolean;
      retried: boolean;
      message: string;
    }
  | {
      ok: false;
      reason: PlaybackFailureReason;
      retried: boolean;
      message: string;
    };

export type DispatchResult =
  | { status: 'played'; device: Device; deviceWasActive: boolean }
  | { status: 'no_device' };

export type RetryDecision =
  | { action: 'retry' }
  | { action: 'stop'; reason: PlaybackFailureReason; message: string };

export const DEFAULT_SEARCH_LIMIT = 20;
export const DEFAULT_LAUNCH_DELAY_MS = 5000;
/** The desktop client is launched at most this many times per request. */
export const MAX_LAUNCH_RETRIES = 1;

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Active device first, otherwise the first one listed. */
export function selectDevice(
  devices: readonly Device[],
): { device: Device; deviceWasActive: boolean } | null {
  const active = devices.find((d) => d.isActive);
  if (active) {
    return { device: active, deviceWasActive: true };
  }
  const first = devices[0];
  return first ? { device: first, deviceWasActive: false } : null;
}

/** Issues exactly one play command when a device is available, none otherwise. */
export async function dispatchPlayback(
  match: TrackCandidate,
  devices: readonly Device[],
  play: PlaybackDeps['play'],
): Promise<DispatchResult> {
  const selected = selectDevice(devices);
  if (!selected) {
    return { status: 'no_device' };
  }
  await play(selected.device.id, match.uri);
  return { status: 'played', ...selected };
}

export async function maybeRetry(
  alreadyRetried: boolean,
  launchDesktopClient: PlaybackDeps['launchDesktopClient'],
  wait: () => Promise<void>,
): Promise<RetryDecision> {
  if (alreadyRetried) {
    const message = 'No available devices for playback after retrying.';
    logger.warning('spotify_playback', { message });
    return { action: 'stop', reason: 'no_device', message };
  }

  logger.info('spotify_playback', {
    message: 'No available devices for playback. Attempting to launch Spotify Desktop app...',
  });
  try {
    await launchDesktopClient();
  } catch (error) {
    const message = `Failed to launch Spotify Desktop app: ${error instanceof Error ? error.message : String(error)}`;
    logger.error('spotify_playback', { message });
    return { action: 'stop', reason: 'launch_failed', message };
  }

  logger.info('spotify_playback', { message: 'Spotify Desktop app launched.' });
  await wait();
  return { action: 'retry' };
}

function describePlay(track: TrackCandidate, device: Device, deviceWasActive: boolean): string {
  const where = deviceWasActive ? 'active device' : 'device';
  return `Playing "${track.name}" by ${primaryArtist(track)} on ${where}: ${device.name}`;
}

/**
 * Searches for `query`, plays the best match, and recovers once from a missing
 * playback device by launching the desktop client and starting over.
 *
 * Runs as a bounded loop over searching → dispatching → (retrying) → done, so
 * the retried pass re-runs search and ranking and a second device-less pass ends
 * the request. Transport failures propagate.
 */
export async function searchAndPlay(
  query: string,
  options: { searchType?: SearchType },
  deps: PlaybackDeps,
): Promise<PlaybackOutcome> {
  const sleep = deps.sleep ?? defaultSleep;
  const limit = deps.searchLimit ?? DEFAULT_SEARCH_LIMIT;
  const launchDelayMs = deps.launchDelayMs ?? DEFAULT_LAUNCH_DELAY_MS;

  let retries = 0;
  for (;;) {
    const retried = retries > 0;
    const parsed: ParsedQuery = parseQuery(query, options.searchType);
    logger.debug('spotify_playback', { message: 'Parsed query', query, parsed, retried });

    const candidates = await deps.search(parsed.song, parsed.searchType, limit);
    const match = rankCandidates(parsed, candidates);
    if (!match) {
      const message = `No track found matching "${query}".`;
      logger.info('spotify_playback', { message, candidates: candidates.length });
      return { ok: false, reason: 'no_match', retried, message };
    }

    const devices = await deps.listDevices();
    const dispatched = await dispatchPlayback(match, devices, deps.play);
    if (dispatched.status === 'played') {
      const message = describePlay(match, dispatched.device, dispatched.deviceWasActive);
      logger.info('spotify_playback', { message, uri: match.uri, deviceId: dispatched.device.id });
      return {
        ok: true,
        track: match,
        device: dispatched.device,
        deviceWasActive: dispatched.deviceWasActive,
        retried,
        message,
      };
    }

    const decision = await maybeRetry(retries >= MAX_LAUNCH_RETRIES, deps.launchDesktopClient, () =>
      sleep(launchDelayMs),
    );
    if (decision.action === 'stop') {
      return { ok: false, reason: decision.reason, retried, message: decision.message };
    }
    retries++;
  }
}
