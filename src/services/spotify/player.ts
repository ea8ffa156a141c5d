import type { SpotifyApi } from '@spotify/web-api-ts-sdk';
import { DevicesResponseCodec } from '../../types/spotify.codecs.js';
import { statusOf, TransportError } from '../../utils/http-result.js';
import type { Device } from './playback.js';

export async function listDevices(api: SpotifyApi): Promise<Device[]> {
  const result = await callWithHandling(() =>
    api.makeRequest<unknown>('GET', 'me/player/devices'),
  );
  const parsed = DevicesResponseCodec.parse(result ?? { devices: [] });
  const devices: Device[] = [];
  // Devices without an id (restricted or private sessions) cannot be addressed
  // by a play command. A lone id-less active device therefore counts as no
  // device, which leads to the desktop launch and retry.
  for (const d of parsed.devices) {
    if (d.id) {
      devices.push({ id: d.id, name: d.name, type: d.type, isActive: d.is_active });
    }
  }
  return devices;
}

export async function playTrack(api: SpotifyApi, deviceId: string, trackUri: string) {
  await callWithHandling(() =>
    api.player.startResumePlayback(deviceId, undefined, [trackUri]),
  );
}

function callWithHandling<T>(fn: () => Promise<T>): Promise<T> {
  return fn().catch((error: unknown) => {
    throw decorateSpotifyError(error);
  });
}

function decorateSpotifyError(error: unknown): Error {
  if (error instanceof TransportError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new TransportError(message, {
    status: statusOf(error),
    cause: error,
  });
}
