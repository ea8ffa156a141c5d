import { describe, expect, test, vi } from 'vitest';

import { TransportError } from '../../../utils/http-result.js';
import { LaunchError } from '../desktop.js';
import type { TrackCandidate } from '../matching.js';
import {
  type Device,
  dispatchPlayback,
  maybeRetry,
  type PlaybackDeps,
  searchAndPlay,
  selectDevice,
} from '../playback.js';

const imagine: TrackCandidate = {
  id: 'imagine',
  uri: 'spotify:track:imagine',
  name: 'Imagine',
  artists: [{ name: 'John Lennon' }],
};

const phone: Device = { id: 'd1', name: 'Phone', isActive: false };
const kitchen: Device = { id: 'd2', name: 'Kitchen', isActive: true };

function makeDeps(overrides: Partial<PlaybackDeps> = {}) {
  return {
    search: vi.fn(async () => [imagine]),
    listDevices: vi.fn(async (): Promise<Device[]> => [phone, kitchen]),
    play: vi.fn(async () => {}),
    launchDesktopClient: vi.fn(async () => {}),
    sleep: vi.fn(async () => {}),
    launchDelayMs: 5000,
    ...overrides,
  };
}

describe('selectDevice', () => {
  test('prefers the active device', () => {
    expect(selectDevice([phone, kitchen])).toEqual({ device: kitchen, deviceWasActive: true });
  });

  test('falls back to the first device', () => {
    expect(selectDevice([phone])).toEqual({ device: phone, deviceWasActive: false });
  });

  test('returns null without devices', () => {
    expect(selectDevice([])).toBeNull();
  });
});

describe('dispatchPlayback', () => {
  test('issues no play command without devices', async () => {
    const play = vi.fn(async () => {});
    await expect(dispatchPlayback(imagine, [], play)).resolves.toEqual({ status: 'no_device' });
    expect(play).not.toHaveBeenCalled();
  });
});

describe('maybeRetry', () => {
  test('stops once a retry has already happened', async () => {
    const launch = vi.fn(async () => {});
    const wait = vi.fn(async () => {});

    expect(await maybeRetry(true, launch, wait)).toEqual({
      action: 'stop',
      reason: 'no_device',
      message: 'No available devices for playback after retrying.',
    });
    expect(launch).not.toHaveBeenCalled();
    expect(wait).not.toHaveBeenCalled();
  });

  test('launches the desktop app and waits before retrying', async () => {
    const calls: string[] = [];
    const launch = vi.fn(async () => {
      calls.push('launch');
    });
    const wait = vi.fn(async () => {
      calls.push('wait');
    });

    expect(await maybeRetry(false, launch, wait)).toEqual({ action: 'retry' });
    expect(calls).toEqual(['launch', 'wait']);
  });

  test('stops with launch_failed when the app cannot start', async () => {
    const launch = vi.fn(async () => {
      throw new LaunchError('not installed');
    });
    const wait = vi.fn(async () => {});

    expect(await maybeRetry(false, launch, wait)).toEqual({
      action: 'stop',
      reason: 'launch_failed',
      message: 'Failed to launch Spotify Desktop app: not installed',
    });
    expect(wait).not.toHaveBeenCalled();
  });
});

describe('searchAndPlay', () => {
  test('plays the best match on the active device', async () => {
    const deps = makeDeps();
    const outcome = await searchAndPlay('Imagine by John Lennon', {}, deps);

    expect(deps.search).toHaveBeenCalledWith('Imagine', 'track', 20);
    expect(deps.play).toHaveBeenCalledTimes(1);
    expect(deps.play).toHaveBeenCalledWith('d2', 'spotify:track:imagine');
    expect(outcome).toEqual({
      ok: true,
      track: imagine,
      device: kitchen,
      deviceWasActive: true,
      retried: false,
      message: 'Playing "Imagine" by John Lennon on active device: Kitchen',
    });
  });

  test('uses the first device when none is active', async () => {
    const deps = makeDeps({ listDevices: vi.fn(async () => [phone]) });
    const outcome = await searchAndPlay('Imagine', {}, deps);

    expect(deps.play).toHaveBeenCalledWith('d1', 'spotify:track:imagine');
    expect(outcome.message).toBe('Playing "Imagine" by John Lennon on device: Phone');
  });

  test('reports no match before looking for devices', async () => {
    const deps = makeDeps({ search: vi.fn(async () => []) });
    const outcome = await searchAndPlay('Nothing Like This', {}, deps);

    expect(outcome).toEqual({
      ok: false,
      reason: 'no_match',
      retried: false,
      message: 'No track found matching "Nothing Like This".',
    });
    expect(deps.listDevices).not.toHaveBeenCalled();
    expect(deps.launchDesktopClient).not.toHaveBeenCalled();
  });

  test('reports no match when the artist filter rejects every candidate', async () => {
    const deps = makeDeps({
      search: vi.fn(async (): Promise<TrackCandidate[]> => [
        { id: 'q1', uri: 'spotify:track:q1', name: 'Yesterday', artists: [{ name: 'Queen' }] },
        { id: 'e1', uri: 'spotify:track:e1', name: 'Yesterday', artists: [{ name: 'Elton John' }] },
      ]),
    });
    const outcome = await searchAndPlay('Yesterday by Beatles', {}, deps);

    expect(outcome).toEqual({
      ok: false,
      reason: 'no_match',
      retried: false,
      message: 'No track found matching "Yesterday by Beatles".',
    });
    expect(deps.search).toHaveBeenCalledTimes(1);
    expect(deps.listDevices).not.toHaveBeenCalled();
    expect(deps.play).not.toHaveBeenCalled();
  });

  test('launches the desktop app once and retries when no device is available', async () => {
    const listDevices = vi
      .fn<() => Promise<Device[]>>()
      .mockResolvedValueOnce([])
      .mockResolvedValueOnce([phone]);
    const deps = makeDeps({ listDevices });
    const outcome = await searchAndPlay('Imagine', {}, deps);

    expect(deps.launchDesktopClient).toHaveBeenCalledTimes(1);
    expect(deps.sleep).toHaveBeenCalledWith(5000);
    expect(deps.search).toHaveBeenCalledTimes(2);
    expect(deps.play).toHaveBeenCalledWith('d1', 'spotify:track:imagine');
    expect(outcome.ok).toBe(true);
    expect(outcome.retried).toBe(true);
  });

  test('gives up after a single retry', async () => {
    const deps = makeDeps({ listDevices: vi.fn(async () => []) });
    const outcome = await searchAndPlay('Imagine', {}, deps);

    expect(deps.launchDesktopClient).toHaveBeenCalledTimes(1);
    expect(deps.sleep).toHaveBeenCalledTimes(1);
    expect(deps.listDevices).toHaveBeenCalledTimes(2);
    expect(deps.play).not.toHaveBeenCalled();
    expect(outcome).toEqual({
      ok: false,
      reason: 'no_device',
      retried: true,
      message: 'No available devices for playback after retrying.',
    });
  });

  test('stops without retrying when the launch fails', async () => {
    const deps = makeDeps({
      listDevices: vi.fn(async () => []),
      launchDesktopClient: vi.fn(async () => {
        throw new LaunchError('spotify: command not found');
      }),
    });
    const outcome = await searchAndPlay('Imagine', {}, deps);

    expect(deps.sleep).not.toHaveBeenCalled();
    expect(deps.search).toHaveBeenCalledTimes(1);
    expect(outcome).toEqual({
      ok: false,
      reason: 'launch_failed',
      retried: false,
      message: 'Failed to launch Spotify Desktop app: spotify: command not found',
    });
  });

  test('propagates transport failures', async () => {
    const deps = makeDeps({
      play: vi.fn(async () => {
        throw new TransportError('Spotify request failed: 403 Forbidden', { status: 403 });
      }),
    });
    await expect(searchAndPlay('Imagine', {}, deps)).rejects.toBeInstanceOf(TransportError);
  });

  test('honours a configured search limit', async () => {
    const deps = makeDeps({ searchLimit: 5 });
    await searchAndPlay('Imagine', { searchType: 'track' }, deps);
    expect(deps.search).toHaveBeenCalledWith('Imagine', 'track', 5);
  });
});
