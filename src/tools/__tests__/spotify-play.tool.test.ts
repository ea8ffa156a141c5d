import { describe, expect, test, vi } from 'vitest';

import type { Device } from '../../services/spotify/playback.js';
import { TransportError } from '../../utils/http-result.js';
import { executeTool } from '../registry.js';
import { contextFor, firstText, makeServices } from './fake-services.js';

const imagine = {
  id: 'imagine',
  uri: 'spotify:track:imagine',
  name: 'Imagine',
  artists: [{ name: 'John Lennon' }, { name: 'The Plastic Ono Band' }],
};

const speaker: Device = { id: 'd1', name: 'Living Room', type: 'Speaker', isActive: true };

describe('search_and_play', () => {
  test('describes the track and device that started playing', async () => {
    const services = makeServices({
      playback: {
        search: vi.fn(async () => [imagine]),
        listDevices: vi.fn(async () => [speaker]),
      },
    });
    const result = await executeTool(
      'search_and_play',
      { query: 'Imagine by John Lennon' },
      contextFor(services),
    );

    expect(result.isError).toBeUndefined();
    expect(result.structuredContent).toEqual({
      _msg: 'Playing "Imagine" by John Lennon on active device: Living Room',
      ok: true,
      retried: false,
      track: {
        id: 'imagine',
        uri: 'spotify:track:imagine',
        name: 'Imagine',
        artists: ['John Lennon', 'The Plastic Ono Band'],
      },
      device: { id: 'd1', name: 'Living Room', was_active: true },
    });
  });

  test('answers a missing device without flagging an error', async () => {
    const services = makeServices({ playback: { search: vi.fn(async () => [imagine]) } });
    const result = await executeTool('search_and_play', { query: 'Imagine' }, contextFor(services));

    expect(result.isError).toBeUndefined();
    expect(result.structuredContent).toEqual({
      _msg: 'No available devices for playback after retrying.',
      ok: false,
      reason: 'no_device',
      retried: true,
    });
  });

  test('flags transport failures', async () => {
    const services = makeServices({
      playback: {
        search: vi.fn(async () => {
          throw new TransportError('Search failed: 429 Too Many Requests', { status: 429 });
        }),
      },
    });
    const result = await executeTool('search_and_play', { query: 'Imagine' }, contextFor(services));

    expect(result.isError).toBe(true);
    expect(firstText(result)).toBe(
      'An error occurred during playback: Rate limited. Please wait and retry.',
    );
  });

  test('rejects a blank query', async () => {
    const result = await executeTool('search_and_play', { query: '   ' }, contextFor(makeServices()));
    expect(result.isError).toBe(true);
    expect(firstText(result)).toBe(
      'Invalid input: query: String must contain at least 1 character(s)',
    );
  });
});
