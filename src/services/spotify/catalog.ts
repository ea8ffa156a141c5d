import type { SpotifyApi } from '@spotify/web-api-ts-sdk';
import { SearchResponseCodec, TrackCodec, type TrackCodecType } from '../../types/spotify.codecs.js';
import { statusOf, TransportError } from '../../utils/http-result.js';
import type { SearchType, TrackCandidate } from './matching.js';

export function toTrackCandidate(t: TrackCodecType): TrackCandidate | null {
  if (!t.uri || !t.name) {
    return null;
  }
  return {
    id: String(t.id ?? ''),
    uri: t.uri,
    name: t.name,
    artists: Array.isArray(t.artists)
      ? t.artists.map((a) => ({ name: a?.name ?? '' }))
      : [],
  };
}

/** Search results in the order Spotify ranks them, keeping only playable-looking tracks. */
export async function searchTracks(
  api: SpotifyApi,
  query: string,
  type: SearchType,
  limit: number,
): Promise<TrackCandidate[]> {
  const searchParams = new URLSearchParams();
  searchParams.set('q', query);
  searchParams.set('type', type);
  searchParams.set('limit', String(limit));

  try {
    const json = await api.makeRequest<unknown>('GET', `search?${searchParams.toString()}`);
    const parsedResponse = SearchResponseCodec.parse(json);

    const candidates: TrackCandidate[] = [];
    for (const raw of parsedResponse.tracks?.items ?? []) {
      const parsed = TrackCodec.safeParse(raw);
      if (parsed.success) {
        const candidate = toTrackCandidate(parsed.data);
        if (candidate) {
          candidates.push(candidate);
        }
      }
    }
    return candidates;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new TransportError(`Search failed: ${message}`, {
      status: statusOf(error),
      code: error instanceof TransportError ? error.code : undefined,
      cause: error,
    });
  }
}
