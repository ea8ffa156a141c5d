import { similarity } from './similarity.js';

export type SearchType = 'track';

export type ParsedQuery = {
  readonly song: string;
  readonly artist: string | null;
  readonly searchType: SearchType;
};

export type TrackCandidate = {
  id: string;
  uri: string;
  name: string;
  artists: Array<{ name: string }>;
};

/** Primary-artist similarity a candidate must exceed when an artist is named. */
export const ARTIST_MATCH_THRESHOLD = 0.6;

// The end anchor also accepts a single trailing newline.
const QUERY_PATTERNS: readonly RegExp[] = [
  /^(.+)\s+(?:by|from|of)\s+(.+)(?=\n?$)/i, // "Song by Artist"
  /^(.+)\s*-\s*(.+)(?=\n?$)/i, // "Song - Artist"
];

export function parseQuery(query: string, searchTypeOverride?: SearchType): ParsedQuery {
  const searchType = searchTypeOverride ?? 'track';

  for (const pattern of QUERY_PATTERNS) {
    const match = pattern.exec(query);
    const song = match?.[1];
    const artist = match?.[2];
    if (song !== undefined && artist !== undefined) {
      return { song: song.trim(), artist: artist.trim(), searchType };
    }
  }

  return { song: query.trim(), artist: null, searchType };
}

export function primaryArtist(candidate: TrackCandidate): string {
  return candidate.artists[0]?.name ?? '';
}

/**
 * Picks the candidate whose name is most similar to the requested song.
 *
 * With a (non-empty) artist named, only candidates whose primary artist scores above
 * {@link ARTIST_MATCH_THRESHOLD} are considered, and an empty filtered list
 * means no match. Ties keep the earliest candidate; a best score of 0 is no match.
 */
export function rankCandidates(
  parsed: ParsedQuery,
  candidates: readonly TrackCandidate[],
): TrackCandidate | null {
  const { artist } = parsed;
  const eligible = !artist
    ? candidates
    : candidates.filter(
        (candidate) => similarity(artist, primaryArtist(candidate)) > ARTIST_MATCH_THRESHOLD,
      );

  let best: TrackCandidate | null = null;
  let bestScore = 0;
  for (const candidate of eligible) {
    const score = similarity(parsed.song, candidate.name);
    if (score > bestScore) {
      bestScore = score;
      best = candidate;
    }
  }
  return best;
}
