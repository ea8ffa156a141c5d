import {
  SpotifyTokenResponseCodec,
  type SpotifyTokenResponseCodecType,
} from '../../types/spotify.codecs.js';
import type { HttpClient } from '../http-client.js';

export class SpotifyOAuthError extends Error {
  status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SpotifyOAuthError';
    this.status = status;
  }
}

type RefreshOptions = {
  http: HttpClient;
  accountsUrl: string;
  clientId?: string;
  clientSecret?: string;
  refreshToken: string;
  signal?: AbortSignal;
};

export async function refreshSpotifyTokens(
  options: RefreshOptions,
): Promise<SpotifyTokenResponseCodecType> {
  const { http, accountsUrl, clientId, clientSecret, refreshToken, signal } = options;

  if (!refreshToken.trim()) {
    throw new SpotifyOAuthError('Missing Spotify refresh token');
  }

  if (!clientId || !clientSecret) {
    throw new SpotifyOAuthError('Spotify client credentials are not configured');
  }

  const tokenUrl = new URL('/api/token', accountsUrl).toString();
  const form = new URLSearchParams({
    grant_type: 'refresh_token',
    refresh_token: refreshToken,
  }).toString();

  const basic = Buffer.from(`${clientId}:${clientSecret}`).toString('base64');

  const response = await http(tokenUrl, {
    method: 'POST',
    headers: {
      accept: 'application/json',
      authorization: `Basic ${basic}`,
      'content-type': 'application/x-www-form-urlencoded',
    },
    body: form,
    signal,
  });

  const payloadText = await response.text();

  if (!response.ok) {
    throw new SpotifyOAuthError('Spotify refresh request failed', response.status, {
      cause: payloadText,
    });
  }

  let payloadJson: unknown = {};
  try {
    payloadJson = payloadText ? JSON.parse(payloadText) : {};
  } catch (error) {
    throw new SpotifyOAuthError('Spotify refresh payload is not JSON', response.status, {
      cause: error,
    });
  }
  const parsed = SpotifyTokenResponseCodec.safeParse(payloadJson);
  if (!parsed.success) {
    throw new SpotifyOAuthError('Spotify refresh payload invalid', response.status, {
      cause: parsed.error,
    });
  }

  return parsed.data;
}
