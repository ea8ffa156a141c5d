import { GoogleTokenResponseCodec } from '../../types/google.codecs.js';
import { TransportError } from '../../utils/http-result.js';
import { type HttpClient, readJson } from '../http-client.js';

export type GoogleTokenSource = (signal?: AbortSignal) => Promise<string>;

export type GoogleTokenSourceDeps = {
  http: HttpClient;
  tokenUrl: string;
  accessToken?: string;
  refreshToken?: string;
  clientId?: string;
  clientSecret?: string;
  now?: () => number;
};

type TokenCache = { accessToken: string; expiresAtMs: number } | null;

/**
 * Supplies a bearer token for Google APIs from pre-issued credentials.
 *
 * With a refresh token and OAuth client configured, access tokens are minted
 * through the token endpoint and cached until shortly before expiry. Without
 * them, the configured access token is used as-is.
 */
export function createGoogleTokenSource(deps: GoogleTokenSourceDeps): GoogleTokenSource {
  const now = deps.now ?? (() => Date.now());
  let cache: TokenCache = null;

  const canRefresh = Boolean(deps.refreshToken && deps.clientId && deps.clientSecret);

  return async (signal?: AbortSignal): Promise<string> => {
    if (!canRefresh) {
      if (deps.accessToken) {
        return deps.accessToken;
      }
      throw new TransportError(
        'Google credentials are not configured. Set GOOGLE_ACCESS_TOKEN, or GOOGLE_REFRESH_TOKEN with GOOGLE_CLIENT_ID and GOOGLE_CLIENT_SECRET',
        { code: 'unauthorized' },
      );
    }

    if (cache && now() < cache.expiresAtMs - 60_000) {
      return cache.accessToken;
    }

    const body = new URLSearchParams({
      grant_type: 'refresh_token',
      refresh_token: deps.refreshToken ?? '',
      client_id: deps.clientId ?? '',
      client_secret: deps.clientSecret ?? '',
    }).toString();

    const resp = await deps.http(deps.tokenUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body,
      signal,
    });
    if (!resp.ok) {
      const text = await resp.text().catch(() => '');
      throw new TransportError(
        `Google token request failed: ${resp.status} ${resp.statusText}${
          text ? ` - ${text}` : ''
        }`,
        { status: resp.status },
      );
    }

    const parsed = GoogleTokenResponseCodec.safeParse(await readJson(resp));
    if (!parsed.success) {
      throw new TransportError('Google token response invalid', {
        status: resp.status,
        cause: parsed.error,
      });
    }

    const expiresInSeconds = Number(parsed.data.expires_in ?? 3600);
    cache = {
      accessToken: parsed.data.access_token,
      expiresAtMs: now() + expiresInSeconds * 1000,
    };
    return cache.accessToken;
  };
}
