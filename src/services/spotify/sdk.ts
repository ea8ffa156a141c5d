/**
 * Spotify SDK client factory.
 * Builds a user-authenticated client from pre-issued tokens in configuration.
 */

import {
  type AccessToken,
  type IAuthStrategy,
  type IValidateResponses,
  type SdkConfiguration,
  SpotifyApi,
} from '@spotify/web-api-ts-sdk';
import { statusOf, TransportError } from '../../utils/http-result.js';
import { logger } from '../../utils/logger.js';
import type { HttpClient } from '../http-client.js';
import { refreshSpotifyTokens } from './oauth.js';

// ---------------------------------------------------------------------------
// Response Validator
// ---------------------------------------------------------------------------

const responseValidator: IValidateResponses = {
  async validateResponse(response: Response): Promise<void> {
    if (response.status === 204) {
      return;
    }
    if (response.ok) {
      return;
    }
    const body = await response.text().catch(() => '');
    throw new TransportError(
      `Spotify request failed: ${response.status} ${response.statusText}${
        body ? ` - ${body}` : ''
      }`,
      { status: response.status },
    );
  },
};

const sdkOptions = { responseValidator } as const;

export type SpotifyCredentials = {
  http: HttpClient;
  accountsUrl: string;
  clientId?: string;
  clientSecret?: string;
  accessToken?: string;
  refreshToken?: string;
  now?: () => number;
};

export function createSpotifyUserClient(
  credentials: SpotifyCredentials,
  fetchImpl?: typeof fetch,
): SpotifyApi {
  const options = fetchImpl ? { ...sdkOptions, fetch: fetchImpl } : sdkOptions;
  return new SpotifyApi(new ConfiguredTokenStrategy(credentials), options);
}

// ---------------------------------------------------------------------------
// Configured-token Auth Strategy
// ---------------------------------------------------------------------------

/**
 * Auth strategy over tokens supplied through configuration.
 * Refreshes through the accounts service when a refresh token is available.
 */
export class ConfiguredTokenStrategy implements IAuthStrategy {
  private current: AccessToken | null;
  private readonly credentials: SpotifyCredentials;
  private readonly now: () => number;

  constructor(credentials: SpotifyCredentials) {
    this.credentials = credentials;
    this.now = credentials.now ?? (() => Date.now());
    this.current = credentials.accessToken
      ? {
          access_token: credentials.accessToken,
          refresh_token: credentials.refreshToken ?? '',
          token_type: 'Bearer',
          expires_in: 3600,
          // Lifetime of a pasted token is unknown; with a refresh token, refresh right away.
          expires: credentials.refreshToken ? 0 : this.now() + 3600 * 1000,
        }
      : null;
  }

  public setConfiguration(_configuration: SdkConfiguration): void {
    // Nothing to configure: tokens come from the constructor.
  }

  public async getOrCreateAccessToken(): Promise<AccessToken> {
    const now = this.now();

    if (!this.current || (this.current.expires ?? 0) <= now) {
      if (this.credentials.refreshToken) {
        return this.refreshToken();
      }
      if (this.current) {
        return this.current;
      }
      throw new TransportError(
        'Spotify credentials are not configured. Set SPOTIFY_ACCESS_TOKEN or SPOTIFY_REFRESH_TOKEN',
        { code: 'unauthorized' },
      );
    }

    // Proactive refresh if within 30 seconds of expiry
    if ((this.current.expires ?? 0) - now < 30_000 && this.credentials.refreshToken) {
      try {
        return await this.refreshToken();
      } catch (error) {
        logger.warning('spotify_sdk', {
          message: 'Silent refresh failed, continuing with existing token',
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return this.current;
  }

  public async getAccessToken(): Promise<AccessToken | null> {
    return this.current;
  }

  public removeAccessToken(): void {
    this.current = null;
  }

  private async refreshToken(): Promise<AccessToken> {
    const refreshToken = this.current?.refresh_token || this.credentials.refreshToken || '';

    const refreshed = await refreshSpotifyTokens({
      http: this.credentials.http,
      accountsUrl: this.credentials.accountsUrl,
      clientId: this.credentials.clientId,
      clientSecret: this.credentials.clientSecret,
      refreshToken,
    }).catch((error: unknown) => {
      const reason = error instanceof Error ? error.message : String(error);
      throw new TransportError(`Spotify token refresh failed: ${reason}`, {
        status: statusOf(error),
        code: 'unauthorized',
        cause: error,
      });
    });
    const accessToken = refreshed.access_token?.trim();

    if (!accessToken) {
      throw new TransportError('Spotify refresh payload missing access_token', {
        code: 'unauthorized',
      });
    }

    const expiresInSeconds = Number(refreshed.expires_in ?? 3600);
    this.current = {
      access_token: accessToken,
      refresh_token: refreshed.refresh_token?.trim() || refreshToken,
      token_type: refreshed.token_type ?? 'Bearer',
      expires_in: expiresInSeconds,
      expires: this.now() + expiresInSeconds * 1000,
    };

    logger.debug('spotify_sdk', { message: 'Refreshed Spotify access token' });
    return this.current;
  }
}
