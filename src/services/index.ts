import type { Config } from '../config/env.js';
import { createGoogleTokenSource } from './google/auth.js';
import { GoogleApiClient } from './google/client.js';
import { createHttpClient } from './http-client.js';
import { searchTracks } from './spotify/catalog.js';
import { createDesktopLauncher } from './spotify/desktop.js';
import type { PlaybackDeps } from './spotify/playback.js';
import { listDevices, playTrack } from './spotify/player.js';
import { createSpotifyUserClient } from './spotify/sdk.js';
import type { LocationDeps } from './weather/location.js';
import type { WeatherApiDeps } from './weather/weather-api.js';

/**
 * Pre-authenticated clients handed to every tool invocation.
 * Built once per process; tools never reach for a global client.
 */
export type Services = {
  gmail: GoogleApiClient;
  calendar: GoogleApiClient;
  calendarTimeZone: string;
  playback: PlaybackDeps;
  weather: WeatherApiDeps;
  location: LocationDeps;
  now: () => Date;
};

export function createServices(config: Config): Services {
  const userAgent = `agent-tools-mcp/${config.MCP_VERSION}`;

  const apiHttp = createHttpClient({
    baseHeaders: { 'User-Agent': userAgent },
    timeout: config.HTTP_TIMEOUT_MS,
    retries: config.HTTP_RETRIES,
  });

  const accountsHttp = createHttpClient({
    baseHeaders: { 'User-Agent': userAgent },
    timeout: 15000,
    retries: 1,
  });

  const googleToken = createGoogleTokenSource({
    http: accountsHttp,
    tokenUrl: config.GOOGLE_TOKEN_URL,
    accessToken: config.GOOGLE_ACCESS_TOKEN,
    refreshToken: config.GOOGLE_REFRESH_TOKEN,
    clientId: config.GOOGLE_CLIENT_ID,
    clientSecret: config.GOOGLE_CLIENT_SECRET,
  });

  const spotify = createSpotifyUserClient({
    http: accountsHttp,
    accountsUrl: config.SPOTIFY_ACCOUNTS_URL,
    clientId: config.SPOTIFY_CLIENT_ID,
    clientSecret: config.SPOTIFY_CLIENT_SECRET,
    accessToken: config.SPOTIFY_ACCESS_TOKEN,
    refreshToken: config.SPOTIFY_REFRESH_TOKEN,
  });

  return {
    gmail: new GoogleApiClient(apiHttp, config.GMAIL_API_URL, googleToken),
    calendar: new GoogleApiClient(apiHttp, config.CALENDAR_API_URL, googleToken),
    calendarTimeZone: config.CALENDAR_DEFAULT_TIMEZONE,
    playback: {
      search: (query, type, limit) => searchTracks(spotify, query, type, limit),
      listDevices: () => listDevices(spotify),
      play: (deviceId, trackUri) => playTrack(spotify, deviceId, trackUri),
      launchDesktopClient: createDesktopLauncher({ command: config.SPOTIFY_DESKTOP_COMMAND }),
      searchLimit: config.SPOTIFY_SEARCH_LIMIT,
      launchDelayMs: config.SPOTIFY_LAUNCH_DELAY_MS,
    },
    weather: {
      http: apiHttp,
      baseUrl: config.WEATHER_API_URL,
      apiKey: config.WEATHER_API_KEY,
    },
    location: {
      http: apiHttp,
      baseUrl: config.IPINFO_URL,
      token: config.IPINFO_TOKEN,
    },
    now: () => new Date(),
  };
}
