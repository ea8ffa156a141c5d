import {
  type CurrentWeatherResponse,
  CurrentWeatherResponseCodec,
  type ForecastDay,
  type ForecastResponse,
  ForecastResponseCodec,
  WeatherApiErrorCodec,
} from '../../types/weather.codecs.js';
import { TransportError } from '../../utils/http-result.js';
import { type HttpClient, readJson } from '../http-client.js';

export const DEFAULT_FORECAST_DAYS = 3;
export const MAX_FORECAST_DAYS = 14;

const DAY_MS = 24 * 60 * 60 * 1000;

export type WeatherApiDeps = {
  http: HttpClient;
  baseUrl: string;
  apiKey?: string;
};

async function getJson(
  deps: WeatherApiDeps,
  path: string,
  params: Record<string, string>,
  signal?: AbortSignal,
): Promise<unknown> {
  if (!deps.apiKey) {
    throw new TransportError('Weather API key is not configured. Set WEATHER_API_KEY', {
      code: 'unauthorized',
    });
  }
  const url = new URL(path, deps.baseUrl);
  url.searchParams.set('key', deps.apiKey);
  for (const [key, value] of Object.entries(params)) {
    url.searchParams.set(key, value);
  }

  const response = await deps.http(url, { method: 'GET', signal });
  const json = await readJson(response);
  if (!response.ok) {
    const apiError = WeatherApiErrorCodec.safeParse(json);
    const detail = apiError.success ? apiError.data.error.message : response.statusText;
    throw new TransportError(`${response.status} ${detail} for ${path}`, {
      status: response.status,
    });
  }
  return json;
}

export async function getCurrentWeather(
  deps: WeatherApiDeps,
  location: string,
  signal?: AbortSignal,
): Promise<CurrentWeatherResponse> {
  const json = await getJson(deps, 'current.json', { q: location, aqi: 'no' }, signal);
  const parsed = CurrentWeatherResponseCodec.safeParse(json);
  if (!parsed.success) {
    throw new TransportError('Unexpected current weather payload', {
      code: 'bad_response',
      cause: parsed.error,
    });
  }
  return parsed.data;
}

function parseLocalDate(value: string): Date {
  const [year = 0, month = 1, day = 1] = value.split('-').map(Number);
  return new Date(year, month - 1, day);
}

/**
 * Number of days to request so the forecast reaches `date` (inclusive of
 * today). Dates in the past count by distance too, as the API only serves
 * today onward and the first day is then used.
 */
export function forecastDaysFor(date: string | undefined, now: Date): number {
  if (!date) {
    return DEFAULT_FORECAST_DAYS;
  }
  const today = new Date(now.getFullYear(), now.getMonth(), now.getDate());
  const distance = Math.abs(Math.round((parseLocalDate(date).getTime() - today.getTime()) / DAY_MS));
  return Math.min(distance + 1, MAX_FORECAST_DAYS);
}

export function pickForecastDay(
  response: ForecastResponse,
  date: string | undefined,
): ForecastDay | undefined {
  const days = response.forecast.forecastday;
  if (!date) {
    return days[0];
  }
  return days.find((d) => d.date === date) ?? days[0];
}

export async function getForecast(
  deps: WeatherApiDeps,
  location: string,
  options: { date?: string; now: Date },
  signal?: AbortSignal,
): Promise<ForecastResponse> {
  const days = forecastDaysFor(options.date, options.now);
  const json = await getJson(
    deps,
    'forecast.json',
    { q: location, days: String(days), aqi: 'no' },
    signal,
  );
  const parsed = ForecastResponseCodec.safeParse(json);
  if (!parsed.success) {
    throw new TransportError('Unexpected forecast payload', {
      code: 'bad_response',
      cause: parsed.error,
    });
  }
  return parsed.data;
}
