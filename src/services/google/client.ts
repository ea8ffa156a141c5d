import type { z } from 'zod';
import { GoogleErrorCodec } from '../../types/google.codecs.js';
import { TransportError } from '../../utils/http-result.js';
import { type HttpClient, readJson } from '../http-client.js';
import type { GoogleTokenSource } from './auth.js';

type QueryValue = string | number | boolean | string[] | undefined;

export type GoogleRequestOptions = {
  query?: Record<string, QueryValue>;
  body?: unknown;
  signal?: AbortSignal;
};

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * Authenticated JSON client for one Google REST API (Gmail, Calendar).
 * Responses are validated against the given codec; failures surface as
 * `TransportError` with the status mapped to an error code.
 */
export class GoogleApiClient {
  constructor(
    private readonly http: HttpClient,
    private readonly baseUrl: string,
    private readonly getToken: GoogleTokenSource,
  ) {}

  async request<T>(
    codec: z.ZodType<T, z.ZodTypeDef, unknown>,
    method: HttpMethod,
    path: string,
    options: GoogleRequestOptions = {},
  ): Promise<T> {
    const json = await this.send(method, path, options);
    const parsed = codec.safeParse(json);
    if (!parsed.success) {
      throw new TransportError(`Unexpected response from ${method} ${path}`, {
        code: 'bad_response',
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  async send(
    method: HttpMethod,
    path: string,
    options: GoogleRequestOptions = {},
  ): Promise<unknown> {
    const token = await this.getToken(options.signal);
    const url = buildUrl(this.baseUrl, path, options.query);

    const headers: Record<string, string> = {
      Authorization: `Bearer ${token}`,
      Accept: 'application/json',
    };
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    const response = await this.http(url, {
      method,
      headers,
      body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
      signal: options.signal,
    });

    if (!response.ok) {
      const detail = await describeError(response);
      throw new TransportError(
        `Google API ${method} ${path} returned ${response.status}${detail ? `: ${detail}` : ''}`,
        { status: response.status },
      );
    }

    return readJson(response);
  }
}

export function buildUrl(
  baseUrl: string,
  path: string,
  query: Record<string, QueryValue> = {},
): URL {
  const url = new URL(path.replace(/^\/+/, ''), baseUrl);
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined) {
      continue;
    }
    if (Array.isArray(value)) {
      for (const item of value) {
        url.searchParams.append(key, item);
      }
    } else {
      url.searchParams.set(key, String(value));
    }
  }
  return url;
}

async function describeError(response: Response): Promise<string> {
  const text = await response.text().catch(() => '');
  if (!text) {
    return response.statusText;
  }
  try {
    const parsed = GoogleErrorCodec.safeParse(JSON.parse(text));
    if (parsed.success && parsed.data.error.message) {
      return parsed.data.error.message;
    }
  } catch {
    // not JSON; fall through to the raw body
  }
  return text;
}
