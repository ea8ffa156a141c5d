import { type IpInfo, IpInfoCodec } from '../../types/weather.codecs.js';
import { TransportError } from '../../utils/http-result.js';
import { type HttpClient, readJson } from '../http-client.js';

export type LocationDeps = {
  http: HttpClient;
  baseUrl: string;
  token?: string;
};

/** Geolocates the caller's public IP address. */
export async function findLocation(deps: LocationDeps, signal?: AbortSignal): Promise<IpInfo> {
  const url = new URL('json', deps.baseUrl);
  if (deps.token) {
    url.searchParams.set('token', deps.token);
  }
  const response = await deps.http(url, {
    method: 'GET',
    headers: { Accept: 'application/json' },
    signal,
  });
  if (!response.ok) {
    throw new TransportError(`Location lookup failed: ${response.status} ${response.statusText}`, {
      status: response.status,
    });
  }
  const parsed = IpInfoCodec.safeParse(await readJson(response));
  if (!parsed.success) {
    throw new TransportError('Location lookup returned an incomplete payload', {
      code: 'bad_response',
      cause: parsed.error,
    });
  }
  return parsed.data;
}
