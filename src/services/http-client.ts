import { TransportError } from '../utils/http-result.js';
import { logger } from '../utils/logger.js';

export type HttpClientInput = string | URL;
export type HttpClient = (input: HttpClientInput, init?: RequestInit) => Promise<Response>;

export interface HttpClientOptions {
  baseHeaders?: Record<string, string>;
  timeout?: number;
  /** Total attempts, including the first one. */
  retries?: number;
  retryDelay?: number;
  fetchImpl?: typeof fetch;
}

export function createHttpClient(options: HttpClientOptions = {}): HttpClient {
  const {
    baseHeaders = {},
    timeout = 30000,
    retries = 1,
    retryDelay = 1000,
    fetchImpl = fetch,
  } = options;

  return async (input: HttpClientInput, init?: RequestInit): Promise<Response> => {
    const url = typeof input === 'string' ? input : input.toString();
    const method = init?.method || 'GET';

    logger.debug('http_client', { message: 'HTTP request start', url, method });

    for (let attempt = 1; attempt <= retries; attempt++) {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeout);
      const onAbort = () => controller.abort();
      init?.signal?.addEventListener('abort', onAbort, { once: true });

      try {
        const response = await fetchImpl(url, {
          ...init,
          headers: { ...baseHeaders, ...toHeaderRecord(init?.headers) },
          signal: controller.signal,
        });

        if (response.ok || attempt === retries || response.status < 500) {
          logger.debug('http_client', {
            message: 'HTTP request completed',
            url,
            method,
            status: response.status,
            attempt,
          });
          return response;
        }

        logger.warning('http_client', {
          message: 'HTTP request failed, retrying',
          url,
          method,
          status: response.status,
          attempt,
        });
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        if (attempt === retries || init?.signal?.aborted) {
          logger.error('http_client', {
            message: 'HTTP request failed',
            url,
            method,
            error: reason,
            attempts: attempt,
          });
          throw new TransportError(`${method} ${url} failed: ${reason}`, {
            cause: error,
          });
        }
        logger.warning('http_client', {
          message: 'HTTP error, retrying',
          url,
          method,
          error: reason,
          attempt,
        });
      } finally {
        clearTimeout(timeoutId);
        init?.signal?.removeEventListener('abort', onAbort);
      }

      const delay = retryDelay * 2 ** (attempt - 1);
      await new Promise((r) => setTimeout(r, delay));
    }

    throw new TransportError(`${method} ${url} failed: retry loop exhausted`);
  };
}

function toHeaderRecord(headers: HeadersInit | undefined): Record<string, string> {
  if (!headers) {
    return {};
  }
  return Object.fromEntries(new Headers(headers).entries());
}

/** Reads a JSON body, treating an empty body (e.g. 204) as `null`. */
export async function readJson(response: Response): Promise<unknown> {
  const text = await response.text();
  if (!text) {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new TransportError('Response body is not valid JSON', {
      status: response.status,
      cause: error,
    });
  }
}
