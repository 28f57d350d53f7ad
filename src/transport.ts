import { KeyEnvError } from './errors.js';
import type { Logger } from './logger.js';
import { ApiErrorSchema } from './schemas.js';

export const SDK_VERSION = '1.0.0';
const API_PREFIX = '/api/v1';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface TransportOptions {
  baseUrl: string;
  token: string;
  timeout: number;
  logger: Logger;
}

/**
 * Sends authenticated JSON requests to the KeyEnv API.
 *
 * Resolves with the raw response body on 2xx; every other outcome rejects
 * with a {@link KeyEnvError}. Requests are never retried.
 */
export class HttpTransport {
  constructor(private readonly options: TransportOptions) {}

  async request(method: HttpMethod, path: string, body?: unknown): Promise<string> {
    const { logger } = this.options;
    logger.debug('request', { method, path });

    const { status, ok, text } = await this.send(method, path, body);
    logger.debug('response', { method, path, status });

    if (!ok) {
      throw errorFromResponse(status, text);
    }
    return text;
  }

  private async send(
    method: HttpMethod,
    path: string,
    body: unknown,
  ): Promise<{ status: number; ok: boolean; text: string }> {
    const { baseUrl, token, timeout } = this.options;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
      const response = await fetch(`${baseUrl}${API_PREFIX}${path}`, {
        method,
        headers: {
          'Authorization': `Bearer ${token}`,
          'Content-Type': 'application/json',
          'Accept': 'application/json',
          'User-Agent': `keyenv-client-node/${SDK_VERSION}`,
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });
      return { status: response.status, ok: response.ok, text: await response.text() };
    } catch (error) {
      throw toNetworkError(error, controller.signal.aborted, timeout);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  get(path: string): Promise<string> {
    return this.request('GET', path);
  }

  post(path: string, body?: unknown): Promise<string> {
    return this.request('POST', path, body);
  }

  put(path: string, body?: unknown): Promise<string> {
    return this.request('PUT', path, body);
  }

  delete(path: string): Promise<string> {
    return this.request('DELETE', path);
  }
}

function toNetworkError(error: unknown, timedOut: boolean, timeout: number): KeyEnvError {
  if (timedOut) {
    return new KeyEnvError(`Network error: request timed out after ${timeout}ms`, 0, undefined, undefined, {
      cause: error,
    });
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new KeyEnvError(`Network error: ${reason}`, 0, undefined, undefined, { cause: error });
}

/** Map a non-2xx response to an error carrying the API's message and code. */
export function errorFromResponse(status: number, text: string): KeyEnvError {
  if (text === '') {
    return new KeyEnvError(`HTTP ${status}`, status);
  }

  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch {
    return new KeyEnvError(text, status);
  }

  const parsed = ApiErrorSchema.safeParse(payload);
  if (!parsed.success) {
    return new KeyEnvError('Unknown error', status);
  }
  const { error, code, details } = parsed.data;
  return new KeyEnvError(error ?? 'Unknown error', status, code, details);
}
