/**
 * Shared HTTP client with automatic retry on rate-limit responses.
 * Rate-limit retry lives here and only here; callers see a parsed body, an ApiError or a DataError.
 */

import { createLogger } from '../../logger.js';
import { ApiError, DataError } from './errors.js';
import type { ClientConfig, QueryParams, RequestOptions } from './types.js';

const log = createLogger('client');

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export interface ConnectorClient {
  request(path: string, options?: RequestOptions): Promise<unknown>;
}

export function buildUrl(baseUrl: string, path: string, params?: QueryParams): string {
  const url = path.startsWith('http') ? path : `${baseUrl}${path}`;
  if (!params || Object.keys(params).length === 0) return url;

  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    search.append(key, String(value));
  }
  const separator = url.includes('?') ? '&' : '?';
  return `${url}${separator}${search.toString()}`;
}

export function createClient(config: ClientConfig): ConnectorClient {
  const {
    baseUrl,
    authHeaders,
    sourceName,
    maxRetries = 5,
    defaultRetryAfterSeconds = 10,
    rateLimitStatuses = [429],
  } = config;

  async function request(path: string, options?: RequestOptions): Promise<unknown> {
    const url = buildUrl(baseUrl, path, options?.params);
    let retries = 0;

    while (true) {
      const headers: Record<string, string> = {
        Accept: 'application/json',
        ...(await authHeaders()),
      };

      log.debug({ url }, 'request');
      const res = await fetch(url, { method: 'GET', headers });

      if (rateLimitStatuses.includes(res.status)) {
        const rawRetryAfter = parseInt(res.headers.get('Retry-After') ?? String(defaultRetryAfterSeconds), 10);
        const retryAfter = isNaN(rawRetryAfter) ? defaultRetryAfterSeconds : rawRetryAfter;
        if (retries >= maxRetries) {
          throw new ApiError({
            source: sourceName,
            status: res.status,
            statusText: `rate limit exceeded after ${maxRetries} retries`,
            url,
          });
        }
        retries++;
        log.warn({ url, status: res.status, retryAfter, attempt: retries }, 'rate limited, retrying');
        await sleep(retryAfter * 1000);
        continue;
      }

      if (!res.ok) {
        const errorBody = await res.text().catch(() => '');
        throw new ApiError({
          source: sourceName,
          status: res.status,
          statusText: res.statusText,
          url,
          body: errorBody,
        });
      }

      if (res.status === 204) return null;
      const text = await res.text();
      try {
        return JSON.parse(text);
      } catch {
        throw new DataError(`${sourceName} returned a non-JSON body for ${url}`);
      }
    }
  }

  return { request };
}
