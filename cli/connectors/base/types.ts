/**
 * Shared types for connector base modules.
 */

/** Function that returns auth headers (sync or async for token refresh). */
export type AuthHeaderFn = () => Record<string, string> | Promise<Record<string, string>>;

/** Configuration for createClient(). */
export interface ClientConfig {
  baseUrl: string;
  authHeaders: AuthHeaderFn;
  /** Source name for error messages (e.g. "Tally"). */
  sourceName: string;
  /** Max retry attempts on rate-limit (default: 5). */
  maxRetries?: number;
  /** Default Retry-After seconds when header is missing (default: 10). */
  defaultRetryAfterSeconds?: number;
  /** HTTP status codes treated as rate-limit (default: [429]). */
  rateLimitStatuses?: number[];
}

export type QueryParams = Record<string, string | number>;

/** Options for individual GET requests. */
export interface RequestOptions {
  /** Query string parameters, appended in insertion order. */
  params?: QueryParams;
}

/** Fetch function matching ConnectorClient.request, so paginators can be fed a stub. */
export type FetchFn = (path: string, options?: RequestOptions) => Promise<unknown>;

export type JsonObject = Record<string, unknown>;

/** Partition or parent context used to fill a stream's path template. */
export type StreamContext = Record<string, string>;
