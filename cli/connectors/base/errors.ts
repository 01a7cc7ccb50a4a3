/**
 * Error taxonomy shared by the client, the fetch loop and the sync engine.
 * Nothing below the engine catches these; they abort the run.
 */

export class ConnectorError extends Error {
  /** Stream whose fetch failed; filled in by the fetch loop. */
  resource?: string;

  constructor(message: string) {
    super(message);
    this.name = 'ConnectorError';
  }

  withResource(resource: string): this {
    if (this.resource) return this;
    this.resource = resource;
    this.message = `[${resource}] ${this.message}`;
    return this;
  }
}

/** Non-2xx response from the API (after any rate-limit retries). */
export class ApiError extends ConnectorError {
  readonly source: string;
  readonly status: number;
  readonly statusText: string;
  readonly url: string;
  readonly body: string;

  constructor(opts: { source: string; status: number; statusText: string; url: string; body?: string }) {
    const excerpt = opts.body ? ` — ${opts.body.slice(0, 200)}` : '';
    super(`${opts.source} API error: ${opts.status} ${opts.statusText} for ${opts.url}${excerpt}`);
    this.name = 'ApiError';
    this.source = opts.source;
    this.status = opts.status;
    this.statusText = opts.statusText;
    this.url = opts.url;
    this.body = opts.body ?? '';
  }
}

/** Response body that is not JSON or cannot be turned into records. */
export class DataError extends ConnectorError {
  constructor(message: string) {
    super(message);
    this.name = 'DataError';
  }
}

export class ConfigError extends ConnectorError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** The current-user lookup returned no organization to sync. */
export class NoOrganizationError extends ConnectorError {
  constructor(message = 'No organization id found: configure organization_ids or check the API key owner') {
    super(message);
    this.name = 'NoOrganizationError';
  }
}
