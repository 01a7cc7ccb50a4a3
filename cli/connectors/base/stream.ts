/**
 * Declarative stream definitions and the per-context fetch loop.
 */

import { createStreamLogger } from '../../logger.js';
import { ApiError, ConfigError, DataError } from './errors.js';
import { fetchSinglePage, paginatePageNumbers } from './pagination.js';
import type { StreamSchema } from './schema.js';
import type { FetchFn, JsonObject, QueryParams, StreamContext } from './types.js';

export interface ParentLink {
  /** Name of the parent stream. */
  stream: string;
  /** Field read from each parent record. */
  key: string;
  /** Context key the value is exposed under in the child's path template. */
  as: string;
}

export interface StreamDefinition {
  name: string;
  /** Path template; `{key}` placeholders are filled from the stream context. */
  path: string;
  recordsPath: string;
  primaryKeys: readonly string[];
  schema: StreamSchema;
  /** Present for page-numbered resources; absent means one request per context. */
  pagination?: {
    pageSize?: number;
    pageSizeParam?: string;
  };
  params?: QueryParams;
  /** 'organization' streams run once per resolved organization id. Ignored for child streams. */
  partitioning: 'organization' | 'none';
  parent?: ParentLink;
  /** Disabled streams are skipped unless selected by name. */
  enabled: boolean;
}

export function fillPath(template: string, context: StreamContext): string {
  return template.replace(/\{(\w+)\}/g, (_match, key: string) => {
    const value = context[key];
    if (value === undefined) {
      throw new ConfigError(`Path ${template} needs "${key}" but the stream context only has: ${Object.keys(context).join(', ') || 'nothing'}`);
    }
    return encodeURIComponent(value);
  });
}

/** Context for one child fetch sequence, derived from one parent record. */
export function childContext(link: ParentLink, record: JsonObject): StreamContext {
  const value = record[link.key];
  if (typeof value !== 'string' && typeof value !== 'number') {
    throw new DataError(`${link.stream} record is missing "${link.key}" needed by its child streams`);
  }
  return { [link.as]: String(value) };
}

/**
 * Raw records for one partition or parent context, in page-then-in-page order.
 * API and data errors abort the sequence and are tagged with the stream name.
 */
export async function* readStream(
  fetchFn: FetchFn,
  definition: StreamDefinition,
  context: StreamContext,
): AsyncGenerator<JsonObject, void, undefined> {
  const path = fillPath(definition.path, context);
  const log = createStreamLogger('stream', definition.name, context);
  const request = { fetch: fetchFn, path, recordsPath: definition.recordsPath, params: definition.params };

  try {
    if (!definition.pagination) {
      const records = await fetchSinglePage(request);
      log.debug({ path, records: records.length }, 'fetched');
      yield* records;
      return;
    }

    let pages = 0;
    for await (const page of paginatePageNumbers({ ...request, ...definition.pagination })) {
      pages++;
      log.debug({ path, page: pages, records: page.length }, 'fetched page');
      yield* page;
    }
  } catch (err) {
    if (err instanceof ApiError || err instanceof DataError) throw err.withResource(definition.name);
    throw err;
  }
}
