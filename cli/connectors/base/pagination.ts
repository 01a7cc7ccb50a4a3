/**
 * Page-number pagination for REST resources.
 *
 * The token starts at `startPage` and is left off the first request. Each page
 * that yields at least one record advances the token by one; the first empty
 * page ends the sequence.
 */

import { extractRecords } from './records.js';
import type { FetchFn, JsonObject, QueryParams } from './types.js';

export interface PageRequest {
  fetch: FetchFn;
  path: string;
  /** Pointer to the record array in each page body, e.g. "$.items[*]". */
  recordsPath: string;
  /** Static params sent on every request (e.g. filter=all). */
  params?: QueryParams;
}

export interface PageNumberOptions extends PageRequest {
  /** Sent as `pageSizeParam` on every request when set. */
  pageSize?: number;
  pageSizeParam?: string;
  pageParam?: string;
  startPage?: number;
}

export function pageParams(opts: PageNumberOptions, page: number): QueryParams {
  const { params = {}, pageSize, pageSizeParam = 'limit', pageParam = 'page', startPage = 1 } = opts;
  const result: QueryParams = { ...params };
  if (pageSize !== undefined) result[pageSizeParam] = pageSize;
  if (page !== startPage) result[pageParam] = page;
  return result;
}

/** Yields each non-empty page's records, in page order. */
export async function* paginatePageNumbers(opts: PageNumberOptions): AsyncGenerator<JsonObject[], void, undefined> {
  const { fetch: fetchFn, path, recordsPath, startPage = 1 } = opts;
  let page = startPage;

  while (true) {
    const body = await fetchFn(path, { params: pageParams(opts, page) });
    const records = extractRecords(body, recordsPath);
    if (records.length === 0) return;

    yield records;
    page++;
  }
}

/** One request, one page: for resources the API returns whole. */
export async function fetchSinglePage(opts: PageRequest): Promise<JsonObject[]> {
  const { fetch: fetchFn, path, recordsPath, params } = opts;
  const body = await fetchFn(path, params && Object.keys(params).length > 0 ? { params } : undefined);
  return extractRecords(body, recordsPath);
}
