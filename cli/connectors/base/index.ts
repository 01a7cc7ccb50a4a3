export type { AuthHeaderFn, ClientConfig, RequestOptions, QueryParams, FetchFn, JsonObject, StreamContext } from './types.js';
export { createClient, buildUrl, type ConnectorClient } from './client.js';
export { ConnectorError, ApiError, DataError, ConfigError, NoOrganizationError } from './errors.js';
export { extractRecords, isJsonObject } from './records.js';
export { paginatePageNumbers, fetchSinglePage, pageParams } from './pagination.js';
export { t, conformRecord, toJsonSchema, type StreamSchema, type ConformResult } from './schema.js';
export { readStream, fillPath, childContext, type StreamDefinition, type ParentLink } from './stream.js';
export { setupExport, appendJsonl, writeJson, exportSpinner } from './export-setup.js';
