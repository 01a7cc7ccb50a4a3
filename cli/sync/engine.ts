/**
 * Sync Engine — runs one extraction pass over the selected Tally streams.
 *
 * Flow:
 *   1. Select streams (plus the parents needed to reach selected children)
 *   2. Resolve organization partitions once, if any selected stream needs them
 *   3. Walk each top-level stream per partition; for every parent record run
 *      each child stream's fetch loop with the record's id
 *   4. Conform records to their schema and append them to <stream>.jsonl
 *   5. Write manifest.json and catalog.json, return sync stats
 */

import type { TapConfig } from '../config.js';
import { createLogger } from '../logger.js';
import {
  ConfigError, readStream, childContext, conformRecord, toJsonSchema,
  setupExport, appendJsonl, writeJson, exportSpinner,
  type FetchFn, type JsonObject, type StreamContext, type StreamDefinition,
} from '../connectors/base/index.js';
import { TALLY_STREAMS, createTallyClient, resolveOrganizationPartitions } from '../connectors/tally.js';

const log = createLogger('sync');

export const DEFAULT_OUT_DIR = './exports/tally';

export interface SyncOptions {
  outDir?: string;
  /** Stream names to emit; defaults to every enabled stream. */
  streams?: string[];
  definitions?: readonly StreamDefinition[];
}

export interface SyncStats {
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  outDir: string;
  streams: string[];
  organizationIds: string[];
  counts: Record<string, number>;
  dataQualityIssues: number;
  error?: string;
}

export interface StreamSelection {
  /** Streams whose records are written. */
  emit: Set<string>;
  /** Streams whose fetch loops run, in definition order. */
  traverse: StreamDefinition[];
}

export interface CatalogEntry {
  stream: string;
  keyProperties: string[];
  parentStream: string | null;
  enabled: boolean;
  schema: JsonObject;
}

export function selectStreams(definitions: readonly StreamDefinition[], names?: readonly string[]): StreamSelection {
  const byName = new Map(definitions.map(d => [d.name, d]));

  let emit: Set<string>;
  if (names && names.length > 0) {
    const unknown = names.filter(n => !byName.has(n));
    if (unknown.length > 0) {
      throw new ConfigError(`Unknown stream(s): ${unknown.join(', ')}. Available: ${[...byName.keys()].join(', ')}`);
    }
    emit = new Set(names);
  } else {
    emit = new Set(definitions.filter(d => d.enabled).map(d => d.name));
  }

  const needed = new Set<string>();
  for (const name of emit) {
    let current = byName.get(name);
    while (current) {
      needed.add(current.name);
      current = current.parent ? byName.get(current.parent.stream) : undefined;
    }
  }

  return { emit, traverse: definitions.filter(d => needed.has(d.name)) };
}

export function buildCatalog(definitions: readonly StreamDefinition[]): { streams: CatalogEntry[] } {
  return {
    streams: definitions.map(d => ({
      stream: d.name,
      keyProperties: [...d.primaryKeys],
      parentStream: d.parent?.stream ?? null,
      enabled: d.enabled,
      schema: toJsonSchema(d.schema),
    })),
  };
}

export async function runSync(config: TapConfig, opts?: SyncOptions): Promise<SyncStats> {
  const startedAt = new Date();
  const outDir = opts?.outDir ?? DEFAULT_OUT_DIR;
  const definitions = opts?.definitions ?? TALLY_STREAMS;
  const counts: Record<string, number> = {};
  let dataQualityIssues = 0;
  let organizationIds: string[] = [];
  let emitted: string[] = [];

  const finish = (error?: string): SyncStats => {
    const finishedAt = new Date();
    return {
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      outDir,
      streams: emitted,
      organizationIds,
      counts,
      dataQualityIssues,
      ...(error !== undefined ? { error } : {}),
    };
  };

  try {
    const selection = selectStreams(definitions, opts?.streams);
    emitted = selection.traverse.filter(d => selection.emit.has(d.name)).map(d => d.name);
    for (const name of emitted) counts[name] = 0;

    const client = createTallyClient(config);
    const fetchFn: FetchFn = (path, options) => client.request(path, options);

    const topLevel = selection.traverse.filter(d => !d.parent);
    const partitions = topLevel.some(d => d.partitioning === 'organization')
      ? await resolveOrganizationPartitions(client, config.organization_ids)
      : [];
    organizationIds = partitions.map(p => p.organizationId);

    const files = setupExport(outDir, emitted);

    const write = (definition: StreamDefinition, raw: JsonObject): void => {
      if (!selection.emit.has(definition.name)) return;
      const { record, issues } = conformRecord(definition.schema, raw);
      if (issues.length > 0) {
        dataQualityIssues++;
        log.warn({ stream: definition.name, id: raw.id, issues }, 'record does not match schema');
      }
      appendJsonl(files[definition.name], record);
      counts[definition.name] = (counts[definition.name] ?? 0) + 1;
    };

    const childrenOf = (definition: StreamDefinition): StreamDefinition[] =>
      selection.traverse.filter(d => d.parent?.stream === definition.name);

    const walk = async (definition: StreamDefinition, context: StreamContext): Promise<void> => {
      const children = childrenOf(definition);
      for await (const raw of readStream(fetchFn, definition, context)) {
        write(definition, raw);
        for (const child of children) {
          if (!child.parent) continue;
          await walk(child, childContext(child.parent, raw));
        }
      }
    };

    for (const definition of topLevel) {
      const spinner = exportSpinner(`Syncing ${definition.name}...`);
      const contexts: StreamContext[] = definition.partitioning === 'organization' ? partitions : [{}];
      try {
        for (const context of contexts) {
          await walk(definition, context);
        }
      } catch (err) {
        spinner.fail(`${definition.name} failed`);
        throw err;
      }

      const summary = [definition, ...childrenOf(definition)]
        .filter(d => selection.emit.has(d.name))
        .map(d => `${counts[d.name] ?? 0} ${d.name}`)
        .join(', ');
      spinner.succeed(summary || `${definition.name} traversed`);
      log.info({ stream: definition.name, counts }, 'stream complete');
    }

    const stats = finish();
    writeJson(outDir, 'catalog.json', buildCatalog(selection.traverse.filter(d => selection.emit.has(d.name))));
    writeJson(outDir, 'manifest.json', {
      source: 'tally',
      exportedAt: stats.finishedAt,
      organizationIds,
      counts,
      dataQualityIssues,
    });
    return stats;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    log.error({ err }, 'sync failed');
    return finish(message);
  }
}
