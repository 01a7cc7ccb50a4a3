import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { z } from 'zod';
import { ConfigError } from './connectors/base/errors.js';
import { formatIssue } from './connectors/base/schema.js';

export const DEFAULT_BASE_URL = 'https://api.tally.so';

export const configSchema = z.object({
  api_key: z.string({ error: 'api_key is required' }).min(1, 'api_key must not be empty'),
  organization_ids: z.array(z.string().min(1)).default([]),
  base_url: z.url().default(DEFAULT_BASE_URL),
});

export type TapConfig = z.infer<typeof configSchema>;

/** Values given on the command line; they win over file and environment. */
export interface ConfigOverrides {
  apiKey?: string;
  organizationIds?: string[];
  baseUrl?: string;
}

export interface LoadConfigOptions {
  /** Explicit config file; must exist. Defaults to ~/.tally-tap/config.json when present. */
  configPath?: string;
  overrides?: ConfigOverrides;
  env?: NodeJS.ProcessEnv;
}

const CONFIG_DIR = join(homedir(), '.tally-tap');
const CONFIG_PATH = join(CONFIG_DIR, 'config.json');

export function getConfigPath(): string {
  return CONFIG_PATH;
}

function readConfigFile(path: string, required: boolean): Record<string, unknown> {
  if (!existsSync(path)) {
    if (required) throw new ConfigError(`Config file not found: ${path}`);
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Config file ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`Config file ${path} must contain a JSON object`);
  }
  return { ...parsed };
}

function fromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  if (env.TALLY_API_KEY) values.api_key = env.TALLY_API_KEY;
  if (env.TALLY_ORGANIZATION_IDS) {
    values.organization_ids = env.TALLY_ORGANIZATION_IDS.split(',').map(id => id.trim()).filter(Boolean);
  }
  if (env.TALLY_BASE_URL) values.base_url = env.TALLY_BASE_URL;
  return values;
}

function fromOverrides(overrides: ConfigOverrides): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  if (overrides.apiKey) values.api_key = overrides.apiKey;
  if (overrides.organizationIds && overrides.organizationIds.length > 0) {
    values.organization_ids = overrides.organizationIds;
  }
  if (overrides.baseUrl) values.base_url = overrides.baseUrl;
  return values;
}

/**
 * Merge config file, environment and command-line values (later wins) and validate.
 */
export function loadConfig(opts: LoadConfigOptions = {}): TapConfig {
  const file = opts.configPath
    ? readConfigFile(opts.configPath, true)
    : readConfigFile(CONFIG_PATH, false);

  const merged = {
    ...file,
    ...fromEnv(opts.env ?? process.env),
    ...fromOverrides(opts.overrides ?? {}),
  };

  const result = configSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration:\n${result.error.issues.map(i => `  - ${formatIssue(i)}`).join('\n')}`);
  }
  return result.data;
}

/** Config with the API key reduced to its last four characters, for display. */
export function maskConfig(config: TapConfig): Record<string, unknown> {
  const { api_key, ...rest } = config;
  return { ...rest, api_key: api_key.length > 4 ? `****${api_key.slice(-4)}` : '****' };
}
