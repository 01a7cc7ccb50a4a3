import type { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, type TapConfig } from '../config.js';
import { ConfigError } from '../connectors/base/errors.js';

export interface ConnectionOptions {
  config?: string;
  apiKey?: string;
  organizationId: string[];
  baseUrl?: string;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/** Attach the options every API-facing command takes. */
export function withConnectionOptions(command: Command): Command {
  return command
    .option('-c, --config <file>', 'JSON config file (default: ~/.tally-tap/config.json if present)')
    .option('--api-key <key>', 'Tally API key (or TALLY_API_KEY env)')
    .option('--organization-id <id>', 'Organization to sync; repeat for several (or TALLY_ORGANIZATION_IDS env)', collect, [])
    .option('--base-url <url>', 'API base URL (or TALLY_BASE_URL env)');
}

/** Load config or exit with the validation errors. */
export function resolveConfig(opts: ConnectionOptions): TapConfig {
  try {
    return loadConfig({
      configPath: opts.config,
      overrides: {
        apiKey: opts.apiKey,
        organizationIds: opts.organizationId,
        baseUrl: opts.baseUrl,
      },
    });
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(chalk.red(err.message));
      process.exit(1);
    }
    throw err;
  }
}

export function parseList(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  return value.split(',').map(s => s.trim()).filter(Boolean);
}
