import type { Command } from 'commander';
import chalk from 'chalk';
import { TALLY_STREAMS, tallyVerifyConnection } from '../connectors/tally.js';
import { buildCatalog, runSync, DEFAULT_OUT_DIR } from '../sync/engine.js';
import { withConnectionOptions, resolveConfig, parseList, type ConnectionOptions } from './shared.js';

export function registerTallyCommands(program: Command): void {
  withConnectionOptions(
    program
      .command('verify')
      .description('Test Tally API connectivity'),
  ).action(async (opts: ConnectionOptions) => {
    const config = resolveConfig(opts);
    console.log(chalk.cyan('\nVerifying Tally connection...\n'));

    const result = await tallyVerifyConnection(config);
    if (result.success) {
      console.log(chalk.green('  ✓ Connection successful'));
      console.log(`  User:         ${result.userName}`);
      if (result.email) console.log(`  Email:        ${result.email}`);
      if (result.organizationId) console.log(`  Organization: ${result.organizationId}`);
      console.log('');
    } else {
      console.error(chalk.red(`  ✗ Connection failed: ${result.error}\n`));
      process.exit(1);
    }
  });

  program
    .command('discover')
    .description('Print the stream catalog (names, keys, JSON Schemas)')
    .option('--all', 'Include streams that are disabled by default', false)
    .action((opts: { all: boolean }) => {
      const definitions = opts.all ? TALLY_STREAMS : TALLY_STREAMS.filter(d => d.enabled);
      process.stdout.write(JSON.stringify(buildCatalog(definitions), null, 2) + '\n');
    });

  withConnectionOptions(
    program
      .command('sync')
      .description('Extract Tally streams into JSONL files')
      .option('-o, --out <dir>', 'Output directory', DEFAULT_OUT_DIR)
      .option('--streams <names>', 'Comma-separated streams to sync (default: all enabled)'),
  ).action(async (opts: ConnectionOptions & { out: string; streams?: string }) => {
    const config = resolveConfig(opts);
    console.log(chalk.cyan(`\nSyncing Tally → ${opts.out}\n`));

    const stats = await runSync(config, { outDir: opts.out, streams: parseList(opts.streams) });
    if (stats.error) {
      console.error(chalk.red(`\nSync error: ${stats.error}`));
      process.exit(1);
    }

    console.log(chalk.green('\nSync complete:'));
    console.log(`  Organizations: ${stats.organizationIds.join(', ') || 'n/a'}`);
    console.log(`  Duration:      ${stats.durationMs}ms`);
    for (const stream of stats.streams) {
      console.log(`  ${`${stream}:`.padEnd(15)}${stats.counts[stream] ?? 0}`);
    }
    if (stats.dataQualityIssues > 0) {
      console.log(chalk.yellow(`  ${stats.dataQualityIssues} record(s) did not match their schema (see log)`));
    }
    console.log(chalk.green(`\nExport written → ${stats.outDir}/manifest.json`));
  });
}
