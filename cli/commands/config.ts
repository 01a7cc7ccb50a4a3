import type { Command } from 'commander';
import chalk from 'chalk';
import { getConfigPath, maskConfig } from '../config.js';
import { withConnectionOptions, resolveConfig, type ConnectionOptions } from './shared.js';

export function registerConfigCommand(program: Command): void {
  const config = program
    .command('config')
    .description('Inspect tally-tap configuration');

  withConnectionOptions(
    config
      .command('show')
      .description('Show the effective configuration (API key masked)'),
  ).action((opts: ConnectionOptions) => {
    const cfg = resolveConfig(opts);
    console.log(chalk.cyan('Default config path:'), getConfigPath());
    console.log(JSON.stringify(maskConfig(cfg), null, 2));
  });
}
