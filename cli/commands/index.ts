import type { Command } from 'commander';
import { registerTallyCommands } from './tally.js';
import { registerConfigCommand } from './config.js';

export function registerCommands(program: Command): void {
  registerTallyCommands(program);
  registerConfigCommand(program);
}
