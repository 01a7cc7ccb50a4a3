#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { registerCommands } from './commands/index.js';

const program = new Command();

program
  .name('tally-tap')
  .description('Extract users, invites, forms, questions, submissions and workspaces from Tally')
  .version('0.1.0');

registerCommands(program);

await program.parseAsync();
