#!/usr/bin/env node
/**
 * Testimony CLI - inspect scenario worlds, check statements, question NPCs
 *
 * @module bin/testimony
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { registerCommands } from './commands.js';
import { formatError } from '../src/cli/format.js';

const program = new Command();

program
  .name('testimony')
  .description('Knowledge-consistency engine for murder-mystery NPCs')
  .version('0.2.0')
  .option('-c, --config <path>', 'Config file (default: .testimonyrc in cwd)')
  .option('-v, --verbose', 'Print every verdict and turn');

registerCommands(program);

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(formatError(error)));
  process.exitCode = 1;
});
