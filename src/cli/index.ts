#!/usr/bin/env node
/**
 * miner-launcher CLI
 *
 * Commands:
 * - miner-launcher run    - Validate configuration and launch the miner (default)
 * - miner-launcher print  - Print the miner command line without running it
 * - miner-launcher doctor - Check env file, keys, executable and directories
 */

import { Command } from 'commander';
import { addAllCommands } from './commands/index';

const program = new Command();

program
  .name('miner-launcher')
  .description('Launch the subnet miner from an env file')
  .version('0.1.0');

addAllCommands(program);

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
