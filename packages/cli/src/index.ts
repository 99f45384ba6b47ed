#!/usr/bin/env node

import { Command } from 'commander';
import pc from 'picocolors';
import { show } from './commands/show';

const program = new Command();

program
  .name('changetree')
  .description('Browse archive diff output as a tree of changed paths')
  .version('0.1.0');

program
  .argument('[file]', 'Diff output file, - for stdin', '-')
  .option('--json-lines', 'Input is JSON lines diff output')
  .option('--mode <mode>', 'Display mode: tree, simplified or flat')
  .option('--sort <column>', 'Sort by name, change or size')
  .option('--desc', 'Sort in descending order')
  .option('--folders-on-top', 'Keep directories above files')
  .option('--no-folders-on-top', "Don't keep directories above files")
  .option('--config <path>', 'Config file (default: .changetree/config.json)')
  .option('--verbose', 'Print debug output')
  .action(async (file: string, options: unknown) => {
    try {
      await show(file, options);
    } catch (error) {
      console.error(pc.red('Error:'), error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

program.parse();
