#!/usr/bin/env node

/**
 * dj-scaffold CLI
 * Scaffolds Django projects and applications, with backup and restore of
 * the configuration files it edits
 */

import { Command } from 'commander';
import { failCommand } from './core/index.js';
import { registerAllCommands } from './cli/register-all.js';

const program = new Command();

program
  .name('dj-scaffold')
  .description('Scaffold layered Django projects and applications')
  .version('1.0.0')
  .option('--verbose', 'Show debug output and error stacks')
  .option('-c, --config <file>', 'Config file (default: .djscaffoldrc.json or dj-scaffold.config.json)');

registerAllCommands(program);

program.parseAsync(process.argv).catch((error: unknown) => {
  failCommand('dj-scaffold failed', error);
});
