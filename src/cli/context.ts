import type { Command } from 'commander';
import { loadConfig, logger } from '../core/index.js';
import type { CommandContext } from '../commands/index.js';

export interface GlobalOptions {
  verbose?: boolean;
  config?: string;
}

function readGlobalOptions(command: Command): GlobalOptions {
  const opts = command.optsWithGlobals();
  return {
    verbose: opts.verbose === true,
    config: typeof opts.config === 'string' ? opts.config : undefined,
  };
}

/**
 * Build the command context from the global `--verbose` and `--config`
 * options.
 */
export async function createCommandContext(command: Command, cwd: string = process.cwd()): Promise<CommandContext> {
  const globals = readGlobalOptions(command);
  logger.setVerbose(globals.verbose === true);
  const config = await loadConfig(cwd, globals.config);
  logger.debug(`Templates: ${config.templatesDir}`);
  return { cwd, config, log: logger };
}
