import { Option } from 'commander';
import type { Command } from 'commander';
import { CONFIG_ROLES, isConfigRole, logger, ScaffoldError, withCliErrorHandling } from '../core/index.js';
import type { ConfigRole, Logger } from '../core/index.js';
import { DEFAULT_GUIDE_OUTPUT, runDriver, writeDevelopmentGuide } from '../commands/index.js';
import type { DriverOptions } from '../commands/index.js';
import { createCommandContext } from './context.js';
import { reportDriverResult } from './report.js';

export interface InitCliOptions {
  project?: string;
  apps?: string[];
  mode?: string;
  restore?: boolean;
  autoUpdate?: boolean;
  json?: boolean;
}

export interface AddCliOptions {
  project?: string;
  apps?: string[];
  autoUpdate?: boolean;
  json?: boolean;
}

export interface RestoreCliOptions {
  project?: string;
  role?: string[];
  json?: boolean;
}

export function parseRoles(values: string[] | undefined): ConfigRole[] | undefined {
  if (!values || values.length === 0) return undefined;
  return values.map((value) => {
    if (!isConfigRole(value)) {
      throw new ScaffoldError(`Unknown role "${value}"; expected one of ${CONFIG_ROLES.join(', ')}`, 'INVALID_ROLE');
    }
    return value;
  });
}

/**
 * Map the `init` options, including the legacy `--mode` and `--restore`
 * flags, onto a driver mode.
 */
export function initOptionsToDriver(options: InitCliOptions, log: Logger = logger): DriverOptions {
  const { project, apps } = options;

  if (options.restore) {
    if (apps && apps.length > 0) log.warn('--apps is ignored with --restore');
    if (options.mode !== undefined && options.mode !== 'init') log.warn('--mode is ignored with --restore');
    if (options.autoUpdate) log.warn('--auto-update is ignored with --restore');
    return { mode: 'restore', project };
  }

  if (options.mode === 'add') {
    return { mode: 'add', project, apps, autoUpdate: options.autoUpdate === true };
  }
  if (options.mode !== undefined && options.mode !== 'init') {
    throw new ScaffoldError(`Unknown mode "${options.mode}"; expected init or add`, 'INVALID_MODE');
  }
  if (options.autoUpdate) {
    log.warn('--auto-update only applies when adding applications; ignored');
  }
  return { mode: 'init', project, apps };
}

export function registerScaffoldCommands(program: Command): void {
  program
    .command('init', { isDefault: true })
    .description('Create a Django project with its initial applications')
    .option('-p, --project <name>', 'Project name (default: current directory name)')
    .option('-a, --apps <names...>', 'Applications to create (default: main)')
    .addOption(new Option('--mode <mode>', 'Legacy run mode').choices(['init', 'add']))
    .option('--restore', 'Legacy alias of the restore command')
    .option('--auto-update', 'With --mode add: update settings and URL configuration')
    .option('--json', 'Output as JSON')
    .action(
      withCliErrorHandling('init', async (options: InitCliOptions, command: Command) => {
        const ctx = await createCommandContext(command);
        const result = await runDriver(initOptionsToDriver(options, ctx.log), ctx);
        reportDriverResult(result, options.json === true);
      }),
    );

  program
    .command('add')
    .description('Add applications to an existing project')
    .option('-p, --project <name>', 'Project name (default: current directory name)')
    .option('-a, --apps <names...>', 'Applications to add (default: main)')
    .option('--auto-update', 'Register the applications in settings and URL configuration')
    .option('--json', 'Output as JSON')
    .action(
      withCliErrorHandling('add', async (options: AddCliOptions, command: Command) => {
        const ctx = await createCommandContext(command);
        const result = await runDriver(
          { mode: 'add', project: options.project, apps: options.apps, autoUpdate: options.autoUpdate === true },
          ctx,
        );
        reportDriverResult(result, options.json === true);
      }),
    );

  program
    .command('guide')
    .description('Write the application development guide')
    .option('-o, --output <file>', 'Output file', DEFAULT_GUIDE_OUTPUT)
    .action(
      withCliErrorHandling('guide', async (options: { output: string }, command: Command) => {
        const ctx = await createCommandContext(command);
        await writeDevelopmentGuide(ctx, options.output);
      }),
    );
}
