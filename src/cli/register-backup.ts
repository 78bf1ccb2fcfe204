import { Option } from 'commander';
import type { Command } from 'commander';
import {
  CONFIG_ROLES,
  isJsonMode,
  jsonSuccess,
  NotFoundError,
  outputJson,
  withCliErrorHandling,
} from '../core/index.js';
import { BackupManager } from '../backup/index.js';
import { defaultProjectName, describeBackup, listProjectBackups, resolveProjectRoot, runDriver } from '../commands/index.js';
import { createCommandContext } from './context.js';
import { reportDriverResult } from './report.js';
import { parseRoles } from './register-scaffold.js';
import type { RestoreCliOptions } from './register-scaffold.js';

export function registerBackupCommands(program: Command): void {
  program
    .command('restore')
    .description('Restore configuration files from their newest backups')
    .option('-p, --project <name>', 'Project name (default: current directory name)')
    .addOption(new Option('-r, --role <roles...>', 'Configuration files to restore').choices([...CONFIG_ROLES]))
    .option('--json', 'Output as JSON')
    .action(
      withCliErrorHandling('restore', async (options: RestoreCliOptions, command: Command) => {
        const ctx = await createCommandContext(command);
        const result = await runDriver(
          { mode: 'restore', project: options.project, roles: parseRoles(options.role) },
          ctx,
        );
        reportDriverResult(result, options.json === true);
      }),
    );

  program
    .command('backups')
    .description('List configuration backups, oldest first')
    .option('-p, --project <name>', 'Project name (default: current directory name)')
    .option('--json', 'Output as JSON')
    .action(
      withCliErrorHandling('backups', async (options: { project?: string; json?: boolean }, command: Command) => {
        const ctx = await createCommandContext(command);
        const projectName = options.project ?? defaultProjectName(ctx.cwd);
        const projectRoot = await resolveProjectRoot(ctx.cwd, projectName);
        if (!projectRoot) {
          throw new NotFoundError(`Project ${projectName} not found under ${ctx.cwd}`);
        }

        const listing = await listProjectBackups(new BackupManager(projectRoot, ctx.config, ctx.log));

        if (isJsonMode(options)) {
          outputJson(jsonSuccess({ projectRoot, ...listing }));
          return;
        }

        if (listing.locked) {
          ctx.log.warn('Another dj-scaffold command holds the backup lock; the listing may change');
        }
        for (const role of CONFIG_ROLES) {
          const records = listing.backups[role];
          ctx.log.heading(`${ctx.config.roles[role].label} (${records.length})`);
          if (records.length === 0) {
            ctx.log.detail('No backups');
          }
          for (const record of records) {
            ctx.log.detail(describeBackup(record));
          }
        }
      }),
    );
}
