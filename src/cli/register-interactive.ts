import inquirer from 'inquirer';
import type { Command } from 'commander';
import { withCliErrorHandling } from '../core/index.js';
import type { DriverMode } from '../core/index.js';
import { defaultProjectName, runDriver } from '../commands/index.js';
import type { DriverOptions } from '../commands/index.js';
import { createCommandContext } from './context.js';
import { reportDriverResult } from './report.js';

export type InteractiveAnswers = {
  mode: DriverMode;
  project: string;
  apps?: string;
  autoUpdate?: boolean;
};

export function splitAppList(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(/[\s,]+/).filter((name) => name !== '');
}

export function answersToOptions(answers: InteractiveAnswers): DriverOptions {
  const project = answers.project.trim() || undefined;
  if (answers.mode === 'restore') {
    return { mode: 'restore', project };
  }
  const apps = splitAppList(answers.apps);
  return {
    mode: answers.mode,
    project,
    apps: apps.length > 0 ? apps : undefined,
    autoUpdate: answers.mode === 'add' && answers.autoUpdate === true,
  };
}

export function registerInteractiveCommand(program: Command): void {
  program
    .command('interactive')
    .alias('i')
    .description('Answer a few questions instead of passing options')
    .action(
      withCliErrorHandling('interactive', async (_options: Record<string, never>, command: Command) => {
        const ctx = await createCommandContext(command);
        const answers = await inquirer.prompt<InteractiveAnswers>([
          {
            type: 'list',
            name: 'mode',
            message: 'What do you want to do?',
            choices: [
              { name: 'Create a project', value: 'init' },
              { name: 'Add applications to a project', value: 'add' },
              { name: 'Restore configuration from backups', value: 'restore' },
            ],
          },
          {
            type: 'input',
            name: 'project',
            message: 'Project name:',
            default: defaultProjectName(ctx.cwd),
          },
          {
            type: 'input',
            name: 'apps',
            message: 'Applications (space or comma separated):',
            default: ctx.config.defaultApps.join(' '),
            when: (current) => current.mode !== 'restore',
          },
          {
            type: 'confirm',
            name: 'autoUpdate',
            message: 'Register the applications in settings and URL configuration?',
            default: true,
            when: (current) => current.mode === 'add',
          },
        ]);

        const result = await runDriver(answersToOptions(answers), ctx);
        reportDriverResult(result, false);
      }),
    );
}
