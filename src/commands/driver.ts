/**
 * CLI Driver
 *
 * Picks a state from the parsed options and runs it:
 *
 *   INIT ─────────────────────────────┐
 *   ADD ──(project missing)──> INIT ──┼──> DONE | FAILED
 *   ADD_AUTO ──(project missing)─> INIT
 *   RESTORE ──────────────────────────┘
 */

import { CONFIG_ROLES, NotFoundError, ScaffoldError } from '../core/index.js';
import type { ConfigRole, DriverMode, DriverResult, DriverState } from '../core/index.js';
import { validateAppNames } from '../scaffold/index.js';
import { addApplications } from './add.js';
import { defaultProjectName, filterNewApps, resolveProjectRoot, StepRecorder } from './context.js';
import type { CommandContext } from './context.js';
import { initProject } from './init.js';
import { restoreConfiguration } from './restore.js';

export interface DriverOptions {
  mode: DriverMode;
  project?: string;
  apps?: string[];
  autoUpdate?: boolean;
  roles?: ConfigRole[];
}

type ActiveState = Exclude<DriverState, 'DONE' | 'FAILED'>;

export function resolveState(options: DriverOptions): ActiveState {
  switch (options.mode) {
    case 'restore':
      return 'RESTORE';
    case 'add':
      return options.autoUpdate ? 'ADD_AUTO' : 'ADD';
    case 'init':
      return 'INIT';
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export async function runDriver(options: DriverOptions, ctx: CommandContext): Promise<DriverResult> {
  const { config, log } = ctx;
  const recorder = new StepRecorder();
  const projectName = options.project ?? defaultProjectName(ctx.cwd);
  const initial = resolveState(options);
  const statePath: ActiveState[] = [initial];
  let projectRoot = '';

  const finish = (error?: unknown): DriverResult =>
    error === undefined
      ? { state: 'DONE', path: statePath, projectRoot, steps: recorder.steps }
      : { state: 'FAILED', path: statePath, projectRoot, steps: recorder.steps, error: toError(error) };

  try {
    if (initial === 'RESTORE') {
      const existing = await resolveProjectRoot(ctx.cwd, projectName);
      if (!existing) {
        throw new NotFoundError(`Project ${projectName} not found under ${ctx.cwd}`);
      }
      projectRoot = existing;

      const summary = await restoreConfiguration(ctx, projectRoot, options.roles ?? CONFIG_ROLES, recorder);
      if (summary.errors.length === 1) {
        return finish(summary.errors[0]);
      }
      if (summary.errors.length > 1) {
        const message = `${summary.errors.length} restores failed: ${summary.errors.map((error) => error.message).join('; ')}`;
        return finish(
          summary.errors.every((error) => error instanceof NotFoundError)
            ? new NotFoundError(message)
            : new ScaffoldError(message, 'RESTORE_FAILED'),
        );
      }
      return finish();
    }

    const apps = options.apps && options.apps.length > 0 ? options.apps : config.defaultApps;
    validateAppNames(apps, config.reservedNames);

    if (initial === 'INIT') {
      projectRoot = (await initProject(ctx, projectName, apps, recorder)).projectRoot;
      return finish();
    }

    const existing = await resolveProjectRoot(ctx.cwd, projectName);
    if (!existing) {
      log.warn(`Project ${projectName} does not exist; creating it with ${apps.join(', ')}`);
      statePath.push('INIT');
      projectRoot = (await initProject(ctx, projectName, apps, recorder)).projectRoot;
      return finish();
    }
    projectRoot = existing;

    const { fresh, existing: present } = await filterNewApps(projectRoot, apps);
    for (const appName of present) {
      log.warn(`Application ${appName} already exists; skipped`);
    }
    if (fresh.length === 0) {
      log.info('No new applications to add');
      return finish();
    }

    await addApplications(ctx, fresh, { projectRoot, projectName, autoUpdate: initial === 'ADD_AUTO' }, recorder);
    return finish();
  } catch (error) {
    return finish(error);
  }
}
