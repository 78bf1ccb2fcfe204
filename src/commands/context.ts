/**
 * Shared context and helpers for the scaffold commands
 */

import * as path from 'path';
import { fileExists, isDirectory, Logger } from '../core/index.js';
import type { ScaffoldConfig, StepReport } from '../core/index.js';

export interface CommandContext {
  cwd: string;
  config: ScaffoldConfig;
  log: Logger;
}

export const MANAGE_SCRIPT = 'manage.py';

export function defaultProjectName(cwd: string): string {
  return path.basename(path.resolve(cwd));
}

/**
 * Locate an existing project: `<cwd>/<name>`, or the current directory when
 * it carries the project's name and holds manage.py.
 */
export async function resolveProjectRoot(cwd: string, projectName: string): Promise<string | null> {
  const nested = path.resolve(cwd, projectName);
  if (await isDirectory(nested)) {
    return nested;
  }

  const here = path.resolve(cwd);
  if (path.basename(here) === projectName && (await fileExists(path.join(here, MANAGE_SCRIPT)))) {
    return here;
  }
  return null;
}

export function appDirectory(projectRoot: string, appName: string): string {
  return path.join(projectRoot, 'apps', appName);
}

export interface AppPartition {
  fresh: string[];
  existing: string[];
}

export async function filterNewApps(projectRoot: string, appNames: string[]): Promise<AppPartition> {
  const partition: AppPartition = { fresh: [], existing: [] };
  for (const appName of appNames) {
    if (await fileExists(appDirectory(projectRoot, appName))) {
      partition.existing.push(appName);
    } else {
      partition.fresh.push(appName);
    }
  }
  return partition;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Records the outcome of each step a command runs.
 */
export class StepRecorder {
  readonly steps: StepReport[] = [];

  async run<T>(step: string, fn: () => Promise<T>, detail: (result: T) => string): Promise<T> {
    let result: T;
    try {
      result = await fn();
    } catch (error) {
      this.steps.push({ step, ok: false, detail: describeError(error) });
      throw error;
    }
    this.steps.push({ step, ok: true, detail: detail(result) });
    return result;
  }

  ok(step: string, detail: string): void {
    this.steps.push({ step, ok: true, detail });
  }

  get failed(): StepReport[] {
    return this.steps.filter((step) => !step.ok);
  }
}
