/**
 * Init Command
 * Creates a project skeleton with its initial applications registered
 */

import * as path from 'path';
import { fileExists, PathError } from '../core/index.js';
import { TemplateRenderer } from '../scaffold/index.js';
import type { CommandContext, StepRecorder } from './context.js';

export interface InitSummary {
  projectRoot: string;
  apps: string[];
  created: string[];
}

export async function initProject(
  ctx: CommandContext,
  projectName: string,
  apps: string[],
  recorder: StepRecorder,
): Promise<InitSummary> {
  const { config, log } = ctx;
  const projectRoot = path.resolve(ctx.cwd, projectName);

  if (await fileExists(projectRoot)) {
    throw new PathError(projectRoot, 'create directory', 'project directory already exists');
  }

  const renderer = new TemplateRenderer(config, log);
  const created: string[] = [];

  log.heading(`Creating project ${projectName}`);

  const projectReport = await recorder.run(
    'project skeleton',
    async () => renderer.writePlan(projectRoot, await renderer.planProject(projectName, apps)),
    (report) => `${report.created.length} files created`,
  );
  created.push(...projectReport.created);

  for (const appName of apps) {
    const appReport = await recorder.run(
      `application ${appName}`,
      async () => renderer.writePlan(projectRoot, await renderer.planApp(appName, projectName)),
      (report) => `${report.created.length} files created`,
    );
    created.push(...appReport.created);
    log.success(`Application ${appName} created`);
  }

  log.success(`Project ${projectName} created at ${projectRoot}`);
  log.info('Next steps:');
  log.detail('1. Create and activate a virtual environment');
  log.detail('2. pip install -r requirements/local.txt');
  log.detail('3. python manage.py migrate');
  log.detail('4. python manage.py createsuperuser');
  log.detail('5. python manage.py runserver');

  return { projectRoot, apps, created };
}
