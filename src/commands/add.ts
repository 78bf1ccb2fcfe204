/**
 * Add Command
 * Scaffolds applications into an existing project and, with auto-update,
 * registers them in the settings and URL configuration.
 */

import * as path from 'path';
import { writeFileSafe } from '../core/index.js';
import type { MutationOutcome } from '../core/index.js';
import { BackupManager } from '../backup/index.js';
import { ConfigMutator } from '../mutator/index.js';
import { buildConfigGuide, CONFIG_GUIDE_FILE, TemplateRenderer, verifyAppFiles } from '../scaffold/index.js';
import { appDirectory } from './context.js';
import type { CommandContext, StepRecorder } from './context.js';

export interface AddOptions {
  projectRoot: string;
  projectName: string;
  autoUpdate: boolean;
}

export interface AddedApplication {
  appName: string;
  created: string[];
  guidePath: string;
  outcomes?: MutationOutcome[];
}

/**
 * Add applications one after another, stopping at the first failure.
 * Work done for earlier applications is kept.
 */
export async function addApplications(
  ctx: CommandContext,
  apps: string[],
  options: AddOptions,
  recorder: StepRecorder,
): Promise<AddedApplication[]> {
  const { config, log } = ctx;
  const { projectRoot, projectName, autoUpdate } = options;
  const renderer = new TemplateRenderer(config, log);
  const mutator = new ConfigMutator(new BackupManager(projectRoot, config, log), config, log);
  const added: AddedApplication[] = [];

  for (const appName of apps) {
    log.heading(`Adding application ${appName}`);

    const report = await recorder.run(
      `scaffold ${appName}`,
      async () => renderer.writePlan(projectRoot, await renderer.planApp(appName, projectName)),
      (result) => `${result.created.length} files created`,
    );

    let outcomes: MutationOutcome[] | undefined;
    if (autoUpdate) {
      outcomes = await recorder.run(
        `configure ${appName}`,
        async () => mutator.addApplication(appName),
        (result) => result.map((outcome) => `${outcome.role}: ${outcome.status}`).join(', '),
      );
    }

    const guidePath = path.join(appDirectory(projectRoot, appName), CONFIG_GUIDE_FILE);
    await recorder.run(
      `guide ${appName}`,
      async () => {
        const verification = await verifyAppFiles(projectRoot, appName, projectName, renderer, config);
        for (const result of verification.filter((check) => !check.ok)) {
          log.warn(`${result.target}: ${result.message}`);
        }
        await writeFileSafe(guidePath, buildConfigGuide({ appName, projectName, config, verification, outcomes }));
        return guidePath;
      },
      (written) => written,
    );

    log.success(`Application ${appName} added`);
    log.detail(
      autoUpdate
        ? `Configuration updated; details in ${guidePath}`
        : `Configuration steps to follow: ${guidePath}`,
    );
    added.push({ appName, created: report.created, guidePath, outcomes });
  }

  return added;
}
