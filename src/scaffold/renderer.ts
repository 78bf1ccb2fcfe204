/**
 * Template Renderer
 *
 * Turns the manifest into a plan of directories and rendered files, then
 * writes the plan without ever overwriting an existing file.
 */

import * as path from 'path';
import {
  ensureDir,
  logger as defaultLogger,
  Logger,
  makeExecutable,
  readFileSafe,
  writeFileIfMissing,
} from '../core/index.js';
import type { ScaffoldConfig } from '../core/index.js';
import { insertApplicationEntry } from '../mutator/installed-apps.js';
import { insertRouteEntry } from '../mutator/url-routes.js';
import { loadManifest } from './manifest.js';
import type { ManifestSection, TemplateManifest } from './manifest.js';
import { pythonTitle, appConfigClassName } from './names.js';
import { renderText } from './template.js';
import type { TemplateVars } from './template.js';

export interface PlannedFile {
  /** Path relative to the project root, always with forward slashes */
  relativePath: string;
  content: string;
  executable: boolean;
}

export interface ScaffoldPlan {
  directories: string[];
  files: PlannedFile[];
}

export interface WriteReport {
  directories: string[];
  created: string[];
  skipped: string[];
}

export const DEVELOPMENT_GUIDE_TEMPLATE = 'docs/app_development_guide.md';

const TEMPLATE_DIR_INDENT = '            ';

export function templateDirsBlock(apps: string[]): string {
  const lines = [`${TEMPLATE_DIR_INDENT}BASE_DIR / 'templates'`];
  for (const app of apps) {
    lines.push(`${TEMPLATE_DIR_INDENT}BASE_DIR / 'apps' / '${app}' / 'templates'`);
  }
  return lines.join(',\n') + ',';
}

export function appTemplateVars(appName: string, projectName: string, rootApp: string): TemplateVars {
  const appTitle = pythonTitle(appName);
  return {
    appName,
    appTitle,
    appConfigClass: appConfigClassName(appName),
    projectName,
    indexTitle: appName === rootApp ? `Welcome to ${projectName}` : `${appTitle} module`,
  };
}

export class TemplateRenderer {
  private manifest: TemplateManifest | null = null;

  constructor(
    private readonly config: ScaffoldConfig,
    private readonly log: Logger = defaultLogger,
  ) {}

  async getManifest(): Promise<TemplateManifest> {
    if (!this.manifest) {
      this.manifest = await loadManifest(this.config.templatesDir);
      this.log.debug(`Loaded template manifest from ${this.config.templatesDir}`);
    }
    return this.manifest;
  }

  async renderTemplate(templateName: string, vars: TemplateVars): Promise<string> {
    const source = await readFileSafe(path.join(this.config.templatesDir, templateName));
    return renderText(source, vars, templateName);
  }

  async renderDevelopmentGuide(): Promise<string> {
    return this.renderTemplate(DEVELOPMENT_GUIDE_TEMPLATE, {});
  }

  /**
   * Project skeleton with `apps` already registered in both configuration
   * files. The applications' own files are planned separately.
   */
  async planProject(projectName: string, apps: string[]): Promise<ScaffoldPlan> {
    const manifest = await this.getManifest();
    const plan = await this.planSection(manifest.project, {
      projectName,
      templateDirs: templateDirsBlock(apps),
    });

    const settingsFile = this.config.roles['installed-apps'].file;
    const urlsFile = this.config.roles['url-routes'].file;
    const routeOptions = { rootApp: this.config.rootApp };

    for (const file of plan.files) {
      if (file.relativePath === settingsFile) {
        file.content = apps.reduce((text, app) => insertApplicationEntry(text, app), file.content);
      } else if (file.relativePath === urlsFile) {
        file.content = apps.reduce((text, app) => insertRouteEntry(text, app, routeOptions), file.content);
      }
    }
    return plan;
  }

  async planApp(appName: string, projectName: string): Promise<ScaffoldPlan> {
    const manifest = await this.getManifest();
    return this.planSection(manifest.app, appTemplateVars(appName, projectName, this.config.rootApp));
  }

  async writePlan(root: string, plan: ScaffoldPlan): Promise<WriteReport> {
    const report: WriteReport = { directories: [], created: [], skipped: [] };

    for (const dir of plan.directories) {
      const target = path.join(root, dir);
      await ensureDir(target);
      report.directories.push(target);
      this.log.debug(`Directory ready: ${target}`);
    }

    for (const file of plan.files) {
      const target = path.join(root, file.relativePath);
      if (!(await writeFileIfMissing(target, file.content))) {
        this.log.warn(`File already exists, left as is: ${target}`);
        report.skipped.push(target);
        continue;
      }
      if (file.executable) {
        await makeExecutable(target);
      }
      this.log.debug(`Created ${target}`);
      report.created.push(target);
    }

    return report;
  }

  private async planSection(section: ManifestSection, vars: TemplateVars): Promise<ScaffoldPlan> {
    const directories = section.directories.map((dir) => renderText(dir, vars, 'manifest'));
    const files: PlannedFile[] = [];

    for (const entry of section.files) {
      const relativePath = renderText(entry.path, vars, 'manifest');
      const content = await this.renderTemplate(entry.template, { ...vars, filePath: relativePath });
      files.push({ relativePath, content, executable: entry.executable === true });
    }

    return { directories, files };
  }
}
