/**
 * Per-application configuration guide (CONFIG_GUIDE.md)
 */

import * as path from 'path';
import { normalizePath } from '../core/index.js';
import type { MutationOutcome, ScaffoldConfig, VerificationResult } from '../core/index.js';
import { formatApplicationEntry } from '../mutator/installed-apps.js';
import { formatRouteEntry } from '../mutator/url-routes.js';
import { URL_IMPORTS_TARGET } from './verify.js';

export const CONFIG_GUIDE_FILE = 'CONFIG_GUIDE.md';

export interface ConfigGuideInput {
  appName: string;
  projectName: string;
  config: ScaffoldConfig;
  verification: VerificationResult[];
  /** Present when the configuration files were updated automatically */
  outcomes?: MutationOutcome[];
}

function fence(lang: string, ...body: string[]): string[] {
  return ['```' + lang, ...body, '```'];
}

function verificationSection(results: VerificationResult[]): string[] {
  const lines = ['### Generated file checks', ''];
  if (results.length === 0) {
    lines.push('No checks were run.');
  }
  for (const result of results) {
    lines.push(`- ${result.ok ? '✅' : '❌'} \`${result.target}\`: ${result.message}`);
  }
  return lines;
}

function backupSection(input: ConfigGuideInput): string[] {
  const { config, projectName } = input;
  return [
    '### Backups',
    '',
    ...Object.values(config.roles).map(
      (role) => `- ${role.label}: \`./${normalizePath(path.join(config.backupRoot, role.backupDir))}/\``,
    ),
    '',
    'To put back the configuration as it was before the last change:',
    '',
    ...fence('bash', `dj-scaffold restore -p ${projectName}`),
  ];
}

function autoSection(input: ConfigGuideInput, outcomes: MutationOutcome[]): string[] {
  const { config } = input;
  const lines = ['## 1. Automatic configuration update', ''];

  for (const outcome of outcomes) {
    const role = config.roles[outcome.role];
    lines.push(`### ${role.label}`, '', `File: \`./${role.file}\``, '');
    if (outcome.status === 'inserted') {
      lines.push('Added:', '', ...fence('python', outcome.entry), '');
      if (outcome.backup) {
        lines.push(`Previous version saved as \`${outcome.backup.id}\`.`, '');
      }
    } else {
      lines.push('Already present, left unchanged:', '', ...fence('python', outcome.entry), '');
    }
  }

  return [...lines, ...backupSection(input), ''];
}

function manualSection(input: ConfigGuideInput): string[] {
  const { appName, config, verification } = input;
  const settings = config.roles['installed-apps'];
  const urls = config.roles['url-routes'];
  const importsOk = verification.some((result) => result.target === URL_IMPORTS_TARGET && result.ok);

  const lines = [
    '## 1. Manual configuration',
    '',
    `### Register the application in ${settings.label}`,
    '',
    `File: \`./${settings.file}\``,
    '',
    'Append to the list, after the applications it depends on:',
    '',
    ...fence('python', 'INSTALLED_APPS = [', '    ...', `    ${formatApplicationEntry(appName)}`, ']'),
    '',
    '### Route the application URLs',
    '',
    `File: \`./${urls.file}\``,
    '',
  ];

  if (!importsOk) {
    lines.push('Import `include` if it is not imported yet:', '', ...fence('python', 'from django.urls import path, include'), '');
  }

  lines.push(
    'Append to `urlpatterns`:',
    '',
    ...fence('python', 'urlpatterns = [', '    ...', `    ${formatRouteEntry(appName, { rootApp: config.rootApp })}`, ']'),
    '',
  );
  return lines;
}

export function buildConfigGuide(input: ConfigGuideInput): string {
  const { appName, outcomes } = input;
  const lines = [`# ${appName} configuration guide`, ''];

  lines.push(...(outcomes ? autoSection(input, outcomes) : manualSection(input)));
  lines.push(...verificationSection(input.verification), '');

  lines.push(
    '## 2. Check the application',
    '',
    ...fence('bash', `python manage.py check ${appName}`, 'python manage.py runserver'),
    '',
    `Then open http://localhost:8000/${appName === input.config.rootApp ? '' : `${appName}/`}`,
    '',
    '## 3. Troubleshooting',
    '',
    `- \`No module named '${appName}'\`: make sure \`apps/\` is on the Python path and the ${input.config.roles['installed-apps'].label} entry is spelled correctly.`,
    '- URL not found: check the order of `urlpatterns` for routes that shadow each other.',
    `- Template not found: the index template lives in \`./apps/${appName}/templates/${appName}/index.html\`.`,
    '',
  );

  return lines.join('\n');
}
