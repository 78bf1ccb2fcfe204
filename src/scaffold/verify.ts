/**
 * Post-generation checks for an application skeleton.
 */

import * as path from 'path';
import { fileExists, readFileSafe } from '../core/index.js';
import type { ScaffoldConfig, VerificationResult } from '../core/index.js';
import type { TemplateRenderer } from './renderer.js';

export const URL_IMPORTS_TARGET = 'project urls imports';

const EXACT_FILES = ['apps.py', 'urls.py'];

const VIEW_ELEMENTS = [
  'from django.shortcuts import render',
  'def index(request):',
  'context = {',
  'return render(request,',
];

export function checkUrlImports(urlsText: string): VerificationResult {
  const hasPath = urlsText.includes('from django.urls import path');
  const hasInclude = /\binclude\b/.test(urlsText);
  if (hasPath && hasInclude) {
    return { target: URL_IMPORTS_TARGET, ok: true, message: 'path and include are imported' };
  }

  const missing = [hasPath ? null : 'path', hasInclude ? null : 'include'].filter(
    (name): name is string => name !== null,
  );
  return { target: URL_IMPORTS_TARGET, ok: false, message: `missing import: ${missing.join(', ')}` };
}

export function checkViewStructure(viewsText: string): boolean {
  return VIEW_ELEMENTS.every((element) => viewsText.includes(element));
}

/**
 * Compare an application's key files with what the templates would
 * produce today, and check that the project URL module imports include().
 */
export async function verifyAppFiles(
  projectRoot: string,
  appName: string,
  projectName: string,
  renderer: TemplateRenderer,
  config: ScaffoldConfig,
): Promise<VerificationResult[]> {
  const results: VerificationResult[] = [];

  const urlsPath = path.join(projectRoot, config.roles['url-routes'].file);
  if (await fileExists(urlsPath)) {
    results.push(checkUrlImports(await readFileSafe(urlsPath)));
  }

  const plan = await renderer.planApp(appName, projectName);
  const appDir = `apps/${appName}`;

  for (const name of EXACT_FILES) {
    const target = `${appDir}/${name}`;
    const expected = plan.files.find((file) => file.relativePath === target);
    const actualPath = path.join(projectRoot, target);

    if (!(await fileExists(actualPath))) {
      results.push({ target, ok: false, message: 'file is missing' });
    } else if (expected && (await readFileSafe(actualPath)).trim() === expected.content.trim()) {
      results.push({ target, ok: true, message: 'content matches the template' });
    } else {
      results.push({ target, ok: false, message: 'content differs from the template' });
    }
  }

  const viewsTarget = `${appDir}/views.py`;
  const viewsPath = path.join(projectRoot, viewsTarget);
  if (!(await fileExists(viewsPath))) {
    results.push({ target: viewsTarget, ok: false, message: 'file is missing' });
  } else if (checkViewStructure(await readFileSafe(viewsPath))) {
    results.push({ target: viewsTarget, ok: true, message: 'index view is in place' });
  } else {
    results.push({ target: viewsTarget, ok: false, message: 'index view structure is incomplete' });
  }

  return results;
}
