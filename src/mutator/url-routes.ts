/**
 * URL-routing insertion (`urlpatterns`)
 */

import { ParseError } from '../core/index.js';
import { entriesMention, locateListBlock, splitLines } from './list-block.js';

const LIST_NAME = 'urlpatterns';
const URLS_IMPORT = 'from django.urls import';

export interface RouteOptions {
  /** Application served at the site root */
  rootApp?: string;
}

export function formatRouteEntry(appName: string, options: RouteOptions = {}): string {
  if (appName === options.rootApp) {
    return `path('', include('${appName}.urls')),  # root application`;
  }
  return `path('${appName}/', include('${appName}.urls')),`;
}

function assertRoutingShape(text: string): void {
  if (text.trim() === '') {
    throw new ParseError('URL configuration file is empty');
  }
  if (!text.includes(LIST_NAME)) {
    throw new ParseError(`No ${LIST_NAME} found`);
  }
}

/**
 * Make sure `include` is imported from django.urls. Returns the new lines.
 */
export function ensureIncludeImport(lines: string[]): string[] {
  const result = [...lines];
  const importIndex = result.findIndex((line) => line.startsWith(URLS_IMPORT));

  if (importIndex !== -1) {
    const line = result[importIndex];
    const hash = line.indexOf('#');
    const code = hash === -1 ? line : line.slice(0, hash);
    if (/\binclude\b/.test(code)) return result;
    if (code.includes('(') || code.trimEnd().endsWith('\\')) {
      result.splice(importIndex, 0, `${URLS_IMPORT} include`);
    } else {
      // Keep a trailing comment after the extended import list
      const imports = code.trimEnd();
      result[importIndex] = `${imports}, include${line.slice(imports.length)}`.trimEnd();
    }
    return result;
  }

  let target = result.findIndex((line) => line.startsWith('from ') || line.startsWith('import '));
  if (target === -1) {
    target = Math.max(
      0,
      result.findIndex((line) => line.trim().startsWith(LIST_NAME)),
    );
  }
  result.splice(target, 0, `${URLS_IMPORT} path, include`);
  return result;
}

export function hasRouteEntry(text: string, appName: string): boolean {
  assertRoutingShape(text);
  const { lines } = splitLines(text);
  const block = locateListBlock(lines, LIST_NAME);
  return entriesMention(block.entries, [`${appName}/`, `${appName}.urls`]);
}

/**
 * Append an include() route for the application as the last entry of
 * urlpatterns, adding the `include` import when it is missing.
 */
export function insertRouteEntry(text: string, appName: string, options: RouteOptions = {}): string {
  assertRoutingShape(text);
  const split = splitLines(text);
  const lines = ensureIncludeImport(split.lines);
  const block = locateListBlock(lines, LIST_NAME);

  lines.splice(block.end, 0, `${block.indent}${formatRouteEntry(appName, options)}`);
  return lines.join(split.eol);
}
