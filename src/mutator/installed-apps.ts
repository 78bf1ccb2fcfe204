/**
 * Application-registry insertion (`INSTALLED_APPS`)
 */

import { ParseError } from '../core/index.js';
import { appConfigClassName } from '../scaffold/names.js';
import { entriesMention, locateListBlock, splitLines } from './list-block.js';

const LIST_NAME = 'INSTALLED_APPS';

export function applicationConfigPath(appName: string): string {
  return `${appName}.apps.${appConfigClassName(appName)}`;
}

export function formatApplicationEntry(appName: string): string {
  return `'${applicationConfigPath(appName)}',`;
}

function assertRegistryShape(text: string): void {
  if (text.trim() === '') {
    throw new ParseError('Settings file is empty');
  }
  if (!text.includes(LIST_NAME)) {
    throw new ParseError(`No ${LIST_NAME} found`);
  }
}

export function hasApplicationEntry(text: string, appName: string): boolean {
  assertRegistryShape(text);
  const { lines } = splitLines(text);
  const block = locateListBlock(lines, LIST_NAME);
  return entriesMention(block.entries, [appName, applicationConfigPath(appName)]);
}

/**
 * Append `'<app>.apps.<Title>Config',` as the last entry of INSTALLED_APPS.
 */
export function insertApplicationEntry(text: string, appName: string): string {
  assertRegistryShape(text);
  const { lines, eol } = splitLines(text);
  const block = locateListBlock(lines, LIST_NAME);

  lines.splice(block.end, 0, `${block.indent}${formatApplicationEntry(appName)}`);
  return lines.join(eol);
}
