/**
 * Template manifest: which directories and files each scaffold mode creates.
 */

import * as path from 'path';
import { readJSON, TemplateError } from '../core/index.js';

export interface ManifestFile {
  /** Output path relative to the project root; may hold placeholders */
  path: string;
  /** Template file relative to the templates directory */
  template: string;
  executable?: boolean;
}

export interface ManifestSection {
  directories: string[];
  files: ManifestFile[];
}

export interface TemplateManifest {
  project: ManifestSection;
  app: ManifestSection;
}

export const MANIFEST_FILE = 'manifest.json';

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseFile(value: unknown, where: string): ManifestFile {
  if (!isObject(value) || typeof value.path !== 'string' || typeof value.template !== 'string') {
    throw new TemplateError(`${where}: each file needs a "path" and a "template"`);
  }
  if (value.executable !== undefined && typeof value.executable !== 'boolean') {
    throw new TemplateError(`${where}: "executable" must be a boolean`);
  }
  return { path: value.path, template: value.template, executable: value.executable === true };
}

function parseSection(value: unknown, name: string): ManifestSection {
  const where = `manifest section "${name}"`;
  if (!isObject(value)) {
    throw new TemplateError(`${where} is missing`);
  }
  const { directories, files } = value;
  if (!Array.isArray(directories) || !directories.every((dir) => typeof dir === 'string')) {
    throw new TemplateError(`${where}: "directories" must be a list of paths`);
  }
  if (!Array.isArray(files)) {
    throw new TemplateError(`${where}: "files" must be a list`);
  }
  return {
    directories: directories.filter((dir): dir is string => typeof dir === 'string'),
    files: files.map((file) => parseFile(file, where)),
  };
}

export function parseManifest(raw: unknown): TemplateManifest {
  if (!isObject(raw)) {
    throw new TemplateError('Template manifest must be an object');
  }
  return {
    project: parseSection(raw.project, 'project'),
    app: parseSection(raw.app, 'app'),
  };
}

export async function loadManifest(templatesDir: string): Promise<TemplateManifest> {
  const manifestPath = path.join(templatesDir, MANIFEST_FILE);
  let raw: unknown;
  try {
    raw = await readJSON(manifestPath);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new TemplateError(`Template manifest is not valid JSON: ${manifestPath}`);
    }
    throw error;
  }
  return parseManifest(raw);
}
