/**
 * Configuration loading and management
 *
 * Everything that used to be a module-level constant (reserved names, the
 * backup layout, the initial application list) lives on ScaffoldConfig so
 * callers and tests can swap it out.
 */

import * as path from 'path';
import { fileExists, readJSON } from './fileio.js';
import { ConfigError } from './errors.js';
import type { ConfigRole, RoleDefinition } from './types.js';

export interface ScaffoldConfig {
  /** Application name (lowercase) mapped to the builtin component it would shadow */
  reservedNames: Record<string, string>;
  defaultApps: string[];
  /** Application mounted at the site root instead of under `/<app>/` */
  rootApp: string;
  /** Backup root, relative to the project root */
  backupRoot: string;
  roles: Record<ConfigRole, RoleDefinition>;
  templatesDir: string;
  lockName: string;
  now: () => Date;
}

export type ConfigOverrides = Partial<
  Pick<ScaffoldConfig, 'reservedNames' | 'defaultApps' | 'rootApp' | 'backupRoot'>
>;

export const CONFIG_FILE_NAMES = ['.djscaffoldrc.json', 'dj-scaffold.config.json'];

const DEFAULT_RESERVED_NAMES: Record<string, string> = {
  admin: 'django.contrib.admin',
  auth: 'django.contrib.auth',
  contenttypes: 'django.contrib.contenttypes',
  sessions: 'django.contrib.sessions',
  messages: 'django.contrib.messages',
  staticfiles: 'django.contrib.staticfiles',
};

const DEFAULT_ROLES: Record<ConfigRole, RoleDefinition> = {
  'installed-apps': {
    role: 'installed-apps',
    label: 'INSTALLED_APPS',
    file: 'config/settings/base.py',
    backupDir: 'base_backups',
    prefix: 'base.py',
  },
  'url-routes': {
    role: 'url-routes',
    label: 'URL configuration',
    file: 'config/urls.py',
    backupDir: 'urls_backups',
    prefix: 'urls.py',
  },
};

export const DEFAULT_CONFIG: ScaffoldConfig = {
  reservedNames: DEFAULT_RESERVED_NAMES,
  defaultApps: ['main'],
  rootApp: 'main',
  backupRoot: 'config/app_append_backups',
  roles: DEFAULT_ROLES,
  templatesDir: path.resolve(__dirname, '..', '..', 'templates'),
  lockName: '.lock',
  now: () => new Date(),
};

export function createConfig(overrides: Partial<ScaffoldConfig> = {}): ScaffoldConfig {
  return { ...DEFAULT_CONFIG, ...overrides };
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every((item) => typeof item === 'string')
  );
}

export function parseConfigOverrides(raw: unknown, source: string): ConfigOverrides {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigError(`Invalid config file: ${source} (expected an object)`);
  }

  const overrides: ConfigOverrides = {};

  if ('reservedNames' in raw) {
    if (!isStringRecord(raw.reservedNames)) {
      throw new ConfigError(`Invalid config file: ${source} (reservedNames must map names to strings)`);
    }
    overrides.reservedNames = Object.fromEntries(
      Object.entries(raw.reservedNames).map(([name, builtin]) => [name.toLowerCase(), builtin]),
    );
  }

  if ('defaultApps' in raw) {
    if (!isStringArray(raw.defaultApps) || raw.defaultApps.length === 0) {
      throw new ConfigError(`Invalid config file: ${source} (defaultApps must be a non-empty list)`);
    }
    overrides.defaultApps = raw.defaultApps;
  }

  if ('rootApp' in raw) {
    if (typeof raw.rootApp !== 'string') {
      throw new ConfigError(`Invalid config file: ${source} (rootApp must be a string)`);
    }
    overrides.rootApp = raw.rootApp;
  }

  if ('backupRoot' in raw) {
    if (typeof raw.backupRoot !== 'string' || path.isAbsolute(raw.backupRoot)) {
      throw new ConfigError(`Invalid config file: ${source} (backupRoot must be a relative path)`);
    }
    overrides.backupRoot = raw.backupRoot;
  }

  return overrides;
}

/**
 * Load overrides from an explicit path, or from the first config file found
 * in `dir`. Falls back to the defaults when there is none.
 */
export async function loadConfig(dir: string, configPath?: string): Promise<ScaffoldConfig> {
  const candidates = configPath
    ? [path.resolve(dir, configPath)]
    : CONFIG_FILE_NAMES.map((name) => path.join(dir, name));

  for (const candidate of candidates) {
    if (!(await fileExists(candidate))) continue;

    let raw: unknown;
    try {
      raw = await readJSON(candidate);
    } catch {
      throw new ConfigError(`Invalid config file: ${candidate}`);
    }
    return createConfig(parseConfigOverrides(raw, candidate));
  }

  if (configPath) {
    throw new ConfigError(`Config file not found: ${candidates[0]}`);
  }
  return createConfig();
}

export function resolveBackupDir(projectRoot: string, config: ScaffoldConfig, role: ConfigRole): string {
  return path.join(projectRoot, config.backupRoot, config.roles[role].backupDir);
}

export function resolveLivePath(projectRoot: string, config: ScaffoldConfig, role: ConfigRole): string {
  return path.join(projectRoot, config.roles[role].file);
}
