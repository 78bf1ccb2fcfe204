import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as path from 'path';
import {
  ensureDir,
  fileExists,
  isDirectory,
  makeExecutable,
  normalizePath,
  readFileSafe,
  readJSON,
  writeFileIfMissing,
  writeFileSafe,
} from '../../src/core/fileio.js';
import { PathError } from '../../src/core/errors.js';
import { makeTempDir, removeDir } from '../helpers.js';

describe('fileio', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await makeTempDir('dj-scaffold-fileio-');
  });

  afterEach(async () => {
    await removeDir(tempDir);
  });

  it('creates nested directories and is idempotent', async () => {
    const target = path.join(tempDir, 'a', 'b', 'c');
    await ensureDir(target);
    await ensureDir(target);
    expect(await isDirectory(target)).toBe(true);
  });

  it('refuses to treat an existing file as a directory', async () => {
    const target = path.join(tempDir, 'urls_backups');
    await fs.writeFile(target, 'not a directory', 'utf-8');

    await expect(ensureDir(target)).rejects.toBeInstanceOf(PathError);
    await expect(ensureDir(target)).rejects.toMatchObject({ operation: 'create directory', path: target });
  });

  it('writes files together with their parent directories', async () => {
    const target = path.join(tempDir, 'config', 'settings', 'base.py');
    await writeFileSafe(target, 'DEBUG = True\n');
    expect(await readFileSafe(target)).toBe('DEBUG = True\n');
  });

  it('never overwrites in writeFileIfMissing', async () => {
    const target = path.join(tempDir, 'README.md');

    expect(await writeFileIfMissing(target, 'first')).toBe(true);
    expect(await writeFileIfMissing(target, 'second')).toBe(false);
    expect(await fs.readFile(target, 'utf-8')).toBe('first');
  });

  it('reports unreadable files as PathError', async () => {
    const missing = path.join(tempDir, 'missing.py');

    await expect(readFileSafe(missing)).rejects.toBeInstanceOf(PathError);
    await expect(readFileSafe(missing)).rejects.toMatchObject({
      operation: 'read',
      path: missing,
      message: `Cannot read ${missing}: no such file or directory`,
    });
  });

  it('marks files executable', async () => {
    const target = path.join(tempDir, 'manage.py');
    await writeFileSafe(target, '#!/usr/bin/env python\n');
    await makeExecutable(target);

    const stat = await fs.stat(target);
    expect(stat.mode & 0o777).toBe(0o755);
  });

  it('reads JSON and checks existence', async () => {
    const target = path.join(tempDir, 'data.json');
    await writeFileSafe(target, '{"defaultApps":["blog"]}');

    expect(await readJSON(target)).toEqual({ defaultApps: ['blog'] });
    expect(await fileExists(target)).toBe(true);
    expect(await fileExists(path.join(tempDir, 'nope.json'))).toBe(false);
    expect(await isDirectory(target)).toBe(false);
  });

  it('normalizes paths to forward slashes', () => {
    expect(normalizePath('config/./app_append_backups//base_backups')).toBe(
      'config/app_append_backups/base_backups',
    );
  });
});
