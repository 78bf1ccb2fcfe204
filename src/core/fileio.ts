/**
 * File I/O utilities that report failures as PathError
 */

import * as fs from 'fs';
import * as path from 'path';
import { promisify } from 'util';
import { PathError, isErrnoException } from './errors.js';

const mkdir = promisify(fs.mkdir);
const writeFile = promisify(fs.writeFile);
const readFile = promisify(fs.readFile);
const access = promisify(fs.access);
const stat = promisify(fs.stat);
const chmod = promisify(fs.chmod);

export async function ensureDir(dirPath: string): Promise<void> {
  try {
    await mkdir(dirPath, { recursive: true });
  } catch (error) {
    throw PathError.from(dirPath, 'create directory', error);
  }
}

export async function writeFileSafe(filePath: string, content: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  try {
    await writeFile(filePath, content, 'utf-8');
  } catch (error) {
    throw PathError.from(filePath, 'write', error);
  }
}

/**
 * Write a file only when nothing exists at the path yet.
 * Returns false when the file was already there.
 */
export async function writeFileIfMissing(filePath: string, content: string): Promise<boolean> {
  await ensureDir(path.dirname(filePath));
  try {
    await writeFile(filePath, content, { encoding: 'utf-8', flag: 'wx' });
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'EEXIST') {
      return false;
    }
    throw PathError.from(filePath, 'write', error);
  }
}

export async function readFileSafe(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, 'utf-8');
  } catch (error) {
    throw PathError.from(filePath, 'read', error);
  }
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

export async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await stat(dirPath)).isDirectory();
  } catch {
    return false;
  }
}

export async function makeExecutable(filePath: string): Promise<void> {
  try {
    await chmod(filePath, 0o755);
  } catch (error) {
    throw PathError.from(filePath, 'chmod', error);
  }
}

export function normalizePath(filePath: string): string {
  return path.normalize(filePath).replace(/\\/g, '/');
}

export async function readJSON(filePath: string): Promise<unknown> {
  const content = await readFileSafe(filePath);
  return JSON.parse(content);
}
