import { jest } from '@jest/globals';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { glob } from 'glob';
import { createConfig, Logger } from '../src/core/index.js';
import type { ScaffoldConfig } from '../src/core/index.js';
import expectedFiles from './fixtures/expected-files.json';

export async function makeTempDir(prefix: string = 'dj-scaffold-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export function silenceConsole() {
  return {
    log: jest.spyOn(console, 'log').mockImplementation(() => {}),
    error: jest.spyOn(console, 'error').mockImplementation(() => {}),
  };
}

/**
 * Clock that advances by `stepMs` on every call.
 */
export function steppingClock(start: Date, stepMs: number = 1000): () => Date {
  let next = start.getTime();
  return () => {
    const current = new Date(next);
    next += stepMs;
    return current;
  };
}

export const START = new Date(Date.UTC(2026, 9, 19, 9, 30, 0, 0));

export function testConfig(overrides: Partial<ScaffoldConfig> = {}): ScaffoldConfig {
  return createConfig({ now: steppingClock(START), ...overrides });
}

export function quietLogger(): Logger {
  return new Logger(false);
}

export function expectedProjectFiles(): string[] {
  return [...expectedFiles.project];
}

export function expectedAppFiles(appName: string): string[] {
  return expectedFiles.app.map((file) => file.split('{app}').join(appName));
}

export async function listFiles(root: string): Promise<string[]> {
  const files = await glob('**/*', { cwd: root, nodir: true, dot: true, posix: true });
  return files.sort();
}
