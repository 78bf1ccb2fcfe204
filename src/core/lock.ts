/**
 * Advisory directory lock.
 * mkdir is atomic, so whoever creates the directory owns the lock.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { LockError, PathError, isErrnoException } from './errors.js';
import { ensureDir } from './fileio.js';
import { logger as defaultLogger, Logger } from './logger.js';

export class DirectoryLock {
  private held = false;

  constructor(
    readonly lockPath: string,
    private readonly log: Logger = defaultLogger,
  ) {}

  isHeld(): boolean {
    return this.held;
  }

  async acquire(): Promise<void> {
    await ensureDir(path.dirname(this.lockPath));
    try {
      await fs.mkdir(this.lockPath);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'EEXIST') {
        throw new LockError(this.lockPath);
      }
      throw PathError.from(this.lockPath, 'create directory', error);
    }
    this.held = true;
    this.log.debug(`Lock acquired: ${this.lockPath}`);
  }

  async release(): Promise<void> {
    if (!this.isHeld()) return;
    try {
      await fs.rm(this.lockPath, { recursive: true, force: true });
    } finally {
      this.held = false;
    }
    this.log.debug(`Lock released: ${this.lockPath}`);
  }
}

export async function withDirectoryLock<T>(
  lockPath: string,
  fn: () => Promise<T>,
  log: Logger = defaultLogger,
): Promise<T> {
  const lock = new DirectoryLock(lockPath, log);
  await lock.acquire();
  try {
    return await fn();
  } finally {
    await lock.release();
  }
}

export async function isLocked(lockPath: string): Promise<boolean> {
  try {
    return (await fs.stat(lockPath)).isDirectory();
  } catch {
    return false;
  }
}
