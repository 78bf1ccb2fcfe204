import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as path from 'path';
import { DirectoryLock, isLocked, withDirectoryLock } from '../../src/core/lock.js';
import { LockError } from '../../src/core/errors.js';
import { makeTempDir, quietLogger, removeDir } from '../helpers.js';

describe('DirectoryLock', () => {
  let tempDir: string;
  let lockPath: string;

  beforeEach(async () => {
    tempDir = await makeTempDir('dj-scaffold-lock-');
    lockPath = path.join(tempDir, 'backups', '.lock');
  });

  afterEach(async () => {
    await removeDir(tempDir);
  });

  it('is exclusive until released', async () => {
    const first = new DirectoryLock(lockPath, quietLogger());
    const second = new DirectoryLock(lockPath, quietLogger());

    await first.acquire();
    expect(first.isHeld()).toBe(true);
    expect(await isLocked(lockPath)).toBe(true);
    await expect(second.acquire()).rejects.toBeInstanceOf(LockError);

    await first.release();
    expect(await isLocked(lockPath)).toBe(false);
    await second.acquire();
    await second.release();
  });

  it('names the lock path when held', async () => {
    await new DirectoryLock(lockPath, quietLogger()).acquire();
    await expect(new DirectoryLock(lockPath, quietLogger()).acquire()).rejects.toMatchObject({
      lockPath,
      code: 'LOCK_ERROR',
    });
  });

  it('releases after the callback throws', async () => {
    await expect(
      withDirectoryLock(
        lockPath,
        async () => {
          throw new Error('inside');
        },
        quietLogger(),
      ),
    ).rejects.toThrow('inside');

    expect(await isLocked(lockPath)).toBe(false);
  });

  it('returns the callback result', async () => {
    const result = await withDirectoryLock(lockPath, async () => 42, quietLogger());
    expect(result).toBe(42);
  });
});
