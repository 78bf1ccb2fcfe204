import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import * as fs from 'fs/promises';
import * as path from 'path';
import { BackupManager } from '../../src/backup/backup-manager.js';
import { describeBackup, listProjectBackups } from '../../src/commands/backups.js';
import { writeFileSafe } from '../../src/core/fileio.js';
import { makeTempDir, quietLogger, removeDir, silenceConsole, testConfig } from '../helpers.js';

describe('backups command', () => {
  let root: string;
  let manager: BackupManager;

  beforeEach(async () => {
    silenceConsole();
    root = await makeTempDir('dj-scaffold-listing-');
    await writeFileSafe(path.join(root, 'config', 'settings', 'base.py'), 'INSTALLED_APPS = [\n]\n');
    await writeFileSafe(path.join(root, 'config', 'urls.py'), 'urlpatterns = [\n]\n');
    manager = new BackupManager(root, testConfig(), quietLogger());
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await removeDir(root);
  });

  it('lists backups per role, oldest first', async () => {
    const first = await manager.backup('config/settings/base.py');
    const second = await manager.backup('config/settings/base.py');

    const listing = await listProjectBackups(manager);

    expect(listing.backups['installed-apps'].map((record) => record.id)).toEqual([first.id, second.id]);
    expect(listing.backups['url-routes']).toEqual([]);
    expect(listing.locked).toBe(false);
  });

  it('reports a held lock', async () => {
    await fs.mkdir(manager.lockPath, { recursive: true });

    expect((await listProjectBackups(manager)).locked).toBe(true);
  });

  it('shows when each backup was taken', async () => {
    const record = await manager.backup('config/urls.py');

    expect(describeBackup(record)).toBe('urls.py.20261019T093000000Z-000.bak  (2026-10-19T09:30:00.000Z)');
    expect(describeBackup({ ...record, timestamp: 'unknown' })).toBe(record.id);
  });
});
