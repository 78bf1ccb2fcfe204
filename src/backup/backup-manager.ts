/**
 * Backup Manager
 *
 * Snapshots configuration files into one backup directory per role and
 * restores the newest snapshot on request. The directory listing is the
 * catalog: there is no index file.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { escape, glob } from 'glob';
import {
  CONFIG_ROLES,
  ensureDir,
  isErrnoException,
  logger as defaultLogger,
  Logger,
  NotFoundError,
  PathError,
  readFileSafe,
  resolveBackupDir,
  resolveLivePath,
  withDirectoryLock,
} from '../core/index.js';
import type { BackupRecord, ConfigRole, RestoreRecord, RoleDefinition, ScaffoldConfig } from '../core/index.js';
import { BACKUP_TIMESTAMP_PATTERN, formatBackupTimestamp } from './timestamp.js';

const MAX_SEQUENCE = 1000;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function backupNamePattern(prefix: string): RegExp {
  return new RegExp(`^${escapeRegExp(prefix)}\\.(${BACKUP_TIMESTAMP_PATTERN})-(\\d{3})\\.bak$`);
}

export function backupFileName(prefix: string, stamp: string, sequence: number): string {
  return `${prefix}.${stamp}-${String(sequence).padStart(3, '0')}.bak`;
}

export class BackupManager {
  private readonly projectRoot: string;

  constructor(
    projectRoot: string,
    private readonly config: ScaffoldConfig,
    private readonly log: Logger = defaultLogger,
  ) {
    this.projectRoot = path.resolve(projectRoot);
  }

  get lockPath(): string {
    return path.join(this.projectRoot, this.config.backupRoot, this.config.lockName);
  }

  livePath(role: ConfigRole): string {
    return resolveLivePath(this.projectRoot, this.config, role);
  }

  backupDir(role: ConfigRole): string {
    return resolveBackupDir(this.projectRoot, this.config, role);
  }

  /**
   * Find the role whose live file is `filePath`.
   */
  roleFor(filePath: string): RoleDefinition {
    const target = path.resolve(this.projectRoot, filePath);
    for (const role of CONFIG_ROLES) {
      if (this.livePath(role) === target) {
        return this.config.roles[role];
      }
    }
    throw new PathError(target, 'resolve', 'not a managed configuration file');
  }

  /**
   * Run `fn` while holding the project's advisory lock.
   */
  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    return withDirectoryLock(this.lockPath, fn, this.log);
  }

  /**
   * Copy the current contents of a configuration file into its role's
   * backup directory. The source file is left as it is.
   */
  async backup(filePath: string): Promise<BackupRecord> {
    const definition = this.roleFor(filePath);
    const sourcePath = this.livePath(definition.role);
    const content = await readFileSafe(sourcePath);

    const dir = this.backupDir(definition.role);
    await ensureDir(dir);

    const stamp = formatBackupTimestamp(this.config.now());
    for (let sequence = 0; sequence < MAX_SEQUENCE; sequence += 1) {
      const id = backupFileName(definition.prefix, stamp, sequence);
      const backupPath = path.join(dir, id);
      try {
        await fs.writeFile(backupPath, content, { encoding: 'utf-8', flag: 'wx' });
      } catch (error) {
        if (isErrnoException(error) && error.code === 'EEXIST') continue;
        throw PathError.from(backupPath, 'write', error);
      }

      this.log.success(`Backed up ${definition.label}: ${backupPath}`);
      return { id, role: definition.role, sourcePath, backupPath, timestamp: stamp };
    }

    throw new PathError(dir, 'write', `more than ${MAX_SEQUENCE} backups share timestamp ${stamp}`);
  }

  /**
   * Backups of a role, oldest first.
   */
  async listBackups(role: ConfigRole): Promise<BackupRecord[]> {
    const definition = this.config.roles[role];
    const dir = this.backupDir(role);
    const pattern = backupNamePattern(definition.prefix);

    let names: string[];
    try {
      names = await glob(`${escape(definition.prefix)}.*.bak`, { cwd: dir, nodir: true });
    } catch (error) {
      throw PathError.from(dir, 'list', error);
    }

    const records: BackupRecord[] = [];
    for (const name of names.sort()) {
      const match = pattern.exec(name);
      if (!match) continue;
      records.push({
        id: name,
        role,
        sourcePath: this.livePath(role),
        backupPath: path.join(dir, name),
        timestamp: match[1],
      });
    }
    return records;
  }

  async latestBackup(role: ConfigRole): Promise<BackupRecord | null> {
    const records = await this.listBackups(role);
    return records.length > 0 ? records[records.length - 1] : null;
  }

  /**
   * Overwrite the live file of `role` with its newest backup.
   */
  async restore(role: ConfigRole): Promise<RestoreRecord> {
    return this.withLock(async () => {
      const definition = this.config.roles[role];
      const latest = await this.latestBackup(role);
      if (!latest) {
        throw new NotFoundError(
          `No ${definition.label} backup found in ${this.backupDir(role)}`,
        );
      }

      const targetPath = this.livePath(role);
      const content = await readFileSafe(latest.backupPath);
      try {
        await fs.writeFile(targetPath, content, 'utf-8');
      } catch (error) {
        throw PathError.from(targetPath, 'write', error);
      }

      this.log.success(`Restored ${definition.label} from ${latest.backupPath}`);
      return { role, backupId: latest.id, backupPath: latest.backupPath, targetPath };
    });
  }
}
