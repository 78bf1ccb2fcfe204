/**
 * Backups Command
 * Lists the backup catalog of each configuration file
 */

import { BackupManager, parseBackupTimestamp } from '../backup/index.js';
import { CONFIG_ROLES, isLocked } from '../core/index.js';
import type { BackupRecord, ConfigRole } from '../core/index.js';

export type BackupCatalog = Record<ConfigRole, BackupRecord[]>;

export interface BackupListing {
  backups: BackupCatalog;
  /** Another invocation is updating or restoring the configuration */
  locked: boolean;
}

export async function listProjectBackups(backups: BackupManager): Promise<BackupListing> {
  const catalog: BackupCatalog = { 'installed-apps': [], 'url-routes': [] };
  for (const role of CONFIG_ROLES) {
    catalog[role] = await backups.listBackups(role);
  }
  return { backups: catalog, locked: await isLocked(backups.lockPath) };
}

export function describeBackup(record: BackupRecord): string {
  const takenAt = parseBackupTimestamp(record.timestamp);
  return takenAt ? `${record.id}  (${takenAt.toISOString()})` : record.id;
}
