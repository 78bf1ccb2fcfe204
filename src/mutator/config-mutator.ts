/**
 * Config Mutator
 *
 * Registers an application in the settings and URL configuration files.
 * Both insertions are computed before anything is written, so a file in an
 * unrecognized shape leaves both files (and the backup catalog) untouched.
 * Each file that changes is backed up right before it is written; when a
 * later backup or write fails, the files already written get their previous
 * text back.
 */

import * as fs from 'fs/promises';
import {
  CONFIG_ROLES,
  logger as defaultLogger,
  Logger,
  ParseError,
  PathError,
  readFileSafe,
} from '../core/index.js';
import type { BackupRecord, ConfigRole, MutationOutcome, ScaffoldConfig } from '../core/index.js';
import { BackupManager } from '../backup/index.js';
import { formatApplicationEntry, hasApplicationEntry, insertApplicationEntry } from './installed-apps.js';
import { formatRouteEntry, hasRouteEntry, insertRouteEntry } from './url-routes.js';

interface RoleInserter {
  has(text: string, appName: string): boolean;
  insert(text: string, appName: string): string;
  entry(appName: string): string;
}

interface StagedChange {
  role: ConfigRole;
  filePath: string;
  original: string;
  updated: string | null;
  entry: string;
}

export class ConfigMutator {
  private readonly inserters: Record<ConfigRole, RoleInserter>;

  constructor(
    private readonly backups: BackupManager,
    config: ScaffoldConfig,
    private readonly log: Logger = defaultLogger,
  ) {
    const routeOptions = { rootApp: config.rootApp };
    this.inserters = {
      'installed-apps': {
        has: hasApplicationEntry,
        insert: insertApplicationEntry,
        entry: formatApplicationEntry,
      },
      'url-routes': {
        has: hasRouteEntry,
        insert: (text, appName) => insertRouteEntry(text, appName, routeOptions),
        entry: (appName) => formatRouteEntry(appName, routeOptions),
      },
    };
  }

  /**
   * Register `appName` in every configuration file that does not list it yet.
   */
  async addApplication(appName: string, roles: readonly ConfigRole[] = CONFIG_ROLES): Promise<MutationOutcome[]> {
    return this.backups.withLock(async () => {
      const staged: StagedChange[] = [];
      for (const role of roles) {
        staged.push(await this.stage(role, appName));
      }

      const outcomes: MutationOutcome[] = [];
      const written: StagedChange[] = [];

      for (const change of staged) {
        if (change.updated === null) {
          this.log.warn(`${appName} is already registered in ${change.filePath}; skipped`);
          outcomes.push({ role: change.role, status: 'skipped', entry: change.entry, filePath: change.filePath });
          continue;
        }

        let backup: BackupRecord;
        try {
          backup = await this.backups.backup(change.filePath);
          await this.write(change.filePath, change.updated);
        } catch (error) {
          await this.revert(written);
          throw error;
        }

        written.push(change);
        this.log.success(`Added to ${change.filePath}: ${change.entry}`);
        outcomes.push({ role: change.role, status: 'inserted', entry: change.entry, filePath: change.filePath, backup });
      }

      return outcomes;
    });
  }

  private async stage(role: ConfigRole, appName: string): Promise<StagedChange> {
    const inserter = this.inserters[role];
    const filePath = this.backups.livePath(role);
    const original = await readFileSafe(filePath);
    const entry = inserter.entry(appName);

    try {
      const updated = inserter.has(original, appName) ? null : inserter.insert(original, appName);
      return { role, filePath, original, updated, entry };
    } catch (error) {
      if (error instanceof ParseError) {
        throw new ParseError(error.message, filePath);
      }
      throw error;
    }
  }

  private async write(filePath: string, content: string): Promise<void> {
    try {
      await fs.writeFile(filePath, content, 'utf-8');
    } catch (error) {
      throw PathError.from(filePath, 'write', error);
    }
  }

  private async revert(written: StagedChange[]): Promise<void> {
    for (const change of written) {
      await this.write(change.filePath, change.original);
      this.log.warn(`Reverted ${change.filePath} to its previous content`);
    }
  }
}
