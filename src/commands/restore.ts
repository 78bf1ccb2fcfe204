/**
 * Restore Command
 * Puts each configuration file back to its newest backup
 */

import { BackupManager } from '../backup/index.js';
import type { ConfigRole, RestoreRecord } from '../core/index.js';
import type { CommandContext, StepRecorder } from './context.js';

export interface RestoreSummary {
  restored: RestoreRecord[];
  errors: Error[];
}

/**
 * Roles are restored independently: one failing role does not stop the
 * others.
 */
export async function restoreConfiguration(
  ctx: CommandContext,
  projectRoot: string,
  roles: readonly ConfigRole[],
  recorder: StepRecorder,
): Promise<RestoreSummary> {
  const backups = new BackupManager(projectRoot, ctx.config, ctx.log);
  const summary: RestoreSummary = { restored: [], errors: [] };

  ctx.log.heading('Restoring configuration');

  for (const role of roles) {
    try {
      const record = await recorder.run(
        `restore ${role}`,
        async () => backups.restore(role),
        (result) => `${result.targetPath} <- ${result.backupId}`,
      );
      summary.restored.push(record);
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      ctx.log.error(failure.message);
      summary.errors.push(failure);
    }
  }

  return summary;
}
