/**
 * Shared types
 */

export const CONFIG_ROLES = ['installed-apps', 'url-routes'] as const;

/** Logical identity under which backups of one configuration file are grouped. */
export type ConfigRole = (typeof CONFIG_ROLES)[number];

export interface RoleDefinition {
  role: ConfigRole;
  label: string;
  /** Live file, relative to the project root */
  file: string;
  /** Backup directory, relative to the backup root */
  backupDir: string;
  /** Backup file name prefix */
  prefix: string;
}

export interface BackupRecord {
  id: string;
  role: ConfigRole;
  sourcePath: string;
  backupPath: string;
  timestamp: string;
}

export interface RestoreRecord {
  role: ConfigRole;
  backupId: string;
  backupPath: string;
  targetPath: string;
}

export interface MutationOutcome {
  role: ConfigRole;
  status: 'inserted' | 'skipped';
  entry: string;
  filePath: string;
  backup?: BackupRecord;
}

export type DriverMode = 'init' | 'add' | 'restore';

export type DriverState = 'INIT' | 'ADD' | 'ADD_AUTO' | 'RESTORE' | 'DONE' | 'FAILED';

export interface StepReport {
  step: string;
  ok: boolean;
  detail: string;
}

export interface DriverResult {
  state: Extract<DriverState, 'DONE' | 'FAILED'>;
  path: Exclude<DriverState, 'DONE' | 'FAILED'>[];
  projectRoot: string;
  steps: StepReport[];
  error?: Error;
}

export interface VerificationResult {
  target: string;
  ok: boolean;
  message: string;
}

export function isConfigRole(value: string): value is ConfigRole {
  return CONFIG_ROLES.some((role) => role === value);
}
