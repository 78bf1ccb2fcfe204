import type { Command } from 'commander';
import { registerScaffoldCommands } from './register-scaffold.js';
import { registerBackupCommands } from './register-backup.js';
import { registerInteractiveCommand } from './register-interactive.js';

export function registerAllCommands(program: Command): void {
  registerScaffoldCommands(program);
  registerBackupCommands(program);
  registerInteractiveCommand(program);
}
