export * from './backup-manager.js';
export * from './timestamp.js';
