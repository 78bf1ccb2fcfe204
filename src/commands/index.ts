export * from './context.js';
export * from './init.js';
export * from './add.js';
export * from './restore.js';
export * from './backups.js';
export * from './guide.js';
export * from './driver.js';
