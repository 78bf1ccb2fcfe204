/**
 * dj-scaffold package entrypoint (library-safe exports only)
 */

export * from './core/index.js';
export * from './backup/index.js';
export * from './mutator/index.js';
export * from './scaffold/index.js';
export * from './commands/index.js';
