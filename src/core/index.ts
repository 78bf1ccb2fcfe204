/**
 * Core module exports
 */

export * from './types.js';
export * from './logger.js';
export * from './errors.js';
export * from './fileio.js';
export * from './config.js';
export * from './lock.js';
export * from './json-output.js';
