export * from './list-block.js';
export * from './installed-apps.js';
export * from './url-routes.js';
export * from './config-mutator.js';
