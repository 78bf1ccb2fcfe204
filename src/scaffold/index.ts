export * from './names.js';
export * from './template.js';
export * from './manifest.js';
export * from './renderer.js';
export * from './verify.js';
export * from './guide.js';
