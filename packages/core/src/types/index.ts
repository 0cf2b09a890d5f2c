export * from './values.js';
export * from './source.js';
export * from './asset.js';
export * from './mapping.js';
export * from './run.js';
