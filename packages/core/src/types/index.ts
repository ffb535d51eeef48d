export * from './schema.js';
export * from './record.js';
export * from './options.js';
