export * from './builders.js';
export * from './describe.js';
