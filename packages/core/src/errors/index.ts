export * from './conversion-error.js';
