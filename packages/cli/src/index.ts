/**
 * @rowbridge/cli
 *
 * Configuration, logging and the command-line front end of the converters
 */

export * from './config.js';
export * from './logger.js';
export * from './converter.js';
export * from './instrument-converter.js';
export * from './run.js';
