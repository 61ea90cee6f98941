export * from './scramble-logger.js';
export * from './scramble.js';
