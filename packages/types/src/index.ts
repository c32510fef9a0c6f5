export * from './block.js';
export * from './keys.js';
export * from './logger.js';
