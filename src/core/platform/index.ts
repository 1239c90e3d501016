/**
 * Platform exports barrel file.
 */
export * from './constants.js';
export * from './schema.js';
export * from './toolchains.js';
export * from './simulator.js';
export * from './platform.js';
export * from './catalog.js';
