/**
 * platform-meta: platform definition loader for test orchestration.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Platforms
export * from './core/platform/index.js';

// Utilities
export * from './utils/index.js';
