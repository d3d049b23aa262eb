/**
 * Modelsync - Shared Utilities
 */

export * from './types.js';
export * from './logger.js';
export * from './async.js';
export * from './size.js';
