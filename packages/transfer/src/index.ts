/**
 * Modelsync - Transfer
 * Model copies between the local store and remote inference servers
 */

export * from './types.js';
export * from './errors.js';
export * from './endpoints.js';
export * from './relay-buffer.js';
export * from './bandwidth-limiter.js';
export * from './local-store.js';
export * from './registry-client.js';
export * from './transfer-engine.js';
