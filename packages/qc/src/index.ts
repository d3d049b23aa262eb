/**
 * Modelsync - QC
 * Quantization quality testing against a base model
 */

export * from './types.js';
export * from './errors.js';
export * from './test-suites.js';
export * from './tag-resolver.js';
export * from './scoring.js';
export * from './result-store.js';
export * from './prompts.js';
export * from './judge.js';
export * from './judge-orchestrator.js';
export * from './run-context.js';
export * from './qc-runner.js';
