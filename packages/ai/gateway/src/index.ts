/**
 * Modelsync - AI Gateway
 * Inference server client and cloud judge providers
 */

export * from './types.js';
export * from './errors.js';
export * from './streaming.js';
export * from './ollama-adapter.js';
export * from './judge-response.js';
export * from './provider-support.js';
export * from './judge-provider.js';
export * from './anthropic-judge.js';
export * from './openai-judge.js';
export * from './cohere-judge.js';
export * from './replicate-judge.js';
