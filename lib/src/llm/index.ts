/**
 * LLM Module
 *
 * Chat model adapters, retry and provider resolution.
 */

export * from './types.js';
export * from './errors.js';
export * from './adapter.js';
export * from './retry.js';
export * from './factory.js';
export * from './registry.js';
export * from './adapters/index.js';
