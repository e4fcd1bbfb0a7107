/**
 * LLM Adapters
 */

export * from './anthropic.js';
export * from './openai-compatible.js';
export * from './gemini.js';
export * from './ollama.js';
export { createHttpClient, mapHttpError, parseRetryAfter } from './http.js';
