/**
 * LLM Module
 *
 * OpenAI completion client with its strategy ladder, retry utilities and
 * error taxonomy.
 */

export * from './types.js';
export * from './errors.js';
export * from './retry.js';
export * from './strategies.js';
export * from './completion-client.js';
