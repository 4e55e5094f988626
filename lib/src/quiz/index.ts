/**
 * Quiz Module
 *
 * Prompt building, recovery of the model's JSON, payload building and the
 * `mcqs.json` artifact.
 */

export * from './types.js';
export * from './language.js';
export * from './prompt-builder.js';
export * from './recoverer.js';
export * from './artifact-store.js';
export * from './payload-builder.js';
