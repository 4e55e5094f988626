/**
 * Pipeline Module
 *
 * PDF → quiz → Google Form orchestration.
 */

export * from './types.js';
export * from './orchestrator.js';
