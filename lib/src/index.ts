/**
 * PDF Quiz Forms - Shared Library
 *
 * Everything the HTTP handlers need to turn a PDF into a Google Forms quiz.
 */

// Logging
export * from './logging/index.js';

// Configuration
export * from './config/index.js';

// LLM (Completion Strategies)
export * from './llm/index.js';

// PDF Processing
export * from './pdf/index.js';

// Quiz (Prompt, Recovery, Payload)
export * from './quiz/index.js';

// Google Forms Publishing
export * from './forms/index.js';

// Active Form Pointer
export * from './pointer/index.js';

// Messaging (Twilio)
export * from './messaging/index.js';

// Pipeline Orchestration
export * from './pipeline/index.js';
