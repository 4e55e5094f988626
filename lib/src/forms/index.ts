/**
 * Forms Module
 *
 * Google Forms publishing, Drive sharing and credential handling.
 */

export * from './types.js';
export * from './credentials.js';
export * from './google-forms.js';
